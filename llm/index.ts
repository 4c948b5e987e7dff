export { WebUIClient } from "./client.js";
export type { GenerateOutcome, ModelCheck, SendOptions } from "./client.js";
export { classifyCompletion, classifyModels, toModelInfo } from "./classify.js";
export { ALLOWED_PARAMS, TIMEOUT_PARAM, filterParams } from "./params.js";
export type { AllowedParam, FilteredParams } from "./params.js";
export {
  buildChatRequest,
  buildRequest,
  describeValidationError,
  serializeTranscript,
  validateMessages,
} from "./request.js";
export type { BuildOptions, RequestDefaults } from "./request.js";
export { CANCELLED_CAUSE, GENERATE_TIMEOUT_SECONDS, HttpTransport, MODELS_TIMEOUT_SECONDS } from "./transport.js";
export type { FetchLike, TransportOutcome, TransportRequest } from "./transport.js";
export { err, ok } from "./Interfaces.js";
export type {
  BuiltRequest,
  ChatMessage,
  GenerationRequest,
  GenerationResult,
  GenerationSuccess,
  ModelInfo,
  ModelListResult,
  ParamValue,
  ProviderError,
  Result,
  Role,
  TransportError,
  ValidationError,
} from "./Interfaces.js";
