import { generateEndpoint, modelsEndpoint, requestHeaders, type WebUIConfig } from "../src/config.js";
import type { Logger } from "../src/logger.js";
import { classifyCompletion, classifyModels } from "./classify.js";
import { err } from "./Interfaces.js";
import type { BuiltRequest, GenerationResult, ModelListResult, Result, ValidationError } from "./Interfaces.js";
import { buildChatRequest, buildRequest, describeValidationError, type BuildOptions } from "./request.js";
import { GENERATE_TIMEOUT_SECONDS, HttpTransport, MODELS_TIMEOUT_SECONDS } from "./transport.js";

export interface SendOptions extends BuildOptions {
  signal?: AbortSignal;
}

export type GenerateOutcome = Result<GenerationResult, ValidationError>;

export type ModelCheck = "found" | "missing" | "unknown";

export class WebUIClient {
  constructor(
    private readonly config: WebUIConfig,
    private readonly logger: Logger,
    private readonly transport: HttpTransport = new HttpTransport(logger),
  ) {}

  async listModels(signal?: AbortSignal): Promise<ModelListResult> {
    this.logger.info("Fetching available models...");
    const outcome = await this.transport.send({
      method: "GET",
      url: modelsEndpoint(this.config),
      headers: requestHeaders(this.config),
      timeoutSeconds: MODELS_TIMEOUT_SECONDS,
      signal,
    });
    if (!outcome.ok) return err({ kind: "transport_error", cause: outcome.cause });

    const result = classifyModels(outcome.status, outcome.body);
    if (result.ok) {
      this.logger.info(`Found ${result.value.length} available models`);
    } else if (result.error.kind === "provider_error") {
      this.logger.error(`Model listing failed with status code ${result.error.statusCode}`);
    } else {
      this.logger.error(`Model listing failed: ${result.error.cause}`);
    }
    return result;
  }

  // Best effort: an unreachable model list never blocks generation.
  async checkModel(model: string, signal?: AbortSignal): Promise<{ check: ModelCheck; models: ModelListResult }> {
    const models = await this.listModels(signal);
    if (!models.ok || models.value.length === 0) return { check: "unknown", models };
    return { check: models.value.some((m) => m.id === model) ? "found" : "missing", models };
  }

  generate(prompt: unknown, options: SendOptions = {}): Promise<GenerateOutcome> {
    return this.send(buildRequest(prompt, this.defaults(), options), options.signal);
  }

  generateChat(messages: unknown, options: SendOptions = {}): Promise<GenerateOutcome> {
    return this.send(buildChatRequest(messages, this.defaults(), options), options.signal);
  }

  private defaults() {
    return { model: this.config.defaultModel, systemPrompt: this.config.systemPrompt };
  }

  private async send(built: Result<BuiltRequest, ValidationError>, signal?: AbortSignal): Promise<GenerateOutcome> {
    if (!built.ok) {
      this.logger.error(describeValidationError(built.error));
      return built;
    }
    const { request, timeout, warnings } = built.value;
    for (const warning of warnings) this.logger.warn(warning);
    this.logger.info(`Using model: ${request.model}`);

    const payload = { model: request.model, messages: request.messages, ...request.params };
    const outcome = await this.transport.send({
      method: "POST",
      url: generateEndpoint(this.config),
      headers: requestHeaders(this.config),
      body: payload,
      timeoutSeconds: timeout ?? GENERATE_TIMEOUT_SECONDS,
      signal,
    });
    if (!outcome.ok) return { ok: true, value: { kind: "transport_error", cause: outcome.cause } };

    const result = classifyCompletion(outcome.status, outcome.body, request.model, this.logger);
    if (result.kind === "success") {
      this.logger.info("Request successful");
    } else if (result.kind === "provider_error") {
      this.logger.error(`Request failed with status code: ${result.statusCode}`);
      this.logger.error(`Error response: ${result.body}`);
    } else {
      this.logger.error(`Request failed: ${result.cause}`);
    }
    return { ok: true, value: result };
  }
}
