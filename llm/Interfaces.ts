export type Role = "system" | "user" | "assistant";

export interface ChatMessage {
  role: Role;
  content: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type ParamValue = number | boolean | string | string[];

export interface GenerationRequest {
  model: string;
  messages: ChatMessage[];
  params: Record<string, ParamValue>;
}

export interface BuiltRequest {
  request: GenerationRequest;
  // Seconds, from the reserved `timeout` parameter.
  timeout?: number;
  warnings: string[];
}

export type ValidationError =
  | { kind: "EmptyPrompt" }
  | { kind: "InvalidPromptType"; received: string }
  | { kind: "InvalidMessages"; received: string }
  | { kind: "EmptyMessages" }
  | { kind: "InvalidMessage"; index: number; reason: string }
  | { kind: "InvalidModelType"; received: string };

export interface ProviderError {
  kind: "provider_error";
  statusCode: number;
  body: string;
}

export interface TransportError {
  kind: "transport_error";
  cause: string;
}

export interface GenerationSuccess {
  kind: "success";
  content: string;
  model: string;
  tokenCount?: number;
}

export type GenerationResult = GenerationSuccess | ProviderError | TransportError;

export interface ModelInfo {
  id: string;
  displayName: string;
  ownedBy?: string;
}

export type ModelListResult = Result<ModelInfo[], ProviderError | TransportError>;
