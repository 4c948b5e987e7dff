import { err, ok } from "./Interfaces.js";
import type { BuiltRequest, ChatMessage, Result, Role, ValidationError } from "./Interfaces.js";
import { filterParams } from "./params.js";

export interface RequestDefaults {
  model: string;
  systemPrompt: string;
}

export interface BuildOptions {
  model?: unknown;
  params?: Record<string, unknown>;
}

const ROLE_LABELS: Record<Role, string> = {
  system: "System",
  user: "User",
  assistant: "Assistant",
};

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRole(value: unknown): value is Role {
  return value === "system" || value === "user" || value === "assistant";
}

function resolveModel(model: unknown, fallback: string, warnings: string[]): Result<string, ValidationError> {
  if (model === undefined || model === null) return ok(fallback);
  if (typeof model !== "string") return err({ kind: "InvalidModelType", received: typeName(model) });
  const trimmed = model.trim();
  if (!trimmed) {
    warnings.push("Empty model name provided, using default");
    return ok(fallback);
  }
  return ok(trimmed);
}

export function buildRequest(
  prompt: unknown,
  defaults: RequestDefaults,
  options: BuildOptions = {},
): Result<BuiltRequest, ValidationError> {
  if (typeof prompt !== "string") return err({ kind: "InvalidPromptType", received: typeName(prompt) });
  if (!prompt.trim()) return err({ kind: "EmptyPrompt" });

  const warnings: string[] = [];
  const model = resolveModel(options.model, defaults.model, warnings);
  if (!model.ok) return model;

  const filtered = filterParams(options.params);
  warnings.push(...filtered.warnings);

  const messages: ChatMessage[] = [
    { role: "system", content: defaults.systemPrompt },
    { role: "user", content: prompt },
  ];

  return ok({
    request: { model: model.value, messages, params: filtered.params },
    timeout: filtered.timeout,
    warnings,
  });
}

export function validateMessages(messages: unknown): Result<ChatMessage[], ValidationError> {
  if (!Array.isArray(messages)) return err({ kind: "InvalidMessages", received: typeName(messages) });
  if (messages.length === 0) return err({ kind: "EmptyMessages" });

  const valid: ChatMessage[] = [];
  for (const [index, message] of messages.entries()) {
    if (!isRecord(message)) {
      return err({ kind: "InvalidMessage", index, reason: "must be an object" });
    }
    if (!("content" in message)) {
      return err({ kind: "InvalidMessage", index, reason: "must have a content field" });
    }
    const { content } = message;
    if (typeof content !== "string") {
      return err({ kind: "InvalidMessage", index, reason: "content must be a string" });
    }
    if (!content.trim()) {
      return err({ kind: "InvalidMessage", index, reason: "content cannot be empty" });
    }
    const role = message.role ?? "user";
    // Unknown roles are kept out of the transcript rather than rejected.
    if (isRole(role)) valid.push({ role, content });
  }
  return ok(valid);
}

export function serializeTranscript(messages: ChatMessage[]): string {
  const lines = messages.map((m) => `${ROLE_LABELS[m.role]}: ${m.content}`);
  lines.push("Assistant:");
  return lines.join("\n");
}

export function buildChatRequest(
  messages: unknown,
  defaults: RequestDefaults,
  options: BuildOptions = {},
): Result<BuiltRequest, ValidationError> {
  const validated = validateMessages(messages);
  if (!validated.ok) return validated;
  return buildRequest(serializeTranscript(validated.value), defaults, options);
}

export function describeValidationError(error: ValidationError): string {
  switch (error.kind) {
    case "EmptyPrompt":
      return "Prompt cannot be empty or whitespace only";
    case "InvalidPromptType":
      return `Prompt must be a string, got ${error.received}`;
    case "InvalidMessages":
      return `Messages must be a list, got ${error.received}`;
    case "EmptyMessages":
      return "Messages list cannot be empty";
    case "InvalidMessage":
      return `Message ${error.index} ${error.reason}`;
    case "InvalidModelType":
      return `Model must be a string, got ${error.received}`;
  }
}
