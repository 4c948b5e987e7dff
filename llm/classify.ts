import { z } from "zod";
import { err, ok } from "./Interfaces.js";
import type { GenerationResult, ModelInfo, ModelListResult, ProviderError, TransportError } from "./Interfaces.js";
import type { Logger } from "../src/logger.js";
import { errorMessage } from "../utils.js";

export const HTTP_OK = 200;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).passthrough().optional(),
      }).passthrough(),
    )
    .default([]),
  model: z.string().nullish(),
  usage: z.object({ total_tokens: z.number().optional() }).passthrough().nullish(),
}).passthrough();

const modelsSchema = z.object({
  data: z.array(z.unknown()).default([]),
}).passthrough();

const modelEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().nullish(),
  owned_by: z.string().nullish(),
});

type ParseOutcome<T> = { ok: true; data: T } | { ok: false; reason: string };

function parseJson<T>(body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseOutcome<T> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return { ok: false, reason: `Failed to decode JSON response: ${errorMessage(error)}` };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return { ok: false, reason: `Unexpected response shape${where}: ${issue?.message ?? "invalid"}` };
  }
  return { ok: true, data: parsed.data };
}

function providerError(status: number, body: string): ProviderError {
  return { kind: "provider_error", statusCode: status, body };
}

function transportError(cause: string): TransportError {
  return { kind: "transport_error", cause };
}

export function classifyCompletion(
  status: number,
  body: string,
  requestedModel: string,
  logger?: Logger,
): GenerationResult {
  if (status !== HTTP_OK) return providerError(status, body);

  // A 200 we cannot read points at a broken connection or proxy, not the provider.
  const parsed = parseJson(body, completionSchema);
  if (!parsed.ok) return transportError(parsed.reason);

  const { choices, model, usage } = parsed.data;
  if (choices.length === 0) logger?.warn("Response contained no choices, treating it as an empty answer");
  return {
    kind: "success",
    content: choices[0]?.message?.content ?? "",
    model: model || requestedModel,
    tokenCount: usage?.total_tokens,
  };
}

export function toModelInfo(entry: unknown): ModelInfo | undefined {
  const parsed = modelEntrySchema.safeParse(entry);
  if (!parsed.success) return undefined;
  const { id, name, owned_by } = parsed.data;
  return {
    id,
    displayName: name?.trim() || id,
    ...(owned_by ? { ownedBy: owned_by } : {}),
  };
}

export function classifyModels(status: number, body: string): ModelListResult {
  if (status !== HTTP_OK) return err(providerError(status, body));

  const parsed = parseJson(body, modelsSchema);
  if (!parsed.ok) return err(transportError(parsed.reason));

  const models: ModelInfo[] = [];
  for (const entry of parsed.data.data) {
    const model = toModelInfo(entry);
    if (model) models.push(model);
  }
  return ok(models);
}
