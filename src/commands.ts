import { existsSync } from "fs";
import type { ChalkInstance } from "chalk";
import { CANCELLED_CAUSE, describeValidationError, err, ok } from "../llm/index.js";
import type { GenerationResult, ModelInfo, Result, WebUIClient } from "../llm/index.js";
import { errorMessage } from "../utils.js";
import { ENV_KEYS, updateConfigFile, userConfigPath, type ConfigValues, type WebUIConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { modelDescriber, modelIds } from "./model/sources.js";
import type { PickerOutcome } from "./ui/model-picker.js";
import { renderModelList, renderResponse, writeLines, type Output } from "./ui/render.js";
import { Spinner, withSpinner } from "./ui/spinner.js";

export type CommandStatus = "ok" | "failed" | "cancelled";

export type PickModel = (
  ids: string[],
  options: { initial?: string; describe: (id: string) => string },
) => Promise<PickerOutcome>;

export interface CommandContext {
  config: WebUIConfig;
  client: WebUIClient;
  logger: Logger;
  // Answers and tables.
  out: Output;
  // Errors and notices.
  err: Output;
  chalk: ChalkInstance;
  width: number;
  spinner?: Spinner;
  pickModel?: PickModel;
  now?: () => number;
  signal?: AbortSignal;
}

export interface PromptCommand {
  prompt: string;
  // `true` when --model was given without a value.
  model?: string | true;
  params?: Record<string, unknown>;
}

export interface ParsedParams {
  params: Record<string, unknown>;
  errors: string[];
}

// `key=value` pairs from --param; values are JSON when they parse, plain strings otherwise.
export function parseParamArgs(entries: readonly string[]): ParsedParams {
  const params: Record<string, unknown> = {};
  const errors: string[] = [];
  for (const entry of entries) {
    const eq = entry.indexOf("=");
    const key = eq > 0 ? entry.slice(0, eq).trim() : "";
    if (!key) {
      errors.push(`Invalid parameter "${entry}", expected key=value`);
      continue;
    }
    const raw = entry.slice(eq + 1);
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      value = raw;
    }
    params[key] = value;
  }
  return { params, errors };
}

function reportFailure(ctx: CommandContext, result: Exclude<GenerationResult, { kind: "success" }>): CommandStatus {
  const { chalk } = ctx;
  if (result.kind === "provider_error") {
    writeLines(ctx.err, [
      chalk.red(`Error: Request failed with status code ${result.statusCode}`),
      ...(result.body ? [chalk.dim(result.body)] : []),
    ]);
    return "failed";
  }
  if (result.cause === CANCELLED_CAUSE) {
    writeLines(ctx.err, [chalk.yellow(CANCELLED_CAUSE)]);
    return "cancelled";
  }
  writeLines(ctx.err, [chalk.red(`Error: ${result.cause}`)]);
  return "failed";
}

async function fetchModelsOrReport(ctx: CommandContext): Promise<Result<ModelInfo[], CommandStatus>> {
  const result = await ctx.client.listModels(ctx.signal);
  if (result.ok) return result;
  return err(reportFailure(ctx, result.error));
}

export async function runListModels(ctx: CommandContext): Promise<CommandStatus> {
  const models = await fetchModelsOrReport(ctx);
  if (!models.ok) return models.error;
  writeLines(ctx.out, renderModelList(models.value, ctx));
  return "ok";
}

async function pickFromService(ctx: CommandContext, initial?: string): Promise<Result<string, CommandStatus>> {
  const { chalk } = ctx;
  if (!ctx.pickModel) {
    writeLines(ctx.err, [chalk.red("Error: Interactive model selection is not available")]);
    return err("failed");
  }
  const models = await fetchModelsOrReport(ctx);
  if (!models.ok) return models;
  if (models.value.length === 0) {
    writeLines(ctx.err, [chalk.yellow("No models found in response")]);
    return err("failed");
  }
  const picked = await ctx.pickModel(modelIds(models.value), { initial, describe: modelDescriber(models.value) });
  if (picked.selection === undefined) {
    writeLines(ctx.err, [chalk.yellow("Model selection cancelled")]);
    return err("cancelled");
  }
  return ok(picked.selection);
}

/**
 * Resolves the model, sends one prompt and prints the outcome. An explicit
 * model missing from the service's list is reported together with the list,
 * and nothing is sent.
 */
export async function runPrompt(ctx: CommandContext, command: PromptCommand): Promise<CommandStatus> {
  const { chalk, logger } = ctx;
  const now = ctx.now ?? Date.now;
  let model: string | undefined;

  if (command.model === true) {
    const picked = await pickFromService(ctx, ctx.config.defaultModel);
    if (!picked.ok) return picked.error;
    model = picked.value;
  } else if (command.model !== undefined && command.model.trim()) {
    model = command.model.trim();
    const { check, models } = await ctx.client.checkModel(model, ctx.signal);
    if (check === "missing" && models.ok) {
      writeLines(ctx.err, [chalk.red(`Error: Model '${model}' not found in available models.`), ""]);
      writeLines(ctx.out, renderModelList(models.value, ctx));
      return "failed";
    }
    if (check === "unknown") logger.warn(`Could not verify model '${model}', sending the request anyway`);
  } else {
    model = command.model;
  }

  const startedAt = now();
  const outcome = await withSpinner(
    "Waiting for response...",
    () => ctx.client.generate(command.prompt, { model, params: command.params, signal: ctx.signal }),
    ctx.spinner,
  );
  const elapsedSeconds = (now() - startedAt) / 1000;

  if (!outcome.ok) {
    writeLines(ctx.err, [chalk.red(`Invalid request: ${describeValidationError(outcome.error)}`)]);
    return "failed";
  }
  const result = outcome.value;
  if (result.kind !== "success") return reportFailure(ctx, result);

  const lines = renderResponse(
    result.content,
    { model: result.model, tokenCount: result.tokenCount, elapsedSeconds, timestamp: new Date(startedAt) },
    ctx,
  );
  writeLines(ctx.out, lines);
  return "ok";
}

// --model without a value and without a prompt: pick a model and store it as the default.
export async function runSelectDefaultModel(
  ctx: CommandContext,
  save: (values: ConfigValues, file: string) => void = updateConfigFile,
): Promise<CommandStatus> {
  const { chalk } = ctx;
  const picked = await pickFromService(ctx, ctx.config.defaultModel);
  if (!picked.ok) return picked.error;

  // An existing file, possibly a project's .env, only gets its DEFAULT_MODEL line touched.
  const file = ctx.config.configFile ?? userConfigPath();
  const values: ConfigValues = { [ENV_KEYS.defaultModel]: picked.value };
  if (!existsSync(file)) {
    values[ENV_KEYS.baseUrl] = ctx.config.baseUrl;
    if (ctx.config.apiKey) values[ENV_KEYS.apiKey] = ctx.config.apiKey;
  }
  try {
    save(values, file);
  } catch (error) {
    writeLines(ctx.err, [chalk.red(`Error: Failed to save configuration: ${errorMessage(error)}`)]);
    return "failed";
  }
  writeLines(ctx.err, [chalk.green(`✓ Default model set to ${picked.value}`), chalk.dim(`Saved to ${file}`)]);
  return "ok";
}
