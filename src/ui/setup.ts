import type { ChalkInstance } from "chalk";
import { z } from "zod";
import {
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_SYSTEM_PROMPT_FILE,
  ENV_KEYS,
  normalizeBaseUrl,
  saveConfig,
  type ConfigValues,
} from "../config.js";
import { modelDescriber, modelIds, type ModelFetcher } from "../model/sources.js";
import { errorMessage, maskSecret } from "../../utils.js";
import type { PickerOutcome } from "./model-picker.js";
import type { AskLine } from "./prompt-line.js";
import { writeLines, type Output } from "./render.js";

export type SetupOutcome =
  | { kind: "saved"; file: string; values: ConfigValues }
  | { kind: "cancelled" }
  | { kind: "failed"; reason: string };

export interface SetupDeps {
  configFile: string;
  existing: ConfigValues;
  ask: AskLine;
  fetchModels: ModelFetcher;
  pickModel?: (ids: string[], options: { initial: string; describe: (id: string) => string }) => Promise<PickerOutcome>;
  out: Output;
  chalk: ChalkInstance;
  save?: (values: ConfigValues, file: string) => void;
}

const urlSchema = z.string().url();

class SetupCancelled extends Error {}

async function askOrCancel(ask: AskLine, label: string): Promise<string> {
  const answer = await ask(label);
  if (answer === undefined) throw new SetupCancelled();
  return answer.trim();
}

async function askBaseUrl(deps: SetupDeps, current: string | undefined): Promise<string> {
  const { chalk, out } = deps;
  writeLines(out, [
    chalk.bold("1. WebUI Base URL"),
    chalk.dim("   The base URL of the WebUI service"),
    chalk.dim(`   Default: ${DEFAULT_BASE_URL}`),
    ...(current ? [chalk.dim(`   Current: ${current}`)] : []),
  ]);
  const label = current
    ? "   Enter WebUI Base URL (press Enter to keep current, 'd' for default): "
    : "   Enter WebUI Base URL (press Enter for default): ";

  for (;;) {
    const answer = await askOrCancel(deps.ask, label);
    let candidate: string;
    if (!answer) candidate = current || DEFAULT_BASE_URL;
    else if (answer.toLowerCase() === "d") candidate = DEFAULT_BASE_URL;
    else candidate = answer;

    const normalized = normalizeBaseUrl(candidate);
    if (urlSchema.safeParse(normalized).success) return normalized;
    writeLines(out, [chalk.red(`   Not a valid URL: ${candidate}`)]);
  }
}

async function askApiKey(deps: SetupDeps, current: string | undefined): Promise<string | undefined> {
  const { chalk, out } = deps;
  writeLines(out, [
    "",
    chalk.bold("2. API Key (Optional)"),
    chalk.dim("   Leave empty if the service does not require one"),
    ...(current ? [chalk.dim(`   Current: ${maskSecret(current)}`)] : []),
  ]);
  const answer = await askOrCancel(deps.ask, current ? "   Enter API Key (press Enter to keep current): " : "   Enter API Key: ");
  return answer || current || undefined;
}

async function askModel(deps: SetupDeps, baseUrl: string, apiKey: string | undefined, current: string): Promise<string> {
  const { chalk, out } = deps;
  writeLines(out, [
    "",
    chalk.bold("3. Default Model"),
    chalk.dim("   The model used when none is given"),
    chalk.dim(`   Current: ${current}`),
    chalk.dim("   Fetching available models..."),
  ]);

  const models = await deps.fetchModels(baseUrl, apiKey);
  if (!models.ok) {
    const reason = models.error.kind === "provider_error" ? `status ${models.error.statusCode}` : models.error.cause;
    writeLines(out, [chalk.yellow(`   Could not fetch models (${reason})`)]);
  } else if (models.value.length === 0) {
    writeLines(out, [chalk.yellow("   The service returned no models")]);
  } else if (deps.pickModel) {
    writeLines(out, [chalk.green(`   ${models.value.length} models available`)]);
    const picked = await deps.pickModel(modelIds(models.value), {
      initial: current,
      describe: modelDescriber(models.value),
    });
    if (picked.selection) return picked.selection;
    writeLines(out, [chalk.dim("   No model picked")]);
  }

  const answer = await askOrCancel(deps.ask, "   Enter default model name (press Enter to keep current): ");
  return answer || current;
}

export async function runSetup(deps: SetupDeps): Promise<SetupOutcome> {
  const { chalk, out, existing } = deps;
  const save = deps.save ?? saveConfig;

  writeLines(out, [
    chalk.bold.blue("WebUI CLI Configuration Setup"),
    chalk.dim(`Configuration file: ${deps.configFile}`),
    Object.keys(existing).length > 0
      ? chalk.green("✓ Existing configuration file found")
      : chalk.yellow("! Configuration file will be created"),
    "",
  ]);

  const values: ConfigValues = {};
  try {
    const baseUrl = await askBaseUrl(deps, existing[ENV_KEYS.baseUrl]);
    values[ENV_KEYS.baseUrl] = baseUrl;

    const apiKey = await askApiKey(deps, existing[ENV_KEYS.apiKey]);
    if (apiKey) values[ENV_KEYS.apiKey] = apiKey;

    values[ENV_KEYS.defaultModel] = await askModel(deps, baseUrl, apiKey, existing[ENV_KEYS.defaultModel] || DEFAULT_MODEL);
    values[ENV_KEYS.systemPromptFile] = existing[ENV_KEYS.systemPromptFile] || DEFAULT_SYSTEM_PROMPT_FILE;

    writeLines(out, [
      "",
      chalk.bold("Configuration Summary:"),
      `   WebUI Base URL: ${chalk.white(baseUrl)}`,
      `   API Key: ${apiKey ? chalk.white(maskSecret(apiKey)) : chalk.dim("(not set)")}`,
      `   Default Model: ${chalk.white(values[ENV_KEYS.defaultModel])}`,
      `   System Prompt File: ${chalk.dim(values[ENV_KEYS.systemPromptFile])}`,
      "",
    ]);

    const confirm = (await askOrCancel(deps.ask, "Save this configuration? [Y/n]: ")).toLowerCase();
    if (confirm !== "" && confirm !== "y" && confirm !== "yes") {
      writeLines(out, [chalk.yellow("Configuration cancelled")]);
      return { kind: "cancelled" };
    }
  } catch (error) {
    if (error instanceof SetupCancelled) {
      writeLines(out, ["", chalk.yellow("Configuration cancelled")]);
      return { kind: "cancelled" };
    }
    throw error;
  }

  try {
    save(values, deps.configFile);
  } catch (error) {
    const reason = errorMessage(error);
    writeLines(out, [chalk.red(`✗ Failed to save configuration: ${reason}`)]);
    return { kind: "failed", reason };
  }
  writeLines(out, [
    chalk.green(`✓ Configuration saved to ${deps.configFile}`),
    chalk.dim('You can now use: webui "Your prompt here"'),
  ]);
  return { kind: "saved", file: deps.configFile, values };
}
