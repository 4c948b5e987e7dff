import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import path from "path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { loadSystemPrompt } from "../prompt.js";
import type { Logger } from "./logger.js";

export const DEFAULT_MODEL = "Azion Copilot";
export const DEFAULT_SYSTEM_PROMPT_FILE = "config/system_prompt.txt";
export const DEFAULT_BASE_URL = "http://localhost:3000";

export const ENV_KEYS = {
  baseUrl: "WEBUI_BASE_URL",
  apiKey: "WEBUI_API_KEY",
  defaultModel: "DEFAULT_MODEL",
  systemPromptFile: "SYSTEM_PROMPT_FILE",
} as const;

const CONFIG_DIR_NAME = path.join(".config", "webui-cli");
const CONFIG_FILE_NAME = "config.env";
const FALLBACK_CONFIG_FILE_NAME = ".env";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface WebUIConfig {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly defaultModel: string;
  readonly systemPrompt: string;
  readonly systemPromptFile: string;
  readonly configFile?: string;
}

export type ConfigValues = Record<string, string>;
type Env = Record<string, string | undefined>;

export interface ConfigLocations {
  home?: string;
  cwd?: string;
  // --config on the command line; bypasses the lookup.
  explicit?: string;
}

export interface LoadConfigOptions extends ConfigLocations {
  logger: Logger;
  env?: Env;
  requireApiKey?: boolean;
  platformInfo?: string;
}

const baseUrlSchema = z.string().url();

export function userConfigPath(home: string = homedir()): string {
  return path.join(home, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function findConfigFile(locations: ConfigLocations = {}): string | undefined {
  if (locations.explicit) {
    const explicit = path.resolve(locations.cwd ?? process.cwd(), locations.explicit);
    if (!existsSync(explicit)) throw new ConfigError(`Configuration file not found: ${explicit}`);
    return explicit;
  }
  const userFile = userConfigPath(locations.home);
  if (existsSync(userFile)) return userFile;
  const localFile = path.join(locations.cwd ?? process.cwd(), FALLBACK_CONFIG_FILE_NAME);
  if (existsSync(localFile)) return localFile;
  return undefined;
}

export function readConfigFile(file: string): ConfigValues {
  if (!existsSync(file)) return {};
  return parseDotenv(readFileSync(file, "utf-8"));
}

// Same namespace as the environment: variables that are already set win.
export function applyToEnv(values: ConfigValues, env: Env): void {
  for (const [key, value] of Object.entries(values)) {
    if (env[key] === undefined) env[key] = value;
  }
}

function readSetting(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function normalizeBaseUrl(raw: string): string {
  return raw.trim().replace(/\/+$/, "");
}

export function loadConfig(options: LoadConfigOptions): WebUIConfig {
  const { logger } = options;
  const env = options.env ?? process.env;
  const configFile = findConfigFile(options);
  if (configFile) {
    logger.debug(`Loading configuration from ${configFile}`);
    applyToEnv(readConfigFile(configFile), env);
  } else {
    logger.debug("No configuration file found, reading environment only");
  }

  const rawBaseUrl = readSetting(env, ENV_KEYS.baseUrl);
  if (!rawBaseUrl) {
    throw new ConfigError(`${ENV_KEYS.baseUrl} is required. Run \`webui --setup\` or set it in the environment.`);
  }
  const baseUrl = normalizeBaseUrl(rawBaseUrl);
  if (!baseUrlSchema.safeParse(baseUrl).success) {
    throw new ConfigError(`${ENV_KEYS.baseUrl} must be an absolute URL, got "${rawBaseUrl}"`);
  }

  const apiKey = readSetting(env, ENV_KEYS.apiKey);
  if (options.requireApiKey && !apiKey) {
    throw new ConfigError(`${ENV_KEYS.apiKey} is required.`);
  }

  const systemPromptFile = readSetting(env, ENV_KEYS.systemPromptFile) ?? DEFAULT_SYSTEM_PROMPT_FILE;
  const systemPrompt = loadSystemPrompt(systemPromptFile, logger, { cwd: options.cwd, info: options.platformInfo });

  return Object.freeze({
    baseUrl,
    apiKey,
    defaultModel: readSetting(env, ENV_KEYS.defaultModel) ?? DEFAULT_MODEL,
    systemPrompt,
    systemPromptFile,
    configFile,
  });
}

export function modelsEndpoint(config: Pick<WebUIConfig, "baseUrl">): string {
  return `${config.baseUrl}/api/v1/models`;
}

export function generateEndpoint(config: Pick<WebUIConfig, "baseUrl">): string {
  return `${config.baseUrl}/api/chat/completions`;
}

export function requestHeaders(config: Pick<WebUIConfig, "apiKey">): Record<string, string> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (config.apiKey) headers.Authorization = `Bearer ${config.apiKey}`;
  return headers;
}

export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).map(([key, value]) => [key, key.toLowerCase() === "authorization" ? "***" : value]),
  );
}

function quoteIfNeeded(value: string): string {
  return /[\s#]/.test(value) ? `"${value}"` : value;
}

export function formatConfigFile(values: ConfigValues): string {
  const lines = ["# WebUI chat-completion service"];
  if (values[ENV_KEYS.baseUrl]) lines.push(`${ENV_KEYS.baseUrl}=${values[ENV_KEYS.baseUrl]}`);
  if (values[ENV_KEYS.apiKey]) lines.push(`${ENV_KEYS.apiKey}=${values[ENV_KEYS.apiKey]}`);
  lines.push("", "# Model used when --model is not given", "# Run `webui --list-models` to see what the service offers");
  if (values[ENV_KEYS.defaultModel]) lines.push(`${ENV_KEYS.defaultModel}=${quoteIfNeeded(values[ENV_KEYS.defaultModel])}`);
  lines.push(
    "",
    "# System prompt template, absolute or relative to the working directory",
    `${ENV_KEYS.systemPromptFile}=${quoteIfNeeded(values[ENV_KEYS.systemPromptFile] || DEFAULT_SYSTEM_PROMPT_FILE)}`,
    "",
  );
  return lines.join("\n");
}

export function saveConfig(values: ConfigValues, file: string = userConfigPath()): void {
  mkdirSync(path.dirname(file), { recursive: true });
  writeFileSync(file, formatConfigFile(values), "utf-8");
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Sets the given keys in an existing file and leaves every other line as it
 * was; keys the file lacks are appended. A missing file is written whole.
 */
export function updateConfigFile(values: ConfigValues, file: string = userConfigPath()): void {
  if (!existsSync(file)) {
    saveConfig(values, file);
    return;
  }
  const lines = readFileSync(file, "utf-8").split("\n");
  for (const [key, value] of Object.entries(values)) {
    const entry = `${key}=${quoteIfNeeded(value)}`;
    const pattern = new RegExp(`^\\s*(?:export\\s+)?${escapeRegExp(key)}\\s*=`);
    const index = lines.findIndex((line) => pattern.test(line));
    if (index >= 0) {
      lines[index] = entry;
    } else if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.splice(lines.length - 1, 0, entry);
    } else {
      lines.push(entry);
    }
  }
  writeFileSync(file, lines.join("\n"), "utf-8");
}
