import { readFileSync } from "fs";
import { release, type, version } from "os";
import path from "path";
import type { Logger } from "./src/logger.js";
import { errorMessage } from "./utils.js";

export const PLATFORM_PLACEHOLDER = "{platform_info}";
export const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant that provides accurate and useful responses.";

export function platformInfo(): string {
  return `${type()}, ${release()}, ${version()}`;
}

export function buildPrompt(template: string, info: string = platformInfo()): string {
  return template.split(PLATFORM_PLACEHOLDER).join(info).trim();
}

export function resolvePromptPath(file: string, cwd: string = process.cwd()): string {
  return path.isAbsolute(file) ? file : path.resolve(cwd, file);
}

/**
 * Reads the system prompt template and fills in the platform description.
 * An unreadable or empty file falls back to DEFAULT_SYSTEM_PROMPT.
 */
export function loadSystemPrompt(
  file: string,
  logger: Logger,
  opts: { cwd?: string; info?: string } = {},
): string {
  const resolved = resolvePromptPath(file, opts.cwd);
  let template: string;
  try {
    template = readFileSync(resolved, "utf-8");
  } catch (error) {
    logger.warn(`Could not load system prompt file ${resolved}: ${errorMessage(error)}. Using the built-in prompt.`);
    return DEFAULT_SYSTEM_PROMPT;
  }

  const prompt = buildPrompt(template, opts.info);
  if (!prompt) {
    logger.warn(`System prompt file ${resolved} is empty. Using the built-in prompt.`);
    return DEFAULT_SYSTEM_PROMPT;
  }
  logger.debug(`Loaded system prompt from ${resolved}`);
  return prompt;
}
