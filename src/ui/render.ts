import type { ChalkInstance } from "chalk";
import type { ModelInfo } from "../../llm/index.js";

export const MAX_WRAP_WIDTH = 120;
export const MAX_RULE_WIDTH = 80;
const CODE_FENCE = "```";

export interface Output {
  write(text: string): unknown;
}

export interface RenderOptions {
  width: number;
  chalk: ChalkInstance;
}

export interface ResponseMetadata {
  model?: string;
  tokenCount?: number;
  elapsedSeconds?: number;
  timestamp?: Date;
}

export function writeLines(out: Output, lines: readonly string[]): void {
  out.write(`${lines.join("\n")}\n`);
}

export function wrapWidth(width: number): number {
  return Math.max(1, Math.min(width - 4, MAX_WRAP_WIDTH));
}

export function ruleLine(width: number): string {
  return "─".repeat(Math.max(1, Math.min(width, MAX_RULE_WIDTH)));
}

/**
 * Greedy word wrap. Runs of whitespace collapse to one space and words
 * longer than the width are split. Widths count code points, so a split
 * never lands inside a surrogate pair.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";
  let currentLength = 0;
  for (const word of text.trim().split(/\s+/)) {
    if (!word) continue;
    const chars = Array.from(word);
    if (chars.length > width) {
      if (current) lines.push(current);
      let start = 0;
      while (chars.length - start > width) {
        lines.push(chars.slice(start, start + width).join(""));
        start += width;
      }
      current = chars.slice(start).join("");
      currentLength = chars.length - start;
      continue;
    }
    if (!current) {
      current = word;
      currentLength = chars.length;
    } else if (currentLength + 1 + chars.length <= width) {
      current += ` ${word}`;
      currentLength += 1 + chars.length;
    } else {
      lines.push(current);
      current = word;
      currentLength = chars.length;
    }
  }
  if (current) lines.push(current);
  return lines;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatMetadata(meta: ResponseMetadata): string {
  const fields: string[] = [];
  if (meta.tokenCount !== undefined) fields.push(`${meta.tokenCount.toLocaleString("en-US")} tokens`);
  if (meta.elapsedSeconds !== undefined) fields.push(`${meta.elapsedSeconds.toFixed(2)}s`);
  fields.push(formatClock(meta.timestamp ?? new Date()));
  const head = meta.model ? `[${meta.model}] ` : "";
  return `${head}${fields.join(" | ")}`;
}

export function renderResponse(content: string, meta: ResponseMetadata, opts: RenderOptions): string[] {
  const { chalk } = opts;
  const limit = wrapWidth(opts.width);
  const rule = chalk.cyan(ruleLine(opts.width));
  const lines = [chalk.dim(formatMetadata(meta)), rule];
  let inCodeBlock = false;

  for (const line of content.split(/\r?\n/)) {
    if (line.trim().startsWith(CODE_FENCE)) {
      inCodeBlock = !inCodeBlock;
      if (inCodeBlock) {
        lines.push(`${chalk.white("Command:")} ${chalk.dim("(triple click to select, then copy)")}`, "");
      } else {
        lines.push("");
      }
      continue;
    }

    if (inCodeBlock) {
      // Verbatim so commands can be copied exactly.
      lines.push(line.trim() ? chalk.yellowBright(line) : "");
      continue;
    }

    if (!line.trim()) continue;
    const wrapped = line.length > limit ? wrapText(line, limit) : [line];
    for (const part of wrapped) lines.push(chalk.white(part));
  }

  lines.push(rule);
  return lines;
}

export function renderModelList(models: readonly ModelInfo[], opts: RenderOptions): string[] {
  const { chalk } = opts;
  if (models.length === 0) return [chalk.yellow("No models found in response")];

  const rule = chalk.cyan(ruleLine(opts.width));
  const rows = models.map((m) =>
    m.displayName !== m.id ? `${chalk.white(m.id)} ${chalk.dim(`(${m.displayName})`)}` : chalk.white(m.id),
  );
  return [
    chalk.cyan(`Available Models (${models.length} total):`),
    rule,
    ...rows,
    rule,
    chalk.dim('Usage: webui -m "<Model ID>" "Your prompt"'),
  ];
}
