import { createConsola, LogLevels, type LogObject } from "consola";
import type { Logger } from "../src/logger.js";

export interface CapturedLogger {
  logger: Logger;
  records: LogObject[];
  messages(type?: string): string[];
}

export function captureLogger(level: number = LogLevels.debug): CapturedLogger {
  const records: LogObject[] = [];
  const logger = createConsola({
    level,
    reporters: [{ log: (logObj) => void records.push(logObj) }],
  });
  return {
    logger,
    records,
    messages: (type) =>
      records.filter((r) => type === undefined || r.type === type).map((r) => r.args.map(String).join(" ")),
  };
}

export function memoryOutput(): { write(text: string): boolean; text(): string; lines(): string[] } {
  let buffer = "";
  return {
    write(text) {
      buffer += text;
      return true;
    },
    text: () => buffer,
    lines: () => buffer.split("\n").slice(0, -1),
  };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
