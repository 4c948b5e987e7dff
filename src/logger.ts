import { appendFileSync } from "fs";
import { inspect } from "util";
import { createConsola, LogLevels, type ConsolaInstance, type ConsolaReporter, type LogObject } from "consola";

export type Logger = ConsolaInstance;

export interface LoggerOptions {
  // -v count from the command line: 0 error, 1 warn, 2 info, 3+ debug.
  verbosity?: number;
  logFile?: string;
  reporters?: ConsolaReporter[];
}

const loggers = new Map<string, Logger>();

export function levelForVerbosity(verbosity: number): number {
  if (verbosity >= 3) return LogLevels.debug;
  if (verbosity === 2) return LogLevels.info;
  if (verbosity === 1) return LogLevels.warn;
  return LogLevels.error;
}

function formatArgs(args: unknown[]): string {
  return args.map((arg) => (typeof arg === "string" ? arg : inspect(arg, { depth: 4 }))).join(" ");
}

export function formatLogLine(logObj: LogObject): string {
  const tag = logObj.tag ? ` [${logObj.tag}]` : "";
  return `${logObj.date.toISOString()} - ${logObj.type.toUpperCase()}${tag} - ${formatArgs(logObj.args)}`;
}

export function fileReporter(path: string): ConsolaReporter {
  return {
    log(logObj) {
      appendFileSync(path, `${formatLogLine(logObj)}\n`, "utf-8");
    },
  };
}

/**
 * Returns the logger registered under `identity`, creating it on first use.
 * Later calls with the same identity get the existing handle back untouched,
 * so sinks are never attached twice.
 */
export function initLogger(identity: string, options: LoggerOptions = {}): Logger {
  const existing = loggers.get(identity);
  if (existing) return existing;

  const base = createConsola({
    level: levelForVerbosity(options.verbosity ?? 0),
    // stdout stays reserved for answers and tables.
    stdout: process.stderr,
    stderr: process.stderr,
    ...(options.reporters ? { reporters: options.reporters } : {}),
  });
  if (options.logFile) {
    base.addReporter(fileReporter(options.logFile));
  }

  const logger = base.withTag(identity);
  loggers.set(identity, logger);
  return logger;
}

export function hasLogger(identity: string): boolean {
  return loggers.has(identity);
}
