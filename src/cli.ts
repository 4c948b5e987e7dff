import { existsSync, readFileSync } from "fs";
import { fileURLToPath } from "url";
import chalk from "chalk";
import { Command } from "commander";
import { z } from "zod";
import { TIMEOUT_PARAM, WebUIClient } from "../llm/index.js";
import { errorMessage, terminalWidth } from "../utils.js";
import {
  parseParamArgs,
  runListModels,
  runPrompt,
  runSelectDefaultModel,
  type CommandContext,
  type CommandStatus,
  type PickModel,
} from "./commands.js";
import { ConfigError, loadConfig, readConfigFile, userConfigPath, type WebUIConfig } from "./config.js";
import { initLogger, type Logger } from "./logger.js";
import { endpointModelFetcher } from "./model/sources.js";
import { runModelPicker } from "./ui/model-picker.js";
import { createLineAsker } from "./ui/prompt-line.js";
import { writeLines } from "./ui/render.js";
import { runSetup } from "./ui/setup.js";
import { Spinner } from "./ui/spinner.js";

export const LOGGER_NAME = "webui";
export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_INTERRUPTED = 130;

const cliOptionsSchema = z.object({
  prompt: z.string().optional(),
  listModels: z.boolean().optional(),
  model: z.union([z.string(), z.literal(true)]).optional(),
  param: z.array(z.string()).default([]),
  timeout: z.string().optional(),
  verbose: z.number().int().nonnegative().default(0),
  logFile: z.string().optional(),
  config: z.string().optional(),
  setup: z.boolean().optional(),
  systemPrompt: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function readVersion(): string {
  const packageSchema = z.object({ version: z.string() });
  // Sources sit one level below package.json, the build output two.
  for (const candidate of ["../package.json", "../../package.json"]) {
    const file = fileURLToPath(new URL(candidate, import.meta.url));
    if (!existsSync(file)) continue;
    const parsed = packageSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
    if (parsed.success) return parsed.data.version;
  }
  return "unknown";
}

export function createProgram(version: string = readVersion()): Command {
  return new Command()
    .name("webui")
    .description("Send prompts to an OpenAI-compatible WebUI service from the terminal")
    .version(version, "-V, --version")
    .argument("[prompt...]", "prompt text; words are joined with spaces")
    .option("-p, --prompt <text>", "prompt text, instead of positional words")
    .option("-l, --list-models", "list the models the service offers")
    .option("-m, --model [id]", "model for this prompt; without a value opens the model picker")
    .option("-P, --param <key=value>", "extra request parameter (repeatable), e.g. temperature=0.2", collect, [])
    .option("-t, --timeout <seconds>", "request timeout in seconds")
    .option("-v, --verbose", "more log output (repeatable: -v warn, -vv info, -vvv debug)", increaseVerbosity, 0)
    .option("--log-file <path>", "also append log lines to this file")
    .option("--config <path>", "configuration file to use")
    .option("--setup", "run the interactive configuration wizard")
    .option("--system-prompt", "print the resolved system prompt and exit")
    .addHelpText(
      "after",
      `
Examples:
  webui "How do I list open ports?"
  webui -m "llama3:8b" -P temperature=0.2 explain this error
  webui -m                              # pick a default model
  cat error.log | webui what went wrong
  webui --list-models
  webui --setup`,
    );
}

export function parseCliOptions(program: Command): CliOptions {
  return cliOptionsSchema.parse(program.opts());
}

export function joinPrompt(stdinText: string | undefined, argsPrompt: string | undefined): string | undefined {
  if (stdinText && argsPrompt) return `${stdinText}\n${argsPrompt}`;
  return stdinText || argsPrompt;
}

async function readPipedStdin(): Promise<string | undefined> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  const text = Buffer.concat(chunks).toString("utf-8").trim();
  return text.length > 0 ? text : undefined;
}

const pickModel: PickModel = (ids, options) =>
  runModelPicker(ids, { initial: options.initial, describe: options.describe });

async function runSetupCommand(options: CliOptions, logger: Logger): Promise<number> {
  const configFile = options.config ?? userConfigPath();
  const asker = createLineAsker();
  try {
    const outcome = await runSetup({
      configFile,
      existing: readConfigFile(configFile),
      ask: asker.ask,
      fetchModels: endpointModelFetcher(logger),
      // Piped answers are read as typed model names; the picker needs a terminal.
      pickModel: process.stdin.isTTY
        ? (ids, opts) => {
            asker.release();
            return runModelPicker(ids, { ...opts, title: "Select the default model" });
          }
        : undefined,
      out: process.stderr,
      chalk,
    });
    logger.debug(`Setup finished: ${outcome.kind}`);
  } finally {
    asker.release();
  }
  return EXIT_OK;
}

/**
 * Runs one invocation and resolves with the exit code. Only configuration
 * problems and Ctrl+C change it from 0; every other outcome is reported as a
 * message.
 */
export async function runCli(argv: readonly string[] = process.argv): Promise<number> {
  const program = createProgram();
  program.parse([...argv]);
  const options = parseCliOptions(program);
  const logger = initLogger(LOGGER_NAME, { verbosity: options.verbose, logFile: options.logFile });
  logger.debug(`Arguments: ${JSON.stringify(options)}`);

  if (options.setup) return runSetupCommand(options, logger);

  let config: WebUIConfig;
  try {
    config = loadConfig({ logger, explicit: options.config });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    writeLines(process.stderr, [chalk.red(`Configuration error: ${error.message}`)]);
    return EXIT_CONFIG_ERROR;
  }

  if (options.systemPrompt) {
    writeLines(process.stdout, [config.systemPrompt]);
    return EXIT_OK;
  }

  const argsPrompt = options.prompt ?? (program.args.length > 0 ? program.args.join(" ") : undefined);
  // A bare --model with nothing else keeps stdin for the picker.
  const picksDefault = options.model === true && !argsPrompt && !options.listModels;
  const stdinFree = Boolean(process.stdin.isTTY) || picksDefault;
  const stdinText = stdinFree ? undefined : await readPipedStdin();
  const prompt = joinPrompt(stdinText, argsPrompt);

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const { params, errors } = parseParamArgs(options.param);
  for (const message of errors) logger.warn(message);
  if (options.timeout !== undefined) {
    const seconds = Number(options.timeout);
    params[TIMEOUT_PARAM] = Number.isFinite(seconds) ? seconds : options.timeout;
  }

  const ctx: CommandContext = {
    config,
    client: new WebUIClient(config, logger),
    logger,
    out: process.stdout,
    err: process.stderr,
    chalk,
    width: terminalWidth(process.stdout),
    spinner: new Spinner(process.stderr),
    // Piped stdin has already been read for the prompt.
    pickModel: stdinFree ? pickModel : undefined,
    signal: controller.signal,
  };

  let status: CommandStatus;
  try {
    if (options.listModels) {
      status = await runListModels(ctx);
    } else if (picksDefault) {
      status = await runSelectDefaultModel(ctx);
    } else if (prompt) {
      status = await runPrompt(ctx, { prompt, model: options.model, params });
    } else {
      if (typeof options.model === "string") {
        writeLines(process.stderr, [chalk.red("Error: A prompt is required when a model is given"), ""]);
      }
      program.outputHelp();
      status = "ok";
    }
  } catch (error) {
    logger.error(`Unexpected failure: ${errorMessage(error)}`);
    throw error;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }

  return status === "cancelled" && controller.signal.aborted ? EXIT_INTERRUPTED : EXIT_OK;
}
