import { describe, expect, it } from "vitest";
import { createProgram, joinPrompt, parseCliOptions, readVersion } from "../../src/cli.js";

function parse(...args: string[]) {
  const program = createProgram("1.2.3").exitOverride();
  program.parse(["node", "webui", ...args]);
  return { program, options: parseCliOptions(program) };
}

describe("createProgram", () => {
  it("joins positional words into the prompt", () => {
    const { program, options } = parse("how", "do", "I", "list", "ports");

    expect(program.args).toEqual(["how", "do", "I", "list", "ports"]);
    expect(options).toEqual({ param: [], verbose: 0 });
  });

  it("reads a bare --model as a request for the picker", () => {
    const { program, options } = parse("-m", "-P", "temperature=0.2", "-P", "stop=END", "-vv", "hello");

    expect(options.model).toBe(true);
    expect(options.param).toEqual(["temperature=0.2", "stop=END"]);
    expect(options.verbose).toBe(2);
    expect(program.args).toEqual(["hello"]);
  });

  it("takes a model id and the remaining flags", () => {
    const { options } = parse(
      "--model",
      "llama3",
      "-t",
      "45",
      "--log-file",
      "webui.log",
      "--config",
      "custom.env",
      "--list-models",
      "--system-prompt",
      "--setup",
      "-p",
      "hi",
    );

    expect(options).toEqual({
      model: "llama3",
      timeout: "45",
      logFile: "webui.log",
      config: "custom.env",
      listModels: true,
      systemPrompt: true,
      setup: true,
      prompt: "hi",
      param: [],
      verbose: 0,
    });
  });
});

describe("joinPrompt", () => {
  it("puts piped input before the arguments", () => {
    expect(joinPrompt("log line", "what failed?")).toBe("log line\nwhat failed?");
    expect(joinPrompt(undefined, "hi")).toBe("hi");
    expect(joinPrompt("piped", undefined)).toBe("piped");
    expect(joinPrompt(undefined, undefined)).toBeUndefined();
  });
});

describe("readVersion", () => {
  it("reads the package version", () => {
    expect(readVersion()).toBe("0.1.0");
  });
});
