import { createInterface, type Interface } from "readline";

export interface LineIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export type AskLine = (label: string) => Promise<string | undefined>;

export interface LineAsker {
  ask: AskLine;
  // Releases the input; the next question opens it again.
  release(): void;
}

/**
 * Asks questions over one readline interface, so answers piped in ahead of
 * time are handed out in order. Resolves with undefined once input ends or
 * Ctrl+C is pressed.
 */
export function createLineAsker(io: LineIO = { input: process.stdin, output: process.stderr }): LineAsker {
  let rl: Interface | undefined;
  let ended = false;
  const buffered: string[] = [];
  const waiting: Array<(line: string | undefined) => void> = [];

  function open(): void {
    const opened = createInterface({ input: io.input, terminal: false });
    opened.on("line", (line) => {
      const next = waiting.shift();
      if (next) next(line);
      else buffered.push(line);
    });
    opened.on("SIGINT", () => {
      ended = true;
      opened.close();
    });
    opened.on("close", () => {
      if (rl === opened) {
        rl = undefined;
        ended = true;
      }
      for (const next of waiting.splice(0)) next(undefined);
    });
    rl = opened;
  }

  return {
    ask(label) {
      io.output.write(label);
      const line = buffered.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (ended) return Promise.resolve(undefined);
      if (!rl) open();
      return new Promise((resolve) => waiting.push(resolve));
    },
    release() {
      const current = rl;
      rl = undefined;
      current?.close();
    },
  };
}
