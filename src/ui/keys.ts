import { EventEmitter } from "events";
import { createInterface, type Interface } from "readline";

export type ArrowDirection = "up" | "down" | "left" | "right";

export type Key =
  | { kind: "printable"; char: string }
  | { kind: "arrow"; direction: ArrowDirection }
  | { kind: "enter" }
  | { kind: "backspace" }
  | { kind: "escape" }
  | { kind: "interrupt" };

const ESC = "\u001b";
const CTRL_C = "\u0003";
const ARROWS: Record<string, ArrowDirection> = { A: "up", B: "down", C: "right", D: "left" };

/**
 * Decodes one raw-mode chunk into keys. A chunk can hold several keys (fast
 * typing, paste). A lone ESC is the escape key; ESC followed by `[` or `O`
 * starts a control sequence, of which only the arrows are kept.
 */
export function decodeKeys(chunk: string): Key[] {
  const chars = Array.from(chunk);
  const keys: Key[] = [];
  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (ch === ESC) {
      const next = chars[i + 1];
      if (next !== "[" && next !== "O") {
        keys.push({ kind: "escape" });
        i++;
        continue;
      }
      let j = i + 2;
      while (j < chars.length && /[0-9;]/.test(chars[j])) j++;
      const final = chars[j];
      if (final === undefined) break;
      const direction = ARROWS[final];
      if (direction) keys.push({ kind: "arrow", direction });
      i = j + 1;
      continue;
    }
    if (ch === CTRL_C) {
      keys.push({ kind: "interrupt" });
    } else if (ch === "\r" || ch === "\n") {
      keys.push({ kind: "enter" });
      if (ch === "\r" && chars[i + 1] === "\n") i++;
    } else if (ch === "\u007f" || ch === "\b") {
      keys.push({ kind: "backspace" });
    } else if ((ch.codePointAt(0) ?? 0) >= 0x20) {
      keys.push({ kind: "printable", char: ch });
    }
    i++;
  }
  return keys;
}

// Each line replaces the previous search, then confirms it.
export function lineToKeys(line: string, previousLength: number): Key[] {
  const keys: Key[] = [];
  for (let n = 0; n < previousLength; n++) keys.push({ kind: "backspace" });
  for (const char of line.trim()) {
    if ((char.codePointAt(0) ?? 0) >= 0x20) keys.push({ kind: "printable", char });
  }
  keys.push({ kind: "enter" });
  return keys;
}

export interface KeySource {
  // False for the line-buffered fallback.
  readonly interactive: boolean;
  readKeys(): Promise<Key[]>;
  close(): void;
}

export interface RawInput extends EventEmitter {
  isRaw?: boolean;
  setRawMode(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
}

abstract class QueuedKeySource implements KeySource {
  abstract readonly interactive: boolean;
  private readonly queue: Key[][] = [];
  private waiting: ((keys: Key[]) => void) | undefined;

  protected push(keys: Key[]): void {
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve(keys);
      return;
    }
    this.queue.push(keys);
  }

  readKeys(): Promise<Key[]> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  abstract close(): void;
}

export class TerminalKeySource extends QueuedKeySource {
  readonly interactive = true;
  private readonly wasRaw: boolean;
  private closed = false;

  constructor(private readonly input: RawInput) {
    super();
    this.wasRaw = Boolean(input.isRaw);
    if (!this.wasRaw) input.setRawMode(true);
    input.setEncoding("utf8");
    input.on("data", this.onData);
    input.on("end", this.onEnd);
    input.resume();
  }

  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    this.push(decodeKeys(text));
  };

  private readonly onEnd = (): void => {
    this.push([{ kind: "interrupt" }]);
  };

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.input.removeListener("data", this.onData);
    this.input.removeListener("end", this.onEnd);
    if (!this.wasRaw) this.input.setRawMode(false);
    this.input.pause();
  }
}

export class LineKeySource extends QueuedKeySource {
  readonly interactive = false;
  private readonly rl: Interface;
  private previousLength = 0;
  private closed = false;

  constructor(input: NodeJS.ReadableStream) {
    super();
    this.rl = createInterface({ input, terminal: false });
    this.rl.on("line", (line) => {
      this.push(lineToKeys(line, this.previousLength));
      this.previousLength = Array.from(line.trim()).length;
    });
    this.rl.on("close", () => {
      this.closed = true;
      this.push([{ kind: "interrupt" }]);
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

type StdinLike = NodeJS.ReadableStream & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };

function isRawCapable(input: StdinLike): input is StdinLike & RawInput {
  return Boolean(input.isTTY) && typeof input.setRawMode === "function";
}

// Picked once, before the selector starts.
export function createKeySource(input: StdinLike = process.stdin): KeySource {
  return isRawCapable(input) ? new TerminalKeySource(input) : new LineKeySource(input);
}
