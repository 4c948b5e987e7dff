import { EventEmitter } from "events";
import { PassThrough } from "stream";
import { describe, expect, it } from "vitest";
import {
  createKeySource,
  decodeKeys,
  LineKeySource,
  lineToKeys,
  TerminalKeySource,
  type Key,
  type RawInput,
} from "../../src/ui/keys.js";

const up: Key = { kind: "arrow", direction: "up" };
const down: Key = { kind: "arrow", direction: "down" };
const enter: Key = { kind: "enter" };
const backspace: Key = { kind: "backspace" };
const char = (c: string): Key => ({ kind: "printable", char: c });

class FakeTerminal extends EventEmitter implements RawInput {
  isRaw = false;
  modes: boolean[] = [];
  paused = false;

  setRawMode(mode: boolean): this {
    this.modes.push(mode);
    this.isRaw = mode;
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }

  setEncoding(): this {
    return this;
  }
}

describe("decodeKeys", () => {
  it("decodes printable characters, including several per chunk", () => {
    expect(decodeKeys("aé")).toEqual([char("a"), char("é")]);
  });

  it("decodes arrows in CSI and SS3 form", () => {
    expect(decodeKeys("\u001b[A\u001b[B\u001bOC\u001b[1;5D")).toEqual([
      up,
      down,
      { kind: "arrow", direction: "right" },
      { kind: "arrow", direction: "left" },
    ]);
  });

  it("treats a lone ESC as the escape key", () => {
    expect(decodeKeys("\u001b")).toEqual([{ kind: "escape" }]);
    expect(decodeKeys("\u001bx")).toEqual([{ kind: "escape" }, char("x")]);
  });

  it("drops other and incomplete control sequences", () => {
    expect(decodeKeys("\u001b[5~")).toEqual([]);
    expect(decodeKeys("\u001b[")).toEqual([]);
    expect(decodeKeys("\u0001")).toEqual([]);
  });

  it("decodes enter, backspace and interrupt", () => {
    expect(decodeKeys("\r\n")).toEqual([enter]);
    expect(decodeKeys("\n")).toEqual([enter]);
    expect(decodeKeys("\u007f\b")).toEqual([backspace, backspace]);
    expect(decodeKeys("\u0003")).toEqual([{ kind: "interrupt" }]);
  });
});

describe("lineToKeys", () => {
  it("erases the previous search, types the line and confirms", () => {
    expect(lineToKeys(" ab ", 2)).toEqual([backspace, backspace, char("a"), char("b"), enter]);
  });
});

describe("TerminalKeySource", () => {
  it("switches to raw mode and restores it once on close", () => {
    const input = new FakeTerminal();
    const source = new TerminalKeySource(input);

    expect(source.interactive).toBe(true);
    expect(input.modes).toEqual([true]);

    source.close();
    source.close();

    expect(input.modes).toEqual([true, false]);
    expect(input.paused).toBe(true);
    expect(input.listenerCount("data")).toBe(0);
  });

  it("leaves a terminal that was already raw in raw mode", () => {
    const input = new FakeTerminal();
    input.isRaw = true;
    new TerminalKeySource(input).close();

    expect(input.modes).toEqual([]);
  });

  it("delivers keys to a pending read and queues later chunks", async () => {
    const input = new FakeTerminal();
    const source = new TerminalKeySource(input);

    const pending = source.readKeys();
    input.emit("data", "x");
    await expect(pending).resolves.toEqual([char("x")]);

    input.emit("data", "\u001b[B\r");
    input.emit("data", Buffer.from("y"));
    await expect(source.readKeys()).resolves.toEqual([down, enter]);
    await expect(source.readKeys()).resolves.toEqual([char("y")]);
    source.close();
  });

  it("turns end of input into an interrupt", async () => {
    const input = new FakeTerminal();
    const source = new TerminalKeySource(input);

    input.emit("end");
    await expect(source.readKeys()).resolves.toEqual([{ kind: "interrupt" }]);
    source.close();
  });
});

describe("LineKeySource", () => {
  it("turns each line into a replacement search", async () => {
    const input = new PassThrough();
    const source = new LineKeySource(input);

    input.write("al\n");
    await expect(source.readKeys()).resolves.toEqual([char("a"), char("l"), enter]);

    input.write("be\n");
    await expect(source.readKeys()).resolves.toEqual([backspace, backspace, char("b"), char("e"), enter]);

    input.end();
    await expect(source.readKeys()).resolves.toEqual([{ kind: "interrupt" }]);
    source.close();
  });
});

describe("createKeySource", () => {
  it("falls back to lines when the input is not a terminal", () => {
    const source = createKeySource(new PassThrough());

    expect(source).toBeInstanceOf(LineKeySource);
    expect(source.interactive).toBe(false);
    source.close();
  });

  it("uses raw mode on a terminal", () => {
    const modes: boolean[] = [];
    const tty = Object.assign(new PassThrough(), {
      isTTY: true,
      isRaw: false,
      setRawMode(mode: boolean) {
        modes.push(mode);
      },
    });

    const source = createKeySource(tty);
    source.close();

    expect(source).toBeInstanceOf(TerminalKeySource);
    expect(modes).toEqual([true, false]);
  });
});
