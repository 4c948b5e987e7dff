const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const DIM_TEXT = "\x1B[2m";
const RESET_TEXT = "\x1B[0m";
const CLEAR_LINE = "\r\x1B[2K";

export interface SpinnerStream {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

export class Spinner {
  private timer: NodeJS.Timeout | undefined;
  private frame = 0;

  constructor(
    private readonly stream: SpinnerStream = process.stderr,
    private readonly intervalMs = 80,
  ) {}

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(label: string): void {
    if (this.timer || !this.stream.isTTY) return;
    const draw = () => {
      this.stream.write(`${CLEAR_LINE}${DIM_TEXT}${FRAMES[this.frame % FRAMES.length]} ${label}${RESET_TEXT}`);
      this.frame++;
    };
    draw();
    this.timer = setInterval(draw, this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.stream.write(CLEAR_LINE);
  }
}

// The spinner is stopped on every way out of `task`, throws included.
export async function withSpinner<T>(label: string, task: () => Promise<T>, spinner: Spinner = new Spinner()): Promise<T> {
  spinner.start(label);
  try {
    return await task();
  } finally {
    spinner.stop();
  }
}
