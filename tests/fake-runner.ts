import type { ProcessResult, ProcessRunner } from "../src/types.js";

export interface Call {
  command: string;
  args: string[];
}

/**
 * In-process stand-in for zenity, xrandr and xdg-open. `run` answers from
 * the queued results in order and fails the test when the queue runs dry.
 */
export class FakeRunner implements ProcessRunner {
  readonly runs: Call[] = [];
  readonly launches: Call[] = [];
  private queue: ProcessResult[];

  constructor(results: ProcessResult[] = []) {
    this.queue = [...results];
  }

  async run(command: string, args: string[]): Promise<ProcessResult> {
    this.runs.push({ command, args });
    const next = this.queue.shift();
    if (!next) {
      throw new Error(`Unexpected call: ${command} ${args.join(" ")}`);
    }
    return next;
  }

  launch(command: string, args: string[]): void {
    this.launches.push({ command, args });
  }
}

export const ok = (stdout: string): ProcessResult => ({ kind: "ok", stdout });
export const exit = (code = 1): ProcessResult => ({
  kind: "exit",
  code,
  stderr: "",
});
export const spawnError = (): ProcessResult => ({
  kind: "spawn-error",
  error: new Error("spawn zenity ENOENT"),
});

export const XRANDR_1080P =
  "Screen 0: minimum 320 x 200, current 1920 x 1080, maximum 16384 x 16384\n";
