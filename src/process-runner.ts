import { spawn } from "node:child_process";
import type { Logger, ProcessResult, ProcessRunner } from "./types.js";

/**
 * Run a command and wait for it to exit. Failures are returned, not thrown.
 */
export function runProcess(
  command: string,
  args: string[]
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    let settled = false;

    const settle = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    child.stdout?.setEncoding("utf-8");
    child.stderr?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => settle({ kind: "spawn-error", error }));
    child.on("close", (code) => {
      if (code === 0) {
        settle({ kind: "ok", stdout });
      } else {
        // Killed by a signal counts as a failed exit
        settle({ kind: "exit", code: code ?? -1, stderr });
      }
    });
  });
}

/**
 * Start a command detached from this process and forget about it.
 */
export function launchDetached(
  command: string,
  args: string[],
  logger: Logger
): void {
  const child = spawn(command, args, { detached: true, stdio: "ignore" });
  child.on("error", (err) => {
    logger.error(`Could not run "${command}":`, String(err));
  });
  child.unref();
}

export function createProcessRunner(logger: Logger): ProcessRunner {
  return {
    run: runProcess,
    launch: (command, args) => launchDetached(command, args, logger),
  };
}
