import { isLogLevel } from "./logger.js";
import type { LogLevel } from "./types.js";

export interface Config {
  /** Unset means the logger's default level. */
  logLevel?: LogLevel;
  /** Explicit store path, overriding the XDG lookup. */
  storePath?: string;
}

// "silent" is capped at "error": the fatal store message always prints
function readLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.trim().toLowerCase();
  if (!level || !isLogLevel(level)) return undefined;
  return level === "silent" ? "error" : level;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const store = env.RECENT_FOLDERS_STORE?.trim();

  return {
    logLevel: readLogLevel(env.RECENT_FOLDERS_LOG_LEVEL),
    storePath: store ? store : undefined,
  };
}
