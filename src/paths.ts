import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

const STORE_FILE = "recently-used.xbel";

export function dataHome(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  const fromEnv = env.XDG_DATA_HOME;
  return fromEnv ? fromEnv : join(home, ".local", "share");
}

export function storePath(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  return join(dataHome(env, home), STORE_FILE);
}

/** Location used by GTK 2 before the store moved under the data home. */
export function legacyStorePath(home: string = homedir()): string {
  return join(home, `.${STORE_FILE}`);
}

/**
 * Pick the bookmark store to read. Falls back to the legacy dotfile only
 * when the current location does not exist and the legacy one does.
 */
export function resolveStorePath(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
  exists: (path: string) => boolean = existsSync
): string {
  const current = storePath(env, home);
  if (exists(current)) return current;

  const legacy = legacyStorePath(home);
  return exists(legacy) ? legacy : current;
}
