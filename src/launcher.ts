import { homedir } from "node:os";
import { join } from "node:path";
import type { ProcessRunner } from "./types.js";

const OPENER = "xdg-open";

/**
 * Replace a leading "~" with the home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/**
 * Hand the folder to the desktop's default file manager. Does not wait.
 */
export function openFolder(
  path: string,
  runner: ProcessRunner,
  home: string = homedir()
): string {
  const target = expandHome(path, home);
  runner.launch(OPENER, [target]);
  return target;
}
