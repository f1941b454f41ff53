export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

// ─── Bookmark store ──────────────────────────────────────────────────────────

/** Parsed XML element as produced by fast-xml-parser (attributes under "@_"). */
export type XmlElement = Record<string, unknown>;

export interface BookmarkEntry {
  href: string;
  added?: string;
  modified?: string;
  visited?: string;
}

export interface BookmarkDocument {
  /** File the document was loaded from and is written back to. */
  path: string;
  /** The <xbel> root element, including any non-bookmark children. */
  root: XmlElement;
  entries: BookmarkEntry[];
}

export interface ExtractResult {
  /** Most recently used first, unique. */
  folders: string[];
  /** Longest decoded path seen, counting entries that were filtered out. */
  maxLength: number;
}

// ─── External processes ──────────────────────────────────────────────────────

export type ProcessResult =
  | { kind: "ok"; stdout: string }
  | { kind: "exit"; code: number; stderr: string }
  | { kind: "spawn-error"; error: Error };

export interface ProcessRunner {
  /** Run a command to completion and capture its output. */
  run(command: string, args: string[]): Promise<ProcessResult>;
  /** Start a command and return without waiting for it. */
  launch(command: string, args: string[]): void;
}

// ─── Picker ──────────────────────────────────────────────────────────────────

export interface ScreenSize {
  width: number;
  height: number;
}

export type PickerOutcome =
  | { kind: "selected"; path: string }
  | { kind: "clear" }
  | { kind: "dismissed" };

export type Desktop =
  | "gnome"
  | "kde"
  | "xfce"
  | "mate"
  | "cinnamon"
  | "lxde"
  | "unknown";

export interface RecentFoldersOptions {
  /** Bookmark store to read; resolved from the environment when omitted. */
  storePath?: string;
  /** Log level (default: "warn"). Ignored when `logger` is given. */
  logLevel?: LogLevel;
  logger?: Logger;
  runner?: ProcessRunner;
  /** Home directory (default: os.homedir()). */
  home?: string;
  env?: NodeJS.ProcessEnv;
  /** Existence check applied to extracted folders (default: fs.existsSync). */
  exists?: (path: string) => boolean;
}
