import { existsSync } from "node:fs";
import type { BookmarkDocument, ExtractResult } from "./types.js";

const FILE_SCHEME = "file://";
const TEMP_ROOT = "/tmp/";
const CACHE_SEGMENT = "/.cache/";

const ESCAPE_RUN = /(%[0-9A-Fa-f]{2})+/g;

/**
 * Decode each run of %XX escapes on its own, so a stray "%" or an invalid
 * UTF-8 sequence stays literal without blocking the rest of the path.
 */
function percentDecode(value: string): string {
  return value.replace(ESCAPE_RUN, (run) => {
    try {
      return decodeURIComponent(run);
    } catch {
      return run;
    }
  });
}

/**
 * Decode the parent directory of a file URI, keeping the trailing slash.
 * e.g. "file:///home/u/My%20Folder/notes.txt" → "/home/u/My Folder/"
 */
export function parentDirFromUri(uri: string): string {
  const withoutScheme = uri.startsWith(FILE_SCHEME)
    ? uri.slice(FILE_SCHEME.length)
    : uri;
  const parent = withoutScheme.slice(0, withoutScheme.lastIndexOf("/") + 1);
  return percentDecode(parent);
}

/**
 * Temp root is an exact match; cache directories match anywhere in the path.
 */
export function isTransient(path: string): boolean {
  return path === TEMP_ROOT || path.includes(CACHE_SEGMENT);
}

/**
 * Turn the store's bookmarks into the list of folders to offer,
 * most recently used first.
 */
export function extractFolders(
  doc: BookmarkDocument,
  opts?: { exists?: (path: string) => boolean }
): ExtractResult {
  const exists = opts?.exists ?? existsSync;
  let maxLength = 0;
  const kept: string[] = [];

  for (const entry of doc.entries) {
    const dir = parentDirFromUri(entry.href);
    maxLength = Math.max(maxLength, dir.length);

    if (isTransient(dir)) continue;
    if (!exists(dir)) continue;
    kept.push(dir);
  }

  // The store appends, so the newest bookmark is last
  const folders = [...new Set(kept.reverse())];
  return { folders, maxLength };
}
