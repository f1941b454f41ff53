export { RecentFolders, EXIT_OK, EXIT_STORE_UNAVAILABLE } from "./recent-folders.js";
export { BookmarkStore, parseDocument, serializeDocument } from "./bookmark-store.js";
export { extractFolders, parentDirFromUri, isTransient } from "./folder-extractor.js";
export {
  buildChoices,
  computeDialogSize,
  showPicker,
  confirmClear,
  HOME_CHOICE,
  CLEAR_MARKER,
} from "./picker.js";
export type { DialogSize } from "./picker.js";
export { openFolder, expandHome } from "./launcher.js";
export { createProcessRunner, runProcess, launchDetached } from "./process-runner.js";
export { getScreenSize, parseXrandr, FALLBACK_SCREEN } from "./screen.js";
export { detectDesktop } from "./desktop.js";
export { dataHome, storePath, legacyStorePath, resolveStorePath } from "./paths.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { createLogger, silentLogger, isLogLevel } from "./logger.js";
export {
  RecentFoldersError,
  StoreUnavailableError,
  PersistFailureError,
  DialogUnavailableError,
} from "./errors.js";
export { PROGRAM_NAME, VERSION } from "./version.js";
export type * from "./types.js";
