import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { BookmarkStore } from "./bookmark-store.js";
import { loadConfig } from "./config.js";
import { detectDesktop } from "./desktop.js";
import { StoreUnavailableError } from "./errors.js";
import { extractFolders } from "./folder-extractor.js";
import { openFolder } from "./launcher.js";
import { createLogger } from "./logger.js";
import { resolveStorePath } from "./paths.js";
import {
  buildChoices,
  computeDialogSize,
  confirmClear,
  showPicker,
} from "./picker.js";
import { createProcessRunner } from "./process-runner.js";
import { getScreenSize } from "./screen.js";
import type {
  BookmarkDocument,
  Logger,
  ProcessRunner,
  RecentFoldersOptions,
} from "./types.js";

export const EXIT_OK = 0;
export const EXIT_STORE_UNAVAILABLE = 1;

/**
 * Runs the pick-a-folder loop: load the store, offer its folders,
 * then either open the choice or clear the store and offer again.
 */
export class RecentFolders {
  readonly store: BookmarkStore;
  readonly log: Logger;
  private runner: ProcessRunner;
  private home: string;
  private exists: (path: string) => boolean;

  constructor(opts: RecentFoldersOptions = {}) {
    const env = opts.env ?? process.env;
    const config = loadConfig(env);

    this.log = opts.logger ?? createLogger(opts.logLevel ?? config.logLevel);
    this.runner = opts.runner ?? createProcessRunner(this.log);
    this.home = opts.home ?? homedir();
    this.exists = opts.exists ?? existsSync;

    const path =
      opts.storePath ?? config.storePath ?? resolveStorePath(env, this.home);
    this.store = new BookmarkStore(path, this.log);

    this.log.debug(`Desktop: ${detectDesktop(env)}, store: ${path}`);
  }

  /**
   * Resolves to the process exit code.
   */
  async run(): Promise<number> {
    let doc: BookmarkDocument;
    try {
      doc = await this.store.load();
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.log.error(err.message);
        return EXIT_STORE_UNAVAILABLE;
      }
      throw err;
    }

    const screen = await getScreenSize(this.runner, this.log);

    for (;;) {
      const { folders, maxLength } = extractFolders(doc, {
        exists: this.exists,
      });
      this.log.debug(`Offering ${folders.length} folders`);

      const outcome = await showPicker(
        this.runner,
        buildChoices(folders),
        computeDialogSize(screen, maxLength)
      );

      switch (outcome.kind) {
        case "dismissed":
          this.log.debug("Picker dismissed");
          return EXIT_OK;
        case "selected": {
          const target = openFolder(outcome.path, this.runner, this.home);
          this.log.info(`Opening ${target}`);
          return EXIT_OK;
        }
        case "clear":
          if (await confirmClear(this.runner)) {
            await this.store.clear(doc);
          } else {
            this.log.debug("Clearing aborted");
          }
          break;
      }
    }
  }
}
