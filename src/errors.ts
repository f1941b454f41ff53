export class RecentFoldersError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The bookmark store is missing, unreadable or not a well-formed XBEL file.
 */
export class StoreUnavailableError extends RecentFoldersError {
  readonly storePath: string;

  constructor(storePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Bookmark store "${storePath}" is unavailable: ${reason}`, options);
    this.storePath = storePath;
  }
}

/** Writing the cleared store back to disk failed. */
export class PersistFailureError extends RecentFoldersError {
  readonly storePath: string;

  constructor(storePath: string, options?: { cause?: unknown }) {
    super(`Could not write bookmark store "${storePath}"`, options);
    this.storePath = storePath;
  }
}

/** A dialog program could not be started at all. */
export class DialogUnavailableError extends RecentFoldersError {
  constructor(command: string, options?: { cause?: unknown }) {
    super(`Could not run "${command}"; is it installed?`, options);
  }
}
