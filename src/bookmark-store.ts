import { readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { lock } from "proper-lockfile";
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { PersistFailureError, StoreUnavailableError } from "./errors.js";
import type {
  BookmarkDocument,
  BookmarkEntry,
  Logger,
  XmlElement,
} from "./types.js";

const LOCK_OPTIONS = {
  retries: { retries: 5, minTimeout: 50, maxTimeout: 500 },
  stale: 10_000,
};

const ROOT = "xbel";
const BOOKMARK = "bookmark";
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const TEXT = "#text";

// Text is kept verbatim so elements other than bookmarks survive a rewrite
const XML_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: TEXT,
  parseTagValue: false,
  trimValues: false,
};

const parser = new XMLParser({
  ...XML_OPTIONS,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseAttributeValue: false,
  isArray: (_name: string, jpath: string) => jpath === `${ROOT}.${BOOKMARK}`,
});

const builder = new XMLBuilder({
  ...XML_OPTIONS,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: false,
});

function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Remove the indentation between child elements; the builder re-indents.
 * Text of leaf elements is left alone.
 */
function dropLayoutText(value: unknown): void {
  if (Array.isArray(value)) {
    for (const item of value) dropLayoutText(item);
    return;
  }
  if (!isElement(value)) return;

  const children = Object.keys(value).filter(
    (key) => !key.startsWith("@_") && key !== TEXT
  );
  const text = value[TEXT];
  if (children.length > 0 && typeof text === "string" && text.trim() === "") {
    delete value[TEXT];
  }
  for (const key of children) dropLayoutText(value[key]);
}

function attr(el: XmlElement, name: string): string | undefined {
  const value = el[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function toEntries(root: XmlElement, logger: Logger): BookmarkEntry[] {
  const raw = root[BOOKMARK];
  if (!Array.isArray(raw)) return [];

  const entries: BookmarkEntry[] = [];
  for (const item of raw) {
    const href = isElement(item) ? attr(item, "href") : undefined;
    if (!isElement(item) || href === undefined) {
      logger.debug("Skipping bookmark without href");
      continue;
    }
    entries.push({
      href,
      added: attr(item, "added"),
      modified: attr(item, "modified"),
      visited: attr(item, "visited"),
    });
  }
  return entries;
}

/**
 * Parse the text of an XBEL file. `path` is only used in error messages
 * and recorded on the returned document.
 */
export function parseDocument(
  path: string,
  xml: string,
  logger: Logger
): BookmarkDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    const { msg, line } = valid.err;
    throw new StoreUnavailableError(path, `malformed XML at line ${line}: ${msg}`);
  }

  const parsed: unknown = parser.parse(xml);
  if (!isElement(parsed) || !(ROOT in parsed)) {
    throw new StoreUnavailableError(path, `missing <${ROOT}> root element`);
  }

  // An empty <xbel></xbel> without attributes parses to ""
  const rootValue = parsed[ROOT];
  const root: XmlElement = isElement(rootValue) ? rootValue : {};
  dropLayoutText(root);

  return { path, root, entries: toEntries(root, logger) };
}

/**
 * Render a document as an XBEL file: XML declaration, indented body.
 */
export function serializeDocument(doc: BookmarkDocument): string {
  const body = builder.build({ [ROOT]: doc.root });
  return `${XML_DECLARATION}\n${String(body).trim()}\n`;
}

export class BookmarkStore {
  readonly path: string;
  private log: Logger;

  constructor(path: string, logger: Logger) {
    this.path = path;
    this.log = logger;
  }

  /**
   * Check if the store file exists on disk.
   */
  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Read and parse the store.
   */
  async load(): Promise<BookmarkDocument> {
    if (!this.exists()) {
      throw new StoreUnavailableError(this.path, "file not found");
    }

    let xml: string;
    try {
      xml = await readFile(this.path, "utf-8");
    } catch (err) {
      throw new StoreUnavailableError(this.path, "file could not be read", {
        cause: err,
      });
    }

    const doc = parseDocument(this.path, xml, this.log);
    this.log.debug(`Loaded ${doc.entries.length} bookmarks from ${this.path}`);
    return doc;
  }

  /**
   * Remove every bookmark from the document and write it back to its file.
   */
  async clear(doc: BookmarkDocument): Promise<void> {
    delete doc.root[BOOKMARK];
    doc.entries.length = 0;

    let release: (() => Promise<void>) | undefined;
    try {
      release = await lock(doc.path, LOCK_OPTIONS);
      await writeFile(doc.path, serializeDocument(doc), "utf-8");
      this.log.info(`Cleared recent folders in ${doc.path}`);
    } catch (err) {
      throw new PersistFailureError(doc.path, { cause: err });
    } finally {
      if (release) await release();
    }
  }
}
