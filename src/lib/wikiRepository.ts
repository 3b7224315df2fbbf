import { randomUUID } from "node:crypto";
import path from "node:path";
import type { IndexErrorPolicy, SearchAttribute, WikiLogger } from "../types.js";
import { InvalidSearchTermError, NotFoundError, PathEscapeError, StorageError, WikiError, getErrorMessage } from "./errors.js";
import { ensureDir, isPathInside, listFilesRecursive, pathExists, removeFile, renameFile } from "./fileStore.js";
import { historyPathFor, Page } from "./page.js";
import { ContentProcessor } from "./processor.js";
import { normalizeUrl } from "./url.js";

const CONTENT_EXTENSION = ".md";

export const DEFAULT_SEARCH_ATTRIBUTES: readonly SearchAttribute[] = ["title", "tags", "body"];

const silentLogger: WikiLogger = {
  info: () => undefined,
  warn: () => undefined
};

export interface WikiRepositoryOptions {
  processor?: ContentProcessor | undefined;
  logger?: WikiLogger | undefined;
  /** What `index()` does with a page that fails to load or render. */
  indexErrors?: IndexErrorPolicy | undefined;
}

export interface SearchOptions {
  ignoreCase?: boolean | undefined;
  attributes?: readonly SearchAttribute[] | undefined;
}

const compareByTitle = (a: Page, b: Page): number => {
  const left = a.title.toLowerCase();
  const right = b.title.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

const pushGrouped = (groups: Map<string, Page[]>, key: string, page: Page): void => {
  const existing = groups.get(key);
  if (existing) {
    existing.push(page);
  } else {
    groups.set(key, [page]);
  }
};

/**
 * Collection-level access to the pages below one content root. Holds no
 * index of its own: every collection query walks the directory tree again.
 */
export class WikiRepository {
  readonly root: string;
  readonly processor: ContentProcessor;
  private readonly logger: WikiLogger;
  private readonly indexErrors: IndexErrorPolicy;

  constructor(root: string, options: WikiRepositoryOptions = {}) {
    this.root = path.resolve(root);
    this.processor = options.processor ?? new ContentProcessor();
    this.logger = options.logger ?? silentLogger;
    this.indexErrors = options.indexErrors ?? "skip";
  }

  /** `{root}/{url}.md`. Throws `PathEscapeError` when that lands outside the root. */
  path(url: string): string {
    const target = path.join(this.root, `${url}${CONTENT_EXTENSION}`);
    if (!isPathInside(this.root, target)) {
      throw new PathEscapeError(url);
    }
    return target;
  }

  historyPath(url: string): string {
    return historyPathFor(this.path(url));
  }

  async exists(url: string): Promise<boolean> {
    return pathExists(this.path(url));
  }

  async get(url: string): Promise<Page | null> {
    const filePath = this.path(url);
    if (!(await pathExists(filePath))) return null;
    return Page.open(filePath, url, this.processor);
  }

  async getOrFail(url: string): Promise<Page> {
    const page = await this.get(url);
    if (!page) {
      throw new NotFoundError(url);
    }
    return page;
  }

  /** An unsaved page for `url`, or null when a page already lives there. */
  async getBare(url: string): Promise<Page | null> {
    const filePath = this.path(url);
    if (await pathExists(filePath)) return null;
    return Page.bare(filePath, url, this.processor);
  }

  async getByTitle(title: string): Promise<Page | null> {
    const pages = await this.index();
    return pages.find((page) => page.title === title) ?? null;
  }

  /**
   * Renames the content file, and its history file when there is one. Both
   * targets are checked against the root before anything is touched.
   */
  async move(url: string, newUrl: string): Promise<void> {
    const source = this.path(url);
    const target = this.path(newUrl);
    if (!(await pathExists(source))) {
      throw new NotFoundError(url);
    }
    if (source === target) return;

    if (await pathExists(target)) {
      throw new StorageError(`Cannot move ${url}: ${newUrl} already exists`);
    }

    await ensureDir(path.dirname(target));
    await renameFile(source, target);

    const historySource = historyPathFor(source);
    if (await pathExists(historySource)) {
      const historyTarget = historyPathFor(target);
      await ensureDir(path.dirname(historyTarget));
      await renameFile(historySource, historyTarget);
    }

    this.logger.info({ url, newUrl }, "Page moved");
  }

  /**
   * Removes the content file and its history. The content file is parked
   * under a temporary name first so that a failed history removal can be
   * rolled back instead of leaving half a page behind.
   */
  async delete(url: string): Promise<boolean> {
    const contentPath = this.path(url);
    if (!(await pathExists(contentPath))) return false;

    const historyPath = historyPathFor(contentPath);
    const parkedPath = `${contentPath}.${randomUUID()}.deleting`;
    await renameFile(contentPath, parkedPath);

    try {
      await removeFile(historyPath);
    } catch (error) {
      try {
        await renameFile(parkedPath, contentPath);
      } catch (restoreError) {
        throw new StorageError(
          `Delete of ${url} incomplete: history kept, content parked at ${parkedPath} (${getErrorMessage(restoreError)})`,
          { cause: error }
        );
      }
      throw new StorageError(`Delete of ${url} failed: ${getErrorMessage(error)}`, { cause: error });
    }

    try {
      await removeFile(parkedPath);
    } catch (error) {
      throw new StorageError(`Delete of ${url} incomplete: history removed, content left at ${parkedPath}`, {
        cause: error
      });
    }

    this.logger.info({ url }, "Page deleted");
    return true;
  }

  /** Every page below the root, sorted case-insensitively by title. */
  async index(): Promise<Page[]> {
    const files = await listFilesRecursive(this.root, CONTENT_EXTENSION);
    const pages: Page[] = [];

    for (const filePath of files) {
      const relative = path.relative(this.root, filePath).slice(0, -CONTENT_EXTENSION.length);
      const url = normalizeUrl(relative);
      try {
        pages.push(await Page.open(filePath, url, this.processor));
      } catch (error) {
        if (this.indexErrors === "fail" || !(error instanceof WikiError)) {
          throw error;
        }
        this.logger.warn({ url, path: filePath, err: error }, "Skipping page that failed to load");
      }
    }

    return pages.sort(compareByTitle);
  }

  /** Groups the index by a page attribute, or by a metadata value for any other key. */
  async indexBy(key: string): Promise<Map<string, Page[]>> {
    const groups = new Map<string, Page[]>();
    for (const page of await this.index()) {
      pushGrouped(groups, page.readAttribute(key), page);
    }
    return groups;
  }

  async tags(): Promise<Map<string, Page[]>> {
    const tags = new Map<string, Page[]>();
    for (const page of await this.index()) {
      for (const rawTag of page.tags.split(",")) {
        const tag = rawTag.trim();
        if (tag === "") continue;
        pushGrouped(tags, tag, page);
      }
    }
    return tags;
  }

  /** Pages whose tag string contains `tag` anywhere, not only as a whole tag. */
  async pagesByTag(tag: string): Promise<Page[]> {
    const pages = await this.index();
    return pages.filter((page) => page.tags.includes(tag)).sort(compareByTitle);
  }

  /** Pages where `term`, read as a regular expression, matches any of `attributes`. */
  async search(term: string, options: SearchOptions = {}): Promise<Page[]> {
    let pattern: RegExp;
    try {
      pattern = new RegExp(term, (options.ignoreCase ?? true) ? "i" : "");
    } catch (error) {
      throw new InvalidSearchTermError(term, { cause: error });
    }

    const attributes = options.attributes ?? DEFAULT_SEARCH_ATTRIBUTES;
    const pages = await this.index();
    return pages.filter((page) => attributes.some((attribute) => pattern.test(page.readAttribute(attribute))));
  }
}
