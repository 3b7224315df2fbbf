import path from "node:path";
import type { PageAttribute, PageDocument, PageMeta, PageSummary } from "../types.js";
import { MalformedContentError, NotFoundError } from "./errors.js";
import { readTextFile, writeTextFile } from "./fileStore.js";
import { HistoryStore } from "./historyStore.js";
import { applyRating, type ContentProcessor, readNumber } from "./processor.js";

const META_KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

const PAGE_ATTRIBUTES: ReadonlySet<string> = new Set<PageAttribute>(["url", "title", "tags", "rating", "flag", "body", "html"]);

export const isPageAttribute = (value: string): value is PageAttribute => PAGE_ATTRIBUTES.has(value);

/** `a/b.md` keeps its history in `a/history/b.json`. */
export const historyPathFor = (pagePath: string): string =>
  path.join(path.dirname(pagePath), "history", `${path.basename(pagePath, ".md")}.json`);

const serializeMeta = (meta: PageMeta): string =>
  [...meta]
    .map(([key, value]) => {
      const [first = "", ...rest] = value.split("\n");
      const head = first ? `${key}: ${first}` : `${key}:`;
      return [head, ...rest.map((line) => `    ${line}`)].join("\n");
    })
    .map((line) => `${line}\n`)
    .join("");

export interface SaveOptions {
  /** Reload and re-render after writing. Defaults to true. */
  update?: boolean;
}

/**
 * One content file: raw text, ordered metadata, Markdown body, rendered HTML
 * and the page's history log.
 */
export class Page {
  body = "";
  private content = "";
  private renderedHtml = "";
  private metadata: PageMeta = new Map();

  private constructor(
    readonly path: string,
    readonly url: string,
    readonly history: HistoryStore,
    private readonly processor: ContentProcessor
  ) {}

  /** Reads and renders an existing page. */
  static async open(filePath: string, url: string, processor: ContentProcessor): Promise<Page> {
    const content = await readTextFile(filePath);
    if (content === null) {
      throw new NotFoundError(url);
    }

    const history = await HistoryStore.open(historyPathFor(filePath), url);
    const page = new Page(filePath, url, history, processor);
    page.content = content;
    page.render();
    return page;
  }

  /** A page that has not been written yet. Nothing is read, rendered or created until `save`. */
  static bare(filePath: string, url: string, processor: ContentProcessor): Page {
    return new Page(filePath, url, HistoryStore.detached(historyPathFor(filePath), url), processor);
  }

  async load(): Promise<void> {
    const content = await readTextFile(this.path);
    if (content === null) {
      throw new NotFoundError(this.url);
    }
    this.content = content;
  }

  render(): void {
    const processed = this.processor.process(this.content);
    this.renderedHtml = processed.html;
    this.body = processed.body;
    this.metadata = processed.meta;
  }

  /**
   * Writes the header and body, appends the body to the history and, unless
   * `update` is false, reloads and re-renders.
   */
  async save(user: string, options: SaveOptions = {}): Promise<void> {
    const body = this.body.replace(/\r\n/g, "\n");
    await writeTextFile(this.path, `${serializeMeta(this.metadata)}\n${body}`);
    await this.history.append(user, body);

    if (options.update ?? true) {
      await this.load();
      this.render();
    }
  }

  get meta(): ReadonlyMap<string, string> {
    return this.metadata;
  }

  get html(): string {
    return this.renderedHtml;
  }

  get(key: string): string | undefined {
    return this.metadata.get(key.toLowerCase());
  }

  set(key: string, value: string): void {
    if (!META_KEY_PATTERN.test(key)) {
      throw new MalformedContentError(`Invalid metadata key: ${key}`);
    }
    this.metadata.set(key.toLowerCase(), value.replace(/\r\n/g, "\n"));
  }

  get title(): string {
    return this.metadata.get("title") ?? this.url;
  }

  set title(value: string) {
    this.set("title", value);
  }

  get tags(): string {
    return this.metadata.get("tags") ?? "";
  }

  set tags(value: string) {
    this.set("tags", value);
  }

  get rating(): number {
    return readNumber(this.metadata.get("rating"));
  }

  set rating(value: number) {
    this.set("rating", String(value));
  }

  get flag(): number {
    return readNumber(this.metadata.get("flag"));
  }

  set flag(value: number) {
    this.set("flag", String(value));
  }

  /** Folds one score into the running average. Persisted by the next `save`. */
  rate(score: number): void {
    if (!Number.isFinite(score)) {
      throw new RangeError(`Rating must be a finite number, got ${score}`);
    }
    applyRating(this.metadata, score);
  }

  /** Page attribute by name, falling back to the metadata value for any other key. */
  readAttribute(name: string): string {
    if (!isPageAttribute(name)) {
      return this.get(name) ?? "";
    }
    return String(this[name]);
  }

  toSummary(): PageSummary {
    return {
      url: this.url,
      title: this.title,
      tags: this.tags,
      rating: this.rating,
      flag: this.flag
    };
  }

  toDocument(): PageDocument {
    return {
      ...this.toSummary(),
      meta: Object.fromEntries(this.metadata),
      body: this.body,
      html: this.html
    };
  }
}
