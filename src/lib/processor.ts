import type { PageMeta, TextTransform } from "../types.js";
import { MalformedContentError } from "./errors.js";
import { META_CONTINUATION_PATTERN, META_LINE_PATTERN, renderMarkdown, type RendererMeta } from "./markdown.js";
import { defaultUrlFormatter, type UrlFormatter } from "./url.js";
import { resolveWikiLinks } from "./wikilink.js";

export interface ProcessorConfig {
  /** Applied in order to the raw file text before anything else. */
  preprocessors: TextTransform[];
  /** Applied in order to the rendered HTML. Defaults to wiki link resolution. */
  postprocessors: TextTransform[];
  urlFormatter: UrlFormatter;
  sanitize: boolean;
  /**
   * Rewrite `total`/`timesrated`/`rating` on every parse, folding the stored
   * rating into the running average. Off unless explicitly enabled.
   */
  legacyRatingFold: boolean;
}

export interface ProcessedContent {
  html: string;
  body: string;
  meta: PageMeta;
}

export const createProcessorConfig = (overrides: Partial<ProcessorConfig> = {}): ProcessorConfig => {
  const urlFormatter = overrides.urlFormatter ?? defaultUrlFormatter;
  return {
    preprocessors: overrides.preprocessors ?? [],
    postprocessors: overrides.postprocessors ?? [(html) => resolveWikiLinks(html, urlFormatter)],
    urlFormatter,
    sanitize: overrides.sanitize ?? true,
    legacyRatingFold: overrides.legacyRatingFold ?? false
  };
};

/** Splits on the first blank line. A file that starts with a blank line has an empty header. */
export const splitRaw = (source: string): { metaRaw: string; body: string } => {
  const text = source.replace(/\r\n/g, "\n");
  if (text.startsWith("\n")) {
    return { metaRaw: "", body: text.slice(1) };
  }

  const separator = text.indexOf("\n\n");
  if (separator < 0) {
    throw new MalformedContentError("Missing blank line between metadata header and body");
  }

  return {
    metaRaw: text.slice(0, separator),
    body: text.slice(separator + 2)
  };
};

export const parseMetaBlock = (metaRaw: string): PageMeta => {
  const meta: PageMeta = new Map();
  let currentKey: string | null = null;

  for (const line of metaRaw.split("\n")) {
    const entry = META_LINE_PATTERN.exec(line);
    if (entry) {
      const key = (entry[1] ?? "").toLowerCase();
      const value = (entry[2] ?? "").trim();
      const existing = meta.get(key);
      meta.set(key, existing === undefined ? value : `${existing}\n${value}`);
      currentKey = key;
      continue;
    }

    const continuation = META_CONTINUATION_PATTERN.exec(line);
    if (continuation && currentKey !== null) {
      meta.set(currentKey, `${meta.get(currentKey) ?? ""}\n${(continuation[1] ?? "").trim()}`);
      continue;
    }

    if (line.trim() === "") continue;

    throw new MalformedContentError(`Unparseable metadata line: ${line}`);
  }

  return meta;
};

/** Raw header order wins; values come from the renderer where it parsed the key. */
const mergeRendererMeta = (raw: PageMeta, rendered: RendererMeta): PageMeta => {
  const merged: PageMeta = new Map();
  for (const [key, value] of raw) {
    merged.set(key, rendered.get(key)?.join("\n") ?? value);
  }
  for (const [key, values] of rendered) {
    if (!merged.has(key)) merged.set(key, values.join("\n"));
  }
  return merged;
};

export const readNumber = (value: string | undefined): number => {
  if (value === undefined) return 0;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : 0;
};

/** Records one new rating: `total += score`, `timesrated += 1`, `rating = total / timesrated`. */
export const applyRating = (meta: PageMeta, score: number): void => {
  const total = readNumber(meta.get("total")) + score;
  const timesRated = readNumber(meta.get("timesrated")) + 1;
  meta.set("total", String(total));
  meta.set("timesrated", String(timesRated));
  meta.set("rating", String(total / timesRated));
};

/**
 * The read-time rating rewrite: the stored `rating` is treated as a fresh
 * score and folded into `total`. Only keys already present are rewritten.
 */
export const foldLegacyRating = (meta: PageMeta): void => {
  const previousTotal = readNumber(meta.get("total"));
  const timesRated = meta.has("timesrated") ? readNumber(meta.get("timesrated")) + 1 : 1;
  const total = readNumber(meta.get("rating")) + previousTotal;
  const average = total / timesRated;

  if (meta.has("total")) meta.set("total", String(total));
  if (meta.has("timesrated")) meta.set("timesrated", String(timesRated));
  if (meta.has("rating")) meta.set("rating", String(average));
};

const HEADING_PATTERN = /<h1>([\s\S]*?)<\/h1>/g;

const headingText = (inner: string): string => inner.replace(/<[^>]*>/g, "");

const anchorName = (text: string): string => text.replaceAll(" ", "_").replaceAll('"', "&quot;");

/**
 * Prepends a contents block when the HTML has level-1 headings and drops a
 * named anchor in front of each one. Anchors keep the heading's case.
 */
export const buildTableOfContents = (html: string): string => {
  const headings = [...html.matchAll(HEADING_PATTERN)].map((match) => {
    const text = headingText(match[1] ?? "");
    return { index: match.index ?? 0, text, anchor: anchorName(text) };
  });
  if (headings.length === 0) return html;

  const items = headings.map((heading) => `<li><a href="#${heading.anchor}">${heading.text}</a></li>`).join("");

  // Back to front, so earlier insertions leave later offsets intact.
  let body = html;
  for (let index = headings.length - 1; index >= 0; index -= 1) {
    const heading = headings[index];
    if (!heading) continue;
    body = `${body.slice(0, heading.index)}<a name="${heading.anchor}"></a>${body.slice(heading.index)}`;
  }

  return `<nav class="toc"><h3>Contents</h3><ul>${items}</ul></nav>${body}`;
};

/**
 * Runs pre-process → render → split → parse-meta → post-process → build-toc.
 * Stateless apart from its configuration; one instance can serve every page.
 */
export class ContentProcessor {
  readonly config: ProcessorConfig;

  constructor(config: Partial<ProcessorConfig> = {}) {
    this.config = createProcessorConfig(config);
  }

  process(text: string): ProcessedContent {
    const pre = this.config.preprocessors.reduce((current, transform) => transform(current), text);
    const rendered = renderMarkdown(pre, { sanitize: this.config.sanitize });
    const { metaRaw, body } = splitRaw(pre);

    const meta = mergeRendererMeta(parseMetaBlock(metaRaw), rendered.meta);
    if (this.config.legacyRatingFold) {
      foldLegacyRating(meta);
    }

    const html = this.config.postprocessors.reduce((current, transform) => transform(current), rendered.html);

    return {
      html: buildTableOfContents(html),
      body,
      meta
    };
  }
}
