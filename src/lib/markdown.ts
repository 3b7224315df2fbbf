import hljs from "highlight.js";
import { Marked, type TokenizerAndRendererExtension } from "marked";
import { markedHighlight } from "marked-highlight";
import sanitizeHtml from "sanitize-html";
import { getErrorMessage, RenderError } from "./errors.js";

export const META_LINE_PATTERN = /^[ ]{0,3}([A-Za-z0-9_-]+):\s*(.*)$/;
export const META_CONTINUATION_PATTERN = /^[ ]{4,}(.*)$/;

/** Metadata as the renderer's header extension saw it: lowercased key → lines. */
export type RendererMeta = Map<string, string[]>;

export interface RenderedMarkdown {
  html: string;
  meta: RendererMeta;
}

export interface RenderOptions {
  sanitize: boolean;
}

const toSafeHtml = (rawHtml: string): string => {
  return sanitizeHtml(rawHtml, {
    allowedTags: sanitizeHtml.defaults.allowedTags.concat(["img", "h1", "h2", "span", "pre", "code"]),
    allowedAttributes: {
      a: ["href", "name", "target", "rel"],
      img: ["src", "alt", "title"],
      th: ["align"],
      td: ["align"],
      "*": ["class", "id"]
    },
    allowedSchemes: ["http", "https", "mailto"]
  });
};

/**
 * Block extension that consumes a leading `key: value` header. Only the very
 * first block the lexer looks at is considered, so headers never match deeper
 * in the document or inside nested blocks.
 */
const metaHeaderExtension = (meta: RendererMeta): TokenizerAndRendererExtension => {
  let inspected = false;

  return {
    name: "metaHeader",
    level: "block",
    tokenizer(src: string) {
      if (inspected) return undefined;
      inspected = true;

      const lines = src.split("\n");
      if (!META_LINE_PATTERN.test(lines[0] ?? "")) return undefined;

      let consumed = 0;
      let currentKey: string | null = null;
      for (const line of lines) {
        if (line === "") break;

        const entry = META_LINE_PATTERN.exec(line);
        const continuation = entry ? null : META_CONTINUATION_PATTERN.exec(line);
        if (entry) {
          currentKey = (entry[1] ?? "").toLowerCase();
          const values = meta.get(currentKey) ?? [];
          values.push((entry[2] ?? "").trim());
          meta.set(currentKey, values);
        } else if (continuation && currentKey) {
          // A line of four or more spaces is an empty line inside the value.
          meta.get(currentKey)?.push((continuation[1] ?? "").trim());
        } else if (line.trim() !== "") {
          break;
        }

        consumed += line.length + 1;
      }

      return {
        type: "metaHeader",
        raw: src.slice(0, Math.min(consumed, src.length))
      };
    },
    renderer() {
      return "";
    }
  };
};

/**
 * Renders Markdown with tables, fenced code, highlight.js highlighting and the
 * metadata header syntax. A new marked instance is built for every call so no
 * header state carries over between documents.
 */
export const renderMarkdown = (source: string, options: RenderOptions): RenderedMarkdown => {
  const meta: RendererMeta = new Map();
  const marked = new Marked(
    markedHighlight({
      langPrefix: "hljs language-",
      highlight(code, lang) {
        const language = hljs.getLanguage(lang) ? lang : "plaintext";
        return hljs.highlight(code, { language }).value;
      }
    }),
    { gfm: true, extensions: [metaHeaderExtension(meta)] }
  );

  let rendered: string | Promise<string>;
  try {
    rendered = marked.parse(source, { async: false });
  } catch (error) {
    throw new RenderError(`Markdown rendering failed: ${getErrorMessage(error)}`, { cause: error });
  }

  if (typeof rendered !== "string") {
    throw new RenderError("Markdown rendering returned asynchronously");
  }

  return {
    html: options.sanitize ? toSafeHtml(rendered) : rendered,
    meta
  };
};
