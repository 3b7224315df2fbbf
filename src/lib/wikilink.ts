import { decodeHTML } from "entities";
import { escapeHtml } from "./render.js";
import { defaultUrlFormatter, normalizeUrl, type UrlFormatter } from "./url.js";

// [[target]] or [[target | Display Name]]
const WIKI_LINK_PATTERN = /\[\[([^<\]|][^\]|]*?)\s*(?:\|\s*([^\]]*?)\s*)?\]\]/g;
const CODE_ELEMENT_PATTERN = /<code\b[^>]*>[\s\S]*?<\/code>/g;

const replaceLinks = (html: string, urlFormatter: UrlFormatter): string =>
  html.replace(WIKI_LINK_PATTERN, (_match, rawTarget: string, rawDisplay: string | undefined) => {
    const target = rawTarget.trim();
    const display = rawDisplay?.trim() || target;
    // The target is still escaped markup; `Q&amp;A` names the page `q&a`.
    const href = urlFormatter("wiki.display", { url: normalizeUrl(decodeHTML(target)) });
    return `<a href="${escapeHtml(href)}">${display}</a>`;
  });

/**
 * Rewrites wiki links in rendered HTML into anchors. Runs after the Markdown
 * pass, so the display text is already escaped markup. Anything inside a
 * `<code>` element (inline code and code blocks) is left alone.
 */
export const resolveWikiLinks = (html: string, urlFormatter: UrlFormatter = defaultUrlFormatter): string => {
  let result = "";
  let cursor = 0;

  for (const match of html.matchAll(CODE_ELEMENT_PATTERN)) {
    const start = match.index ?? cursor;
    result += replaceLinks(html.slice(cursor, start), urlFormatter) + match[0];
    cursor = start + match[0].length;
  }

  return result + replaceLinks(html.slice(cursor), urlFormatter);
};
