import type { PageSummary } from "../types.js";

export const escapeHtml = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");

interface LayoutOptions {
  siteTitle: string;
  title: string;
  body: string;
  searchQuery?: string | undefined;
}

export const renderLayout = (options: LayoutOptions): string => {
  const resolvedTitle = options.title.trim();
  const title =
    resolvedTitle.length > 0
      ? `${escapeHtml(resolvedTitle)} | ${escapeHtml(options.siteTitle)}`
      : escapeHtml(options.siteTitle);

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
  </head>
  <body>
    <header class="site-header">
      <a href="/" class="brand">${escapeHtml(options.siteTitle)}</a>
      <form method="get" action="/search" class="search-form">
        <input type="search" name="q" value="${escapeHtml(options.searchQuery ?? "")}" placeholder="Search" required />
        <button type="submit">Search</button>
      </form>
    </header>
    <main class="container" id="main-content">
      ${options.body}
    </main>
  </body>
</html>`;
};

export const renderPageList = (pages: PageSummary[], linkFor: (url: string) => string): string => {
  if (pages.length === 0) {
    return '<p class="empty">No pages yet.</p>';
  }

  return `
    <ul class="page-list">
      ${pages
        .map((page) => {
          const tags = page.tags
            .split(",")
            .map((tag) => tag.trim())
            .filter((tag) => tag.length > 0);
          return `<li><a href="${escapeHtml(linkFor(page.url))}">${escapeHtml(page.title)}</a>${
            tags.length > 0
              ? ` <span class="tags">${tags.map((tag) => `<span class="tag-chip">#${escapeHtml(tag)}</span>`).join("")}</span>`
              : ""
          }</li>`;
        })
        .join("\n")}
    </ul>
  `;
};
