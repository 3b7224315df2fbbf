import type { FastifyInstance } from "fastify";
import { escapeHtml, renderLayout, renderPageList } from "../lib/render.js";
import { normalizeUrl, type UrlFormatter } from "../lib/url.js";

export interface WikiRouteOptions {
  urlFor: UrlFormatter;
  wikiTitle: string;
}

export const registerWikiRoutes = async (app: FastifyInstance, options: WikiRouteOptions): Promise<void> => {
  const linkFor = (url: string): string => options.urlFor("wiki.display", { url });

  app.get("/", async (_request, reply) => {
    const pages = await app.wiki.index();
    const body = `
      <section class="content-wrap">
        <h1>All pages</h1>
        ${renderPageList(
          pages.map((page) => page.toSummary()),
          linkFor
        )}
      </section>
    `;

    return reply.type("text/html").send(renderLayout({ siteTitle: options.wikiTitle, title: "", body }));
  });

  app.get<{ Params: { "*": string } }>("/wiki/*", async (request, reply) => {
    const url = normalizeUrl(request.params["*"]);
    if (url !== request.params["*"]) {
      return reply.redirect(linkFor(url));
    }

    const page = await app.wiki.getOrFail(url);
    const body = `
      <article class="content-wrap wiki-page">
        <h1 class="page-title">${escapeHtml(page.title)}</h1>
        ${page.html}
      </article>
    `;

    return reply.type("text/html").send(renderLayout({ siteTitle: options.wikiTitle, title: page.title, body }));
  });

  app.get<{ Querystring: { q?: string } }>(
    "/search",
    { config: { rateLimit: { max: 30, timeWindow: "1 minute" } } },
    async (request, reply) => {
      const q = (request.query.q ?? "").trim();
      const pages = q ? await app.wiki.search(q) : [];
      const body = `
      <section class="content-wrap">
        <h1>Search</h1>
        ${
          q
            ? renderPageList(
                pages.map((page) => page.toSummary()),
                linkFor
              )
            : '<p class="empty">Enter a search term.</p>'
        }
      </section>
    `;

      return reply
        .type("text/html")
        .send(renderLayout({ siteTitle: options.wikiTitle, title: "Search", body, searchQuery: q }));
    }
  );
};
