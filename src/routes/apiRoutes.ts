import type { FastifyInstance } from "fastify";
import { NotFoundError } from "../lib/errors.js";
import type { Page } from "../lib/page.js";
import { normalizeUrl } from "../lib/url.js";
import { DEFAULT_SEARCH_ATTRIBUTES } from "../lib/wikiRepository.js";
import type { SearchAttribute } from "../types.js";

interface WildcardParams {
  "*": string;
}

interface SavePageBody {
  user: string;
  body: string;
  title?: string;
  tags?: string;
  meta?: Record<string, string>;
}

interface MovePageBody {
  from: string;
  to: string;
}

interface RatePageBody {
  user: string;
  score: number;
}

interface SearchQuery {
  q: string;
  caseSensitive?: string;
  in?: string;
}

const SEARCH_ATTRIBUTES: ReadonlySet<string> = new Set<SearchAttribute>(["url", "title", "tags", "body", "html"]);

const isSearchAttribute = (value: string): value is SearchAttribute => SEARCH_ATTRIBUTES.has(value);

const savePageSchema = {
  body: {
    type: "object",
    required: ["user", "body"],
    properties: {
      user: { type: "string", minLength: 1 },
      body: { type: "string" },
      title: { type: "string" },
      tags: { type: "string" },
      meta: { type: "object", additionalProperties: { type: "string" } }
    },
    additionalProperties: false
  }
} as const;

const movePageSchema = {
  body: {
    type: "object",
    required: ["from", "to"],
    properties: {
      from: { type: "string", minLength: 1 },
      to: { type: "string", minLength: 1 }
    },
    additionalProperties: false
  }
} as const;

const ratePageSchema = {
  body: {
    type: "object",
    required: ["user", "score"],
    properties: {
      user: { type: "string", minLength: 1 },
      score: { type: "number" }
    },
    additionalProperties: false
  }
} as const;

const searchSchema = {
  querystring: {
    type: "object",
    required: ["q"],
    properties: {
      q: { type: "string", minLength: 1 },
      caseSensitive: { type: "string" },
      in: { type: "string" }
    }
  }
} as const;

const toUrlGroups = (groups: Map<string, Page[]>): Record<string, string[]> =>
  Object.fromEntries([...groups].map(([key, pages]) => [key, pages.map((page) => page.url)]));

export const registerApiRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/api/pages", async () => {
    const pages = await app.wiki.index();
    return { ok: true, pages: pages.map((page) => page.toSummary()) };
  });

  app.get<{ Params: WildcardParams }>("/api/pages/*", async (request) => {
    const page = await app.wiki.getOrFail(normalizeUrl(request.params["*"]));
    return { ok: true, page: page.toDocument() };
  });

  app.put<{ Params: WildcardParams; Body: SavePageBody }>(
    "/api/pages/*",
    { schema: savePageSchema },
    async (request, reply) => {
      const url = normalizeUrl(request.params["*"]);
      if (!url) {
        return reply.code(400).send({ ok: false, error: "Page url is required." });
      }

      const existing = await app.wiki.get(url);
      const page = existing ?? (await app.wiki.getBare(url));
      if (!page) {
        return reply.code(409).send({ ok: false, error: "Page was created concurrently." });
      }

      for (const [key, value] of Object.entries(request.body.meta ?? {})) {
        page.set(key, value);
      }
      if (request.body.title !== undefined) page.title = request.body.title;
      if (request.body.tags !== undefined) page.tags = request.body.tags;
      page.body = request.body.body;

      await page.save(request.body.user);
      request.log.info({ url, user: request.body.user, created: !existing }, "Page saved");

      return reply.code(existing ? 200 : 201).send({ ok: true, page: page.toDocument() });
    }
  );

  app.delete<{ Params: WildcardParams }>("/api/pages/*", async (request) => {
    const url = normalizeUrl(request.params["*"]);
    if (!(await app.wiki.delete(url))) {
      throw new NotFoundError(url);
    }
    return { ok: true, deleted: true };
  });

  app.post<{ Body: MovePageBody }>("/api/move", { schema: movePageSchema }, async (request) => {
    const from = normalizeUrl(request.body.from);
    const to = normalizeUrl(request.body.to);
    await app.wiki.move(from, to);
    return { ok: true, url: to };
  });

  app.post<{ Params: WildcardParams; Body: RatePageBody }>(
    "/api/rate/*",
    { schema: ratePageSchema },
    async (request) => {
      const page = await app.wiki.getOrFail(normalizeUrl(request.params["*"]));
      page.rate(request.body.score);
      await page.save(request.body.user);
      return { ok: true, page: page.toSummary() };
    }
  );

  app.get<{ Params: WildcardParams }>("/api/history/*", async (request) => {
    const page = await app.wiki.getOrFail(normalizeUrl(request.params["*"]));
    const entries = page.history.entryKeys().flatMap((key) => {
      const entry = page.history.get(key);
      return entry ? [{ key, ...entry }] : [];
    });
    return { ok: true, url: page.url, entries };
  });

  app.get<{ Params: { key: string } }>("/api/groups/:key", async (request) => {
    const groups = await app.wiki.indexBy(request.params.key);
    return { ok: true, groups: toUrlGroups(groups) };
  });

  app.get("/api/tags", async () => {
    return { ok: true, tags: toUrlGroups(await app.wiki.tags()) };
  });

  app.get<{ Params: { tag: string } }>("/api/tags/:tag", async (request) => {
    const pages = await app.wiki.pagesByTag(request.params.tag);
    return { ok: true, pages: pages.map((page) => page.toSummary()) };
  });

  app.get<{ Querystring: SearchQuery }>(
    "/api/search",
    { schema: searchSchema, config: { rateLimit: { max: 30, timeWindow: "1 minute" } } },
    async (request, reply) => {
      const requested = (request.query.in ?? "")
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
      const invalid = requested.filter((entry) => !isSearchAttribute(entry));
      if (invalid.length > 0) {
        return reply.code(400).send({ ok: false, error: `Unknown search attribute: ${invalid.join(", ")}` });
      }

      const attributes = requested.length > 0 ? requested.filter(isSearchAttribute) : DEFAULT_SEARCH_ATTRIBUTES;
      const caseSensitive = request.query.caseSensitive === "true" || request.query.caseSensitive === "1";
      const pages = await app.wiki.search(request.query.q, { ignoreCase: !caseSensitive, attributes });
      return { ok: true, pages: pages.map((page) => page.toSummary()) };
    }
  );
};
