import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { getErrorMessage, WikiError } from "./lib/errors.js";
import { ContentProcessor } from "./lib/processor.js";
import { createUrlFormatter } from "./lib/url.js";
import { WikiRepository } from "./lib/wikiRepository.js";
import { registerApiRoutes } from "./routes/apiRoutes.js";
import { registerWikiRoutes } from "./routes/wikiRoutes.js";
import type { IndexErrorPolicy } from "./types.js";

/** Route name → path prefix; the processor builds wiki link hrefs from this table. */
export const ROUTES = {
  "wiki.index": "/",
  "wiki.display": "/wiki/",
  "wiki.history": "/api/history/"
} as const satisfies Record<string, string>;

export interface AppOptions {
  contentDir: string;
  wikiTitle?: string | undefined;
  logger?: FastifyServerOptions["logger"];
  legacyRatingFold?: boolean | undefined;
  indexErrors?: IndexErrorPolicy | undefined;
  sanitizeHtml?: boolean | undefined;
  isProduction?: boolean | undefined;
}

const resolveStatusCode = (error: unknown): number => {
  if (error instanceof WikiError) return error.statusCode;
  if (error && typeof error === "object" && "statusCode" in error) {
    const { statusCode } = error;
    if (typeof statusCode === "number" && statusCode >= 400) return statusCode;
  }
  return 500;
};

export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = Fastify({
    logger: options.logger ?? true,
    bodyLimit: 2 * 1024 * 1024
  });

  const urlFor = createUrlFormatter(ROUTES);
  const repository = new WikiRepository(options.contentDir, {
    processor: new ContentProcessor({
      urlFormatter: urlFor,
      legacyRatingFold: options.legacyRatingFold ?? false,
      sanitize: options.sanitizeHtml ?? true
    }),
    logger: app.log,
    indexErrors: options.indexErrors
  });
  app.decorate("wiki", repository);

  await app.register(helmet, {
    hsts: options.isProduction ? { maxAge: 31536000, includeSubDomains: true } : false
  });
  await app.register(rateLimit, {
    max: 120,
    timeWindow: "1 minute"
  });

  app.setErrorHandler((error: unknown, request, reply) => {
    const statusCode = resolveStatusCode(error);
    if (statusCode >= 500) {
      request.log.error({ err: error, route: request.url, method: request.method }, "Unhandled request error");
    }

    const message = statusCode >= 500 ? "Internal server error." : getErrorMessage(error) || "Request failed.";
    if (request.url.startsWith("/api/")) {
      const code = error instanceof WikiError ? error.code : undefined;
      return reply.code(statusCode).send({ ok: false, error: message, ...(code ? { code } : {}) });
    }

    return reply.code(statusCode).type("text/plain; charset=utf-8").send(message);
  });

  app.get("/health", async () => ({ status: "ok", at: new Date().toISOString() }));

  const routeOptions = { urlFor, wikiTitle: options.wikiTitle ?? "Pagewright" };
  await registerWikiRoutes(app, routeOptions);
  await registerApiRoutes(app);

  return app;
};
