import { buildApp } from "./app.js";
import { config } from "./config.js";
import { ensureDir } from "./lib/fileStore.js";

const start = async (): Promise<void> => {
  const app = await buildApp({
    contentDir: config.contentDir,
    wikiTitle: config.wikiTitle,
    logger: { level: config.logLevel },
    legacyRatingFold: config.legacyRatingFold,
    indexErrors: config.indexErrors,
    sanitizeHtml: config.sanitizeHtml,
    isProduction: config.isProduction
  });

  try {
    await ensureDir(config.contentDir);
    await app.listen({
      port: config.port,
      host: config.host
    });

    app.log.info({ contentDir: config.contentDir }, `${config.wikiTitle} running on http://${config.host}:${config.port}`);
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
};

void start();
