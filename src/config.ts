import path from "node:path";
import dotenv from "dotenv";
import type { IndexErrorPolicy } from "./types.js";

const rootDir = process.cwd();

dotenv.config({
  path: path.join(rootDir, "config.env")
});

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = (value ?? "").trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
};

const parseIndexErrors = (value: string | undefined): IndexErrorPolicy =>
  (value ?? "").trim().toLowerCase() === "fail" ? "fail" : "skip";

export const config = Object.freeze({
  rootDir,
  port: parsePositiveInt(process.env.PORT, 3000),
  host: process.env.HOST ?? "0.0.0.0",
  isProduction: process.env.NODE_ENV === "production",
  wikiTitle: process.env.WIKI_TITLE ?? "Pagewright",
  contentDir: path.resolve(rootDir, process.env.WIKI_CONTENT_DIR ?? path.join("data", "wiki")),
  logLevel: process.env.LOG_LEVEL ?? "info",
  legacyRatingFold: parseBoolean(process.env.WIKI_LEGACY_RATING, false),
  indexErrors: parseIndexErrors(process.env.WIKI_INDEX_ERRORS),
  sanitizeHtml: parseBoolean(process.env.WIKI_SANITIZE_HTML, true)
});
