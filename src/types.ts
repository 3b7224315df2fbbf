/** Ordered page metadata; iteration order is first appearance in the file. */
export type PageMeta = Map<string, string>;

export type TextTransform = (text: string) => string;

export type PageAttribute = "url" | "title" | "tags" | "rating" | "flag" | "body" | "html";

export type SearchAttribute = "url" | "title" | "tags" | "body" | "html";

export type IndexErrorPolicy = "skip" | "fail";

export interface PageSummary {
  url: string;
  title: string;
  tags: string;
  rating: number;
  flag: number;
}

export interface PageDocument extends PageSummary {
  meta: Record<string, string>;
  body: string;
  html: string;
}

export interface HistoryEntry {
  user: string;
  "formatted-date": string;
  version: string;
}

/** Structured logger shape shared by pino and Fastify's `app.log`. */
export interface WikiLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
}
