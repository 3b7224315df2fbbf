export type WikiErrorCode =
  | "NOT_FOUND"
  | "PATH_ESCAPE"
  | "MALFORMED_CONTENT"
  | "INVALID_SEARCH_TERM"
  | "STORAGE_IO"
  | "RENDER_FAILURE";

/**
 * Base class for every failure the content engine reports to its callers.
 * `statusCode` is the HTTP status the web layer answers with.
 */
export abstract class WikiError extends Error {
  abstract readonly code: WikiErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends WikiError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;

  constructor(readonly url: string) {
    super(`Page not found: ${url}`);
  }
}

export class PathEscapeError extends WikiError {
  readonly code = "PATH_ESCAPE";
  readonly statusCode = 400;

  constructor(readonly target: string) {
    super(`Possible write attempt outside content directory: ${target}`);
  }
}

export class MalformedContentError extends WikiError {
  readonly code = "MALFORMED_CONTENT";
  readonly statusCode = 422;
}

export class InvalidSearchTermError extends WikiError {
  readonly code = "INVALID_SEARCH_TERM";
  readonly statusCode = 400;

  constructor(readonly term: string, options?: { cause?: unknown }) {
    super(`Invalid search pattern: ${term}`, options);
  }
}

export class StorageError extends WikiError {
  readonly code = "STORAGE_IO";
  readonly statusCode = 500;
}

export class RenderError extends WikiError {
  readonly code = "RENDER_FAILURE";
  readonly statusCode = 500;
}

export const getErrorMessage = (value: unknown): string => {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

export const isErrnoException = (value: unknown): value is NodeJS.ErrnoException =>
  value instanceof Error && "code" in value && typeof value.code === "string";
