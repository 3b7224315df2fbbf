/**
 * Canonical page key for any user-supplied string. The result doubles as the
 * lookup url and as the file path stem below the content root.
 *
 * Runs of spaces collapse to one and the value is trimmed, then lowercased
 * with spaces turned into underscores, then Windows separators (`\\` and `\`)
 * become `/`. Idempotent.
 */
export const normalizeUrl = (value: string): string =>
  value
    .replace(/ {2,}/g, " ")
    .trim()
    .toLowerCase()
    .replaceAll(" ", "_")
    .replaceAll("\\\\", "/")
    .replaceAll("\\", "/");

/** Builds a routable path for a named route of the surrounding web layer. */
export type UrlFormatter = (route: string, params: { url: string }) => string;

export const defaultUrlFormatter: UrlFormatter = (_route, { url }) => `/${url}`;

const encodeUrlPath = (url: string): string => url.split("/").map(encodeURIComponent).join("/");

/**
 * Formatter backed by a table of route name → path prefix.
 * `createUrlFormatter({ "wiki.display": "/wiki/" })("wiki.display", { url: "a/b" })` is `/wiki/a/b`.
 */
export const createUrlFormatter = (routes: Readonly<Record<string, string>>): UrlFormatter => {
  return (route, { url }) => {
    const prefix = routes[route];
    if (prefix === undefined) {
      throw new Error(`Unknown route: ${route}`);
    }
    return `${prefix}${encodeUrlPath(url)}`;
  };
};
