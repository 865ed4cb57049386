/**
 * URL helpers for manifest lookup and link resolution.
 * These never throw: malformed input falls back to plain string handling.
 */

const HTTP_SCHEME = /^https?:\/\//i;

export function hasHttpScheme(url: string): boolean {
  return HTTP_SCHEME.test(url);
}

/** Prefixes `https://` when the URL carries no http(s) scheme. */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  return hasHttpScheme(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * `scheme://host[:port]` of a URL. Without a parsable URL, the first three
 * slash-separated segments are used.
 */
export function originOf(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.protocol === "http:" || parsed.protocol === "https:") {
      return parsed.origin;
    }
  } catch {
    // not parsable, fall through to segment split
  }
  const parts = url.split("/");
  return parts.length >= 3 ? parts.slice(0, 3).join("/") : url;
}

/** Joins a base URL and a relative path with exactly one slash between them. */
export function joinUrlPath(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export function stripScheme(url: string): string {
  return url.replace(HTTP_SCHEME, "");
}

/**
 * Resolves a link found on a page against the page URL.
 * - absolute http(s) links are returned unchanged
 * - `//host/x` takes the page's scheme
 * - `/x` resolves against the page origin
 * - anything else is appended to the page URL as a path segment
 */
export function resolveLinkUrl(sourceUrl: string, link: string): string {
  const target = link.trim();
  if (hasHttpScheme(target)) {
    return target;
  }
  if (target.startsWith("//")) {
    const scheme = sourceUrl.match(/^(https?):/i)?.[1]?.toLowerCase() ?? "https";
    return `${scheme}:${target}`;
  }
  if (target.startsWith("/")) {
    return `${originOf(sourceUrl)}${target}`;
  }
  const segment = target.replace(/^(\.\/)+/, "");
  return sourceUrl.endsWith("/") ? `${sourceUrl}${segment}` : `${sourceUrl}/${segment}`;
}

/**
 * Resolves a link listed in a document (such as a manifest file) with
 * standard relative-reference rules.
 */
export function resolveDocumentLink(documentUrl: string, link: string): string {
  const target = link.trim();
  if (hasHttpScheme(target)) {
    return target;
  }
  try {
    return new URL(target, documentUrl).href;
  } catch {
    return resolveLinkUrl(documentUrl, target);
  }
}

/** Cuts text down to at most `budget` characters. */
export function truncateContent(content: string, budget: number): string {
  return content.length > budget ? content.slice(0, budget) : content;
}
