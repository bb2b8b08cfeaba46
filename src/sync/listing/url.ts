export interface UrlTemplate {
  /** Marketplace site origin, e.g. `https://www.avito.ru`. */
  siteUrl: string;
  /** The shop's public URL; its last path segment becomes the base path of product URLs. */
  shopUrl?: string | null;
}

const ABSOLUTE_URL = /^https?:\/\//i;
const NUMERIC = /^\d+$/;

export function isAbsoluteUrl(value: string): boolean {
  return ABSOLUTE_URL.test(value);
}

export function isNumericId(value: string): boolean {
  return NUMERIC.test(value);
}

function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, "");
}

/** Last non-empty path segment of the shop URL, or "" when there is none. */
export function shopBasePath(shopUrl: string | null | undefined): string {
  if (!shopUrl) return "";
  let pathname: string;
  try {
    pathname = new URL(shopUrl).pathname;
  } catch {
    pathname = shopUrl.split(/[?#]/)[0] ?? "";
  }
  const segments = pathname.split("/").filter(Boolean);
  return segments[segments.length - 1] ?? "";
}

export function productUrlFromId(id: string, template: UrlTemplate): string {
  const site = trimTrailingSlashes(template.siteUrl);
  const base = shopBasePath(template.shopUrl);
  return base ? `${site}/${base}/items/${id}` : `${site}/items/${id}`;
}

/**
 * Make a candidate product URL absolute: site-relative paths get the site
 * origin, bare ids get templated, absolute URLs pass through.
 */
export function normalizeProductUrl(candidate: string, template: UrlTemplate): string | null {
  const value = candidate.trim();
  if (!value) return null;
  if (isAbsoluteUrl(value)) return value;
  if (value.startsWith("/")) return `${trimTrailingSlashes(template.siteUrl)}${value}`;
  return productUrlFromId(value, template);
}

/** Recover a listing id from a product URL. */
export function extractItemIdFromUrl(productUrl: string | null | undefined): string | null {
  if (!productUrl) return null;
  const url = productUrl.trim();

  const itemsPath = url.match(/\/items\/(\d+)/);
  if (itemsPath?.[1] && itemsPath[1].length >= 5) return itemsPath[1];

  const query = url.match(/[?&]item[_-]?id=(\d+)/i);
  if (query?.[1] && query[1].length >= 5) return query[1];

  const suffix = url.match(/[_-](\d{5,15})(?:\?|$|\/)/);
  if (suffix?.[1]) return suffix[1];

  if (!url.includes("/items/")) {
    const trailing = url.match(/\/(\d{5,15})(?:\?|$)/);
    if (trailing?.[1]) return trailing[1];
  }

  const runs = url.match(/\d{7,}/g) ?? [];
  const longest = runs.reduce((best, run) => (run.length > best.length ? run : best), "");
  return longest && longest.length <= 15 ? longest : null;
}
