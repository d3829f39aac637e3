/**
 * URL helpers shared by the classifier, the resolver and the crawler.
 * Nothing here throws: malformed input is returned as-is or compares unequal.
 */

const WEB_PROTOCOLS = new Set(['http:', 'https:']);

export function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * Drops the fragment and leaves everything else untouched, so that
 * `report.pdf#page=2` and `report.pdf` share one entry.
 */
export function normalize(url: string): string {
  const hashIndex = url.indexOf('#');
  if (hashIndex === -1) return url;
  if (!parseUrl(url)) return url;
  return url.slice(0, hashIndex);
}

export function ensureScheme(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) return trimmed;
  return `https://${trimmed.replace(/^\/\//, '')}`;
}

export function hostOf(url: string): string | null {
  const parsed = parseUrl(url);
  if (!parsed || !parsed.hostname) return null;
  return parsed.hostname.toLowerCase();
}

function siteRoot(host: string): string {
  return host.startsWith('www.') ? host.slice(4) : host;
}

export function sameSite(url: string, baseUrl: string, allowSubdomains: boolean): boolean {
  const host = hostOf(url);
  const baseHost = hostOf(baseUrl);
  if (!host || !baseHost) return false;

  const root = siteRoot(host);
  const baseRoot = siteRoot(baseHost);
  if (root === baseRoot) return true;
  return allowSubdomains && root.endsWith(`.${baseRoot}`);
}

/** Host equals `domain` or is one of its subdomains. */
export function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/** Absolute, fragment-free http(s) URL for an href, or null. */
export function resolveHref(href: string | undefined | null, pageUrl: string): string | null {
  if (!href) return null;
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  try {
    const absolute = new URL(trimmed, pageUrl);
    if (!WEB_PROTOCOLS.has(absolute.protocol)) return null;
    return normalize(absolute.toString());
  } catch {
    return null;
  }
}

export function isWebUrl(url: string): boolean {
  const parsed = parseUrl(url);
  return parsed !== null && WEB_PROTOCOLS.has(parsed.protocol);
}
