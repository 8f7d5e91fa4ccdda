/** `scheme://` followed by a non-empty authority, as RFC 3986 writes it. */
const AUTHORITY_PREFIX = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/[^/?#\s]/;

/**
 * True when `candidate` is an absolute URL with both a scheme and a host.
 * Forms the WHATWG parser would repair, such as `http:example.com` or
 * `https:///example.com`, are rejected. Never throws.
 */
export function isValidUrl(candidate: string): boolean {
  if (typeof candidate !== 'string') return false;

  const trimmed = candidate.trim();
  if (!AUTHORITY_PREFIX.test(trimmed)) return false;
  if (!URL.canParse(trimmed)) return false;

  const url = new URL(trimmed);
  return url.protocol.length > 1 && url.host.length > 0;
}

/** Host component (`hostname[:port]`), or `''` when the URL cannot be parsed. */
export function getUrlHost(url: string): string {
  if (!URL.canParse(url)) return '';
  return new URL(url).host;
}
