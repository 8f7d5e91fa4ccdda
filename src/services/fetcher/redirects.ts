import { FetchError } from '../../errors/app-error.js';

const REDIRECT_STATUSES = new Set([300, 301, 302, 303, 307, 308]);

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

/**
 * Redirects are reported, never followed, so every output stays tied to the
 * URL that was listed in the input file.
 */
export function createRedirectError(
  url: string,
  status: number,
  location: string | null
): FetchError {
  const target = location ? resolveRedirectTarget(url, location) : undefined;
  const message = target
    ? `Redirect ${status} to ${target} not followed`
    : `Redirect ${status} without Location header not followed`;

  return new FetchError(message, url, status, {
    reason: 'redirect',
    location: target,
  });
}

function resolveRedirectTarget(baseUrl: string, location: string): string {
  if (!URL.canParse(location, baseUrl)) return location;
  return new URL(location, baseUrl).href;
}
