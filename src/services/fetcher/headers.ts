const BROWSER_HEADERS = {
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
} as const satisfies Record<string, string>;

export function buildDefaultHeaders(userAgent: string): Record<string, string> {
  return { 'User-Agent': userAgent, ...BROWSER_HEADERS };
}
