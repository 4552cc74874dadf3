/**
 * URL canonicalization shared by the frontier, the scope filter and the link extractor.
 */

/**
 * Resolve `url` against `baseUrl` and canonicalize it.
 *
 * - relative references (`../x`, `/x`, `x`, `//host/x`) are resolved with WHATWG URL rules
 * - the fragment is dropped
 * - a trailing slash is dropped only when the segment before it contains a `.`
 *   (`/guide/intro.html/` becomes `/guide/intro.html`, `/guide/` stays)
 *
 * Idempotent. Input that cannot be resolved is returned unchanged.
 *
 * @example
 * normalizeUrl('page.html#section-2', 'https://docs.example.com/')
 * // 'https://docs.example.com/page.html'
 */
export function normalizeUrl(url: string, baseUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url, baseUrl);
  } catch {
    return url;
  }

  parsed.hash = '';

  const { pathname } = parsed;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    const segments = pathname.split('/');
    const lastSegment = segments[segments.length - 2];
    if (lastSegment.includes('.')) {
      parsed.pathname = pathname.slice(0, -1);
    }
  }

  return parsed.href;
}
