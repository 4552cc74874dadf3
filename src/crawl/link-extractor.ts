/**
 * Extract followable links and the title from rendered markup
 */
import { parseHTML } from 'linkedom';
import type { CrawlRules } from '../rules/crawl-rules.js';
import { normalizeUrl } from './url-normalizer.js';
import { isDocumentLike, isInternal } from './scope-filter.js';
import type { ScopeRejection } from './scope-filter.js';

const NON_NAVIGATIONAL = ['javascript:', 'mailto:', 'tel:', '#'];

const UNTITLED = 'Untitled Page';

export interface ExtractLinksOptions {
  rules: CrawlRules;
  /** Called once per distinct candidate dropped by the internal or document check */
  onReject?: (url: string, reason: ScopeRejection) => void;
}

function isNavigational(href: string): boolean {
  const lower = href.toLowerCase();
  return !NON_NAVIGATIONAL.some((prefix) => lower.startsWith(prefix));
}

/**
 * Collect `<a href>` targets, normalized against `sourceUrl`, that stay on the source
 * host and look like documents. Duplicate-free, in document order.
 *
 * In-path scope is not checked here: the scheduler tests it against the crawl root.
 */
export function extractLinks(
  html: string,
  sourceUrl: string,
  options: ExtractLinksOptions
): string[] {
  const { document } = parseHTML(html);
  const links: string[] = [];
  const seen = new Set<string>();

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href')?.trim();
    if (!href || !isNavigational(href)) continue;

    let resolved: URL;
    try {
      resolved = new URL(href, sourceUrl);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;

    const normalized = normalizeUrl(resolved.href, sourceUrl);
    if (seen.has(normalized)) continue;
    seen.add(normalized);

    if (!isInternal(normalized, sourceUrl)) {
      options.onReject?.(normalized, 'external');
      continue;
    }
    if (!isDocumentLike(normalized, options.rules)) {
      options.onReject?.(normalized, 'not_document');
      continue;
    }

    links.push(normalized);
  }

  return links;
}

/** `<title>`, else the first `<h1>`, else "Untitled Page". */
export function extractTitle(html: string): string {
  const { document } = parseHTML(html);

  const title = document.querySelector('title')?.textContent?.trim();
  if (title) return title;

  const heading = document.querySelector('h1')?.textContent?.trim();
  if (heading) return heading;

  return UNTITLED;
}
