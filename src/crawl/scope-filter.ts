/**
 * Scope predicates deciding which discovered URLs the crawl may follow
 */
import picomatch from 'picomatch';
import type { CrawlRules } from '../rules/crawl-rules.js';
import { normalizeUrl } from './url-normalizer.js';

/** Why a URL was left out of the crawl. Not an error: skipped URLs are never retried. */
export type ScopeRejection = 'external' | 'out_of_path' | 'not_document' | 'excluded_pattern';

/** Root of a crawl: fixed for the whole traversal. */
export interface CrawlTarget {
  readonly rootUrl: string;
  /** Lower-case host, including a non-default port */
  readonly host: string;
  /** Root pathname without trailing slashes; `''` for a site root */
  readonly pathPrefix: string;
}

const SCHEME_RE = /^[a-z][a-z\d+.-]*:/i;

/** Base used only to extract the path of a relative reference. */
const PATH_ONLY_BASE = 'http://path.invalid';

export function createCrawlTarget(rootUrl: string): CrawlTarget {
  const normalized = normalizeUrl(rootUrl, rootUrl);
  const parsed = new URL(normalized);
  return Object.freeze({
    rootUrl: normalized,
    host: parsed.host,
    pathPrefix: stripTrailingSlashes(parsed.pathname),
  });
}

function stripTrailingSlashes(path: string): string {
  return path.replace(/\/+$/, '');
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}

/**
 * A URL is internal when it is relative (no scheme, no `//` authority) or its host
 * equals the base host. Host comparison is case-insensitive; subdomains are external.
 */
export function isInternal(url: string, baseUrl: string): boolean {
  const baseHost = hostOf(baseUrl);
  if (SCHEME_RE.test(url)) {
    return baseHost !== null && hostOf(url) === baseHost;
  }
  if (url.startsWith('//')) {
    try {
      return new URL(url, baseUrl).host === baseHost;
    } catch {
      return false;
    }
  }
  return true;
}

/**
 * Same host as the base and a path starting with the base path (trailing slashes
 * stripped). Only absolute URLs qualify.
 */
export function isInPath(url: string, baseUrl: string): boolean {
  let parsedUrl: URL;
  let parsedBase: URL;
  try {
    parsedUrl = new URL(url);
    parsedBase = new URL(baseUrl);
  } catch {
    return false;
  }

  if (parsedUrl.host !== parsedBase.host) return false;
  return parsedUrl.pathname.startsWith(stripTrailingSlashes(parsedBase.pathname));
}

/**
 * False for static assets, downloads and excluded site sections. Only the path is
 * inspected, lower-cased; query and host never are.
 */
export function isDocumentLike(url: string, rules: CrawlRules): boolean {
  let path: string;
  try {
    path = new URL(url, PATH_ONLY_BASE).pathname.toLowerCase();
  } catch {
    return false;
  }

  if (rules.excludedExtensions.some((ext) => path.endsWith(ext))) return false;
  if (rules.excludedPathPatterns.some((pattern) => path.includes(pattern))) return false;
  return true;
}

export interface PathPatterns {
  include?: string[];
  exclude?: string[];
}

export type PathMatcher = (url: string) => boolean;

/**
 * Compile include/exclude globs into one predicate over the URL pathname.
 * With no patterns every URL matches.
 */
export function createPathMatcher(patterns: PathPatterns = {}): PathMatcher {
  const includeMatcher =
    patterns.include && patterns.include.length > 0
      ? picomatch(patterns.include, { dot: true })
      : null;
  const excludeMatcher =
    patterns.exclude && patterns.exclude.length > 0
      ? picomatch(patterns.exclude, { dot: true })
      : null;

  return (url: string) => {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return false;
    }
    if (includeMatcher && !includeMatcher(pathname)) return false;
    if (excludeMatcher && excludeMatcher(pathname)) return false;
    return true;
  };
}

/**
 * Run every scope check against the crawl target, cheapest first.
 * Returns null when the URL may be enqueued.
 */
export function checkScope(
  url: string,
  target: CrawlTarget,
  rules: CrawlRules,
  matchesPaths: PathMatcher = () => true
): ScopeRejection | null {
  if (!isInternal(url, target.rootUrl)) return 'external';
  if (!isInPath(url, target.rootUrl)) return 'out_of_path';
  if (!isDocumentLike(url, rules)) return 'not_document';
  if (!matchesPaths(url)) return 'excluded_pattern';
  return null;
}
