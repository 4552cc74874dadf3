/**
 * Crawl module barrel exports
 */
export { crawl, crawlSite, politeDelayMs } from './crawler.js';
export { extractLinks, extractTitle } from './link-extractor.js';
export {
  checkScope,
  createCrawlTarget,
  createPathMatcher,
  isDocumentLike,
  isInPath,
  isInternal,
} from './scope-filter.js';
export { normalizeUrl } from './url-normalizer.js';
export { UrlFrontier, VisitedSet } from './url-frontier.js';
export type { CrawlTarget, ScopeRejection } from './scope-filter.js';
export type { FrontierEntry } from './url-frontier.js';
export type {
  CrawlEvent,
  CrawlFailure,
  CrawlOptions,
  CrawlResult,
  CrawlSummary,
  CrawledPage,
  FailureReason,
  SkippedUrl,
} from './types.js';
