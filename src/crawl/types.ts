/**
 * Types for the crawl module
 */
import type { CrawlRules } from '../rules/crawl-rules.js';
import type { PageFetcher } from '../fetch/types.js';
import type { ScopeRejection } from './scope-filter.js';
import type { VisitedSet } from './url-frontier.js';

export interface CrawlOptions {
  fetcher: PageFetcher;
  maxDepth?: number;
  /** Minimum pause before each fetch, in seconds */
  delaySeconds?: number;
  /** Each pause is drawn from [delay, delay * (1 + jitter)] */
  delayJitter?: number;
  /** Per-fetch timeout */
  timeoutMs?: number;
  /** Wait before the single re-fetch after a bot challenge */
  botRetryDelayMs?: number;
  rules?: CrawlRules;
  /** Path globs a URL must match to be followed */
  include?: string[];
  /** Path globs that exclude a URL */
  exclude?: string[];
  visited?: VisitedSet;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/** Successfully fetched page that passed classification. */
export interface CrawledPage {
  readonly url: string;
  readonly title: string;
  /** Rendered markup */
  readonly content: string;
  readonly depth: number;
}

export type FailureReason = 'timeout' | 'blocked' | 'fetch_error' | 'bot_blocked' | 'soft_not_found';

export interface CrawlFailure {
  url: string;
  depth: number;
  reason: FailureReason;
  message?: string;
}

export interface SkippedUrl {
  url: string;
  reason: ScopeRejection;
}

export type CrawlEvent =
  | { type: 'page'; page: CrawledPage }
  | { type: 'failed'; failure: CrawlFailure }
  | { type: 'skipped'; skipped: SkippedUrl }
  | CrawlSummary;

export interface CrawlSummary {
  type: 'summary';
  startUrl: string;
  pagesSuccess: number;
  pagesFailed: number;
  urlsSkipped: number;
  urlsVisited: number;
  durationMs: number;
}

export interface CrawlResult {
  /** In completion order, which is BFS discovery order */
  pages: CrawledPage[];
  failedUrls: string[];
  skippedUrls: string[];
  /** Same order as failedUrls, with the reason for each */
  failures: CrawlFailure[];
  summary: CrawlSummary;
}
