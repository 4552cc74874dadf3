/**
 * Crawl scheduler: an AsyncGenerator that walks the documentation tree breadth-first
 */
import { classifyPage, formatVerdict } from '../antibot/detector.js';
import type { FetchErrorKind, FetchOutcome, PageFetcher } from '../fetch/types.js';
import { logger } from '../logger.js';
import { getDefaultCrawlRules } from '../rules/crawl-rules.js';
import type { CrawlRules } from '../rules/crawl-rules.js';
import { extractLinks, extractTitle } from './link-extractor.js';
import { checkScope, createCrawlTarget, createPathMatcher } from './scope-filter.js';
import { normalizeUrl } from './url-normalizer.js';
import { UrlFrontier } from './url-frontier.js';
import type { FrontierEntry } from './url-frontier.js';
import type {
  CrawlEvent,
  CrawlFailure,
  CrawlOptions,
  CrawlResult,
  CrawlSummary,
  CrawledPage,
  FailureReason,
  SkippedUrl,
} from './types.js';

const DEFAULT_MAX_DEPTH = 10;
const DEFAULT_DELAY_SECONDS = 2;
const DEFAULT_DELAY_JITTER = 1;
const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_BOT_RETRY_DELAY_MS = 5000;

/** Slack on top of the fetcher's own timeout before the crawler gives up on it */
const FETCH_TIMEOUT_GRACE_MS = 1000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Pause before a fetch, drawn uniformly from [delay, delay * (1 + jitter)].
 */
export function politeDelayMs(delaySeconds: number, jitter: number, random: () => number): number {
  if (delaySeconds <= 0) return 0;
  const baseMs = delaySeconds * 1000;
  return baseMs + random() * baseMs * Math.max(0, jitter);
}

function toFailureReason(error: FetchErrorKind): FailureReason {
  switch (error) {
    case 'timeout':
      return 'timeout';
    case 'blocked':
      return 'blocked';
    default:
      return 'fetch_error';
  }
}

/**
 * Run one fetch with a hard deadline. A fetcher that throws or overruns its
 * timeout yields a failed outcome instead of aborting the crawl.
 */
async function fetchWithDeadline(
  fetcher: PageFetcher,
  url: string,
  timeoutMs: number
): Promise<FetchOutcome> {
  const start = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<FetchOutcome>((resolve) => {
    timer = setTimeout(
      () =>
        resolve({
          ok: false,
          url,
          error: 'timeout',
          message: `No response within ${timeoutMs}ms`,
          statusCode: null,
          latencyMs: Date.now() - start,
        }),
      timeoutMs + FETCH_TIMEOUT_GRACE_MS
    );
  });

  try {
    return await Promise.race([fetcher.fetch(url, timeoutMs), deadline]);
  } catch (error) {
    return {
      ok: false,
      url,
      error: 'other',
      message: error instanceof Error ? error.message : String(error),
      statusCode: null,
      latencyMs: Date.now() - start,
    };
  } finally {
    clearTimeout(timer);
  }
}

interface FetchContext {
  fetcher: PageFetcher;
  rules: CrawlRules;
  timeoutMs: number;
  botRetryDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

type PageFetch = { ok: true; html: string } | { ok: false; failure: CrawlFailure };

/**
 * Fetch and classify one frontier entry. A bot challenge earns exactly one
 * delayed re-fetch; a soft 404 fails immediately.
 */
async function fetchPage(entry: FrontierEntry, ctx: FetchContext): Promise<PageFetch> {
  const fail = (reason: FailureReason, message: string): PageFetch => ({
    ok: false,
    failure: { url: entry.url, depth: entry.depth, reason, message },
  });

  const first = await fetchWithDeadline(ctx.fetcher, entry.url, ctx.timeoutMs);
  if (!first.ok) return fail(toFailureReason(first.error), first.message);

  let html = first.content;
  let verdict = classifyPage(html, ctx.rules);

  if (verdict.kind === 'bot_challenge') {
    logger.warn(
      { url: entry.url, evidence: verdict.evidence, waitMs: ctx.botRetryDelayMs },
      'Bot detection triggered, waiting before one re-fetch'
    );
    await ctx.sleep(ctx.botRetryDelayMs);

    const retry = await fetchWithDeadline(ctx.fetcher, entry.url, ctx.timeoutMs);
    if (!retry.ok) return fail(toFailureReason(retry.error), retry.message);

    html = retry.content;
    verdict = classifyPage(html, ctx.rules);
    if (verdict.kind === 'bot_challenge') return fail('bot_blocked', formatVerdict(verdict));
  }

  if (verdict.kind === 'soft_not_found') return fail('soft_not_found', formatVerdict(verdict));

  return { ok: true, html };
}

/**
 * Crawl a documentation tree starting from `startUrl`.
 * Yields an event per fetched, failed or skipped URL, then a summary.
 *
 * One fetch runs at a time in FIFO order, so the page order is deterministic
 * breadth-first discovery order. Links are only followed when they stay on the
 * root's host, under the root's path, look like documents and pass the optional
 * include/exclude globs.
 *
 * @throws RangeError when `maxDepth` is negative or fractional
 */
export async function* crawlSite(
  startUrl: string,
  options: CrawlOptions
): AsyncGenerator<CrawlEvent> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  // The root sits at depth 0, so a negative bound would refuse it
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  const delaySeconds = options.delaySeconds ?? DEFAULT_DELAY_SECONDS;
  const delayJitter = options.delayJitter ?? DEFAULT_DELAY_JITTER;
  const rules = options.rules ?? getDefaultCrawlRules();
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const crawlStartTime = Date.now();

  const ctx: FetchContext = {
    fetcher: options.fetcher,
    rules,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    botRetryDelayMs: options.botRetryDelayMs ?? DEFAULT_BOT_RETRY_DELAY_MS,
    sleep,
  };

  const target = createCrawlTarget(startUrl);
  const matchesPaths = createPathMatcher({ include: options.include, exclude: options.exclude });
  const frontier = new UrlFrontier({ maxDepth, visited: options.visited });
  const skipped = new Set<string>();

  let pagesSuccess = 0;
  let pagesFailed = 0;

  frontier.add(target.rootUrl, 0);
  logger.info(
    { startUrl: target.rootUrl, pathPrefix: target.pathPrefix || '/', maxDepth },
    'Starting crawl'
  );

  while (frontier.hasMore()) {
    const entry = frontier.next();
    if (!entry) break;

    if (entry.depth > maxDepth) {
      logger.debug({ url: entry.url, depth: entry.depth }, 'Skipping: exceeded max depth');
      continue;
    }

    logger.info({ url: entry.url, depth: entry.depth, done: pagesSuccess }, 'Crawling');
    await sleep(politeDelayMs(delaySeconds, delayJitter, random));

    const fetched = await fetchPage(entry, ctx);
    if (!fetched.ok) {
      pagesFailed++;
      logger.warn(
        { url: entry.url, reason: fetched.failure.reason, message: fetched.failure.message },
        'Page failed'
      );
      yield { type: 'failed', failure: fetched.failure };
      continue;
    }

    const page: CrawledPage = {
      url: entry.url,
      title: extractTitle(fetched.html),
      content: fetched.html,
      depth: entry.depth,
    };
    pagesSuccess++;
    yield { type: 'page', page };

    const rejected: SkippedUrl[] = [];
    const links = extractLinks(fetched.html, entry.url, {
      rules,
      onReject: (url, reason) => rejected.push({ url, reason }),
    });

    let added = 0;
    for (const link of links) {
      const normalized = normalizeUrl(link, entry.url);
      if (frontier.isVisited(normalized)) continue;

      const rejection = checkScope(normalized, target, rules, matchesPaths);
      if (rejection) {
        rejected.push({ url: normalized, reason: rejection });
        continue;
      }

      if (frontier.add(normalized, entry.depth + 1)) added++;
    }
    logger.debug({ url: entry.url, links: links.length, added }, 'Links processed');

    for (const item of rejected) {
      if (skipped.has(item.url) || frontier.isVisited(item.url)) continue;
      skipped.add(item.url);
      yield { type: 'skipped', skipped: item };
    }
  }

  const summary: CrawlSummary = {
    type: 'summary',
    startUrl: target.rootUrl,
    pagesSuccess,
    pagesFailed,
    urlsSkipped: skipped.size,
    urlsVisited: frontier.visitedCount,
    durationMs: Date.now() - crawlStartTime,
  };
  logger.info(
    { pages: pagesSuccess, failed: pagesFailed, skipped: skipped.size },
    'Crawl complete'
  );
  yield summary;
}

/**
 * Run a crawl to exhaustion and collect its events into a {@link CrawlResult}.
 */
export async function crawl(startUrl: string, options: CrawlOptions): Promise<CrawlResult> {
  const pages: CrawledPage[] = [];
  const failures: CrawlFailure[] = [];
  const skippedUrls: string[] = [];
  let summary: CrawlSummary | null = null;

  for await (const event of crawlSite(startUrl, options)) {
    switch (event.type) {
      case 'page':
        pages.push(event.page);
        break;
      case 'failed':
        failures.push(event.failure);
        break;
      case 'skipped':
        skippedUrls.push(event.skipped.url);
        break;
      case 'summary':
        summary = event;
        break;
    }
  }

  if (!summary) {
    throw new Error(`Crawl of ${startUrl} ended without a summary`);
  }

  return {
    pages,
    failedUrls: failures.map((failure) => failure.url),
    skippedUrls,
    failures,
    summary,
  };
}
