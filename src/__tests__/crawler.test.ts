import { describe, it, expect, vi, beforeEach } from 'vitest';
import { crawl, crawlSite, politeDelayMs } from '../crawl/crawler.js';
import { VisitedSet } from '../crawl/url-frontier.js';
import type { CrawlEvent } from '../crawl/types.js';
import type { FetchOutcome, PageFetcher } from '../fetch/types.js';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const ROOT = 'https://docs.example.com/guide/';

type Response = string | FetchOutcome | Error | 'hang';

/**
 * In-process fetcher serving canned markup. A list of responses is consumed one
 * per fetch, so retries can see different content.
 */
class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];
  closed = false;
  private responses: Map<string, Response[]>;

  constructor(site: Record<string, Response | Response[]>) {
    this.responses = new Map(
      Object.entries(site).map(([url, r]) => [url, Array.isArray(r) ? [...r] : [r]])
    );
  }

  async fetch(url: string): Promise<FetchOutcome> {
    this.calls.push(url);
    const queue = this.responses.get(url);
    const response = queue && queue.length > 1 ? queue.shift() : queue?.[0];

    if (response === undefined) {
      return { ok: false, url, error: 'other', message: 'HTTP 404', statusCode: 404, latencyMs: 1 };
    }
    if (response === 'hang') return new Promise<FetchOutcome>(() => {});
    if (response instanceof Error) throw response;
    if (typeof response === 'string') {
      return { ok: true, url, content: response, statusCode: 200, latencyMs: 1 };
    }
    return response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function page(title: string, links: string[] = []): string {
  const anchors = links.map((href) => `<a href="${href}">${href}</a>`).join('\n');
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body><h1>${title}</h1>${anchors}</body></html>`;
}

const noSleep = async (): Promise<void> => {};

const SITE: Record<string, string> = {
  [ROOT]: page('Guide', ['a', 'b', '/blog/launch', 'https://example.org/', '/other/page', 'a']),
  'https://docs.example.com/guide/a': page('Page A', ['c', '/guide/']),
  'https://docs.example.com/guide/b': page('Page B', ['c', '/other/page']),
  'https://docs.example.com/guide/c': page('Page C'),
};

describe('politeDelayMs', () => {
  it('is zero when the delay is disabled', () => {
    expect(politeDelayMs(0, 1, () => 0.9)).toBe(0);
  });

  it('draws from [delay, delay * (1 + jitter)]', () => {
    expect(politeDelayMs(2, 1, () => 0)).toBe(2000);
    expect(politeDelayMs(2, 1, () => 0.5)).toBe(3000);
    expect(politeDelayMs(2, 0, () => 0.5)).toBe(2000);
  });
});

describe('crawl', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('breadth-first traversal', () => {
    it('fetches pages in discovery order and returns them in that order', async () => {
      const fetcher = new FakeFetcher(SITE);
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(fetcher.calls).toEqual([
        ROOT,
        'https://docs.example.com/guide/a',
        'https://docs.example.com/guide/b',
        'https://docs.example.com/guide/c',
      ]);
      expect(result.pages.map((p) => [p.title, p.depth])).toEqual([
        ['Guide', 0],
        ['Page A', 1],
        ['Page B', 1],
        ['Page C', 2],
      ]);
      expect(result.pages[0].content).toBe(SITE[ROOT]);
    });

    it('never fetches a URL twice', async () => {
      const fetcher = new FakeFetcher(SITE);
      await crawl(ROOT, { fetcher, sleep: noSleep });
      expect(new Set(fetcher.calls).size).toBe(fetcher.calls.length);
    });

    it('records each out-of-scope URL once, with external and non-document links too', async () => {
      const fetcher = new FakeFetcher(SITE);
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(result.skippedUrls).toEqual([
        'https://docs.example.com/blog/launch',
        'https://example.org/',
        'https://docs.example.com/other/page',
      ]);
    });

    it('ends with a summary', async () => {
      const fetcher = new FakeFetcher(SITE);
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(result.summary).toMatchObject({
        type: 'summary',
        startUrl: ROOT,
        pagesSuccess: 4,
        pagesFailed: 0,
        urlsSkipped: 3,
        urlsVisited: 4,
      });
    });

    it('streams events from crawlSite with the summary last', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: page('Only') });
      const events: CrawlEvent[] = [];
      for await (const event of crawlSite(ROOT, { fetcher, sleep: noSleep })) {
        events.push(event);
      }

      expect(events.map((e) => e.type)).toEqual(['page', 'summary']);
    });

    it('normalizes the start URL', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: page('Guide') });
      await crawl('https://Docs.Example.com/guide/#intro', { fetcher, sleep: noSleep });
      expect(fetcher.calls).toEqual([ROOT]);
    });
  });

  describe('depth bound', () => {
    it('with maxDepth=1 fetches the root and its children only', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('Root', ['page1']),
        'https://docs.example.com/guide/page1': page('Page 1', ['page2']),
        'https://docs.example.com/guide/page2': page('Page 2'),
      });
      const visited = new VisitedSet();
      const result = await crawl(ROOT, { fetcher, maxDepth: 1, visited, sleep: noSleep });

      expect(result.pages.map((p) => p.url)).toEqual([
        ROOT,
        'https://docs.example.com/guide/page1',
      ]);
      expect(fetcher.calls).not.toContain('https://docs.example.com/guide/page2');
      expect(visited.has('https://docs.example.com/guide/page2')).toBe(false);
      expect(result.skippedUrls).toEqual([]);
    });

    it.each([-1, 1.5])('rejects maxDepth=%s before fetching anything', async (maxDepth) => {
      const fetcher = new FakeFetcher(SITE);
      await expect(crawl(ROOT, { fetcher, maxDepth, sleep: noSleep })).rejects.toThrow(
        `maxDepth must be a non-negative integer, got ${maxDepth}`
      );
      expect(fetcher.calls).toEqual([]);
    });

    it('with maxDepth=0 fetches only the root', async () => {
      const fetcher = new FakeFetcher(SITE);
      const result = await crawl(ROOT, { fetcher, maxDepth: 0, sleep: noSleep });
      expect(fetcher.calls).toEqual([ROOT]);
      expect(result.pages).toHaveLength(1);
    });
  });

  describe('failures', () => {
    it('records a failed fetch and keeps crawling', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('Root', ['missing', 'present']),
        'https://docs.example.com/guide/present': page('Present'),
      });
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(result.failedUrls).toEqual(['https://docs.example.com/guide/missing']);
      expect(result.failures).toEqual([
        {
          url: 'https://docs.example.com/guide/missing',
          depth: 1,
          reason: 'fetch_error',
          message: 'HTTP 404',
        },
      ]);
      expect(result.pages.map((p) => p.title)).toEqual(['Root', 'Present']);
    });

    it('maps a blocked response to "blocked"', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: {
          ok: false,
          url: ROOT,
          error: 'blocked',
          message: 'HTTP 403',
          statusCode: 403,
          latencyMs: 1,
        },
      });
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(result.pages).toEqual([]);
      expect(result.failures[0].reason).toBe('blocked');
      expect(result.summary.pagesFailed).toBe(1);
    });

    it('turns a thrown error into a fetch_error failure', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('Root', ['broken']),
        'https://docs.example.com/guide/broken': new Error('socket hang up'),
      });
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(result.failures).toEqual([
        {
          url: 'https://docs.example.com/guide/broken',
          depth: 1,
          reason: 'fetch_error',
          message: 'socket hang up',
        },
      ]);
    });

    it('gives up on a fetch that never settles', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('Root', ['slow', 'fast']),
        'https://docs.example.com/guide/slow': 'hang',
        'https://docs.example.com/guide/fast': page('Fast'),
      });
      const result = await crawl(ROOT, { fetcher, timeoutMs: 10, sleep: noSleep });

      expect(result.failures).toEqual([
        {
          url: 'https://docs.example.com/guide/slow',
          depth: 1,
          reason: 'timeout',
          message: 'No response within 10ms',
        },
      ]);
      expect(result.pages.map((p) => p.title)).toEqual(['Root', 'Fast']);
    });

    it('fails a soft 404 page without following its links', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('Root', ['gone']),
        'https://docs.example.com/guide/gone': page('Page Not Found', ['hidden']),
        'https://docs.example.com/guide/hidden': page('Hidden'),
      });
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(result.failures).toEqual([
        {
          url: 'https://docs.example.com/guide/gone',
          depth: 1,
          reason: 'soft_not_found',
          message: 'Soft 404 [content: page not found]',
        },
      ]);
      expect(fetcher.calls).not.toContain('https://docs.example.com/guide/hidden');
    });
  });

  describe('bot challenge', () => {
    const challenge = page('Check', []).replace(
      '<h1>Check</h1>',
      "<p>Please verify that you're not a robot.</p>"
    );

    it('waits and re-fetches once, keeping the second response', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: [challenge, page('Recovered')] });
      const sleep = vi.fn(noSleep);
      const result = await crawl(ROOT, {
        fetcher,
        delaySeconds: 0,
        botRetryDelayMs: 5000,
        sleep,
      });

      expect(fetcher.calls).toEqual([ROOT, ROOT]);
      expect(sleep).toHaveBeenCalledWith(5000);
      expect(result.pages.map((p) => p.title)).toEqual(['Recovered']);
    });

    it('marks the URL bot_blocked when the challenge persists', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: challenge });
      const result = await crawl(ROOT, { fetcher, sleep: noSleep });

      expect(fetcher.calls).toEqual([ROOT, ROOT]);
      expect(result.failures).toEqual([
        {
          url: ROOT,
          depth: 0,
          reason: 'bot_blocked',
          message: 'Bot challenge [content: Human verification challenge]',
        },
      ]);
    });
  });

  describe('options', () => {
    it('leaves URLs already in an injected visited set alone', async () => {
      const fetcher = new FakeFetcher(SITE);
      const visited = new VisitedSet();
      visited.markVisited('https://docs.example.com/guide/b');

      const result = await crawl(ROOT, { fetcher, visited, sleep: noSleep });

      expect(fetcher.calls).toEqual([
        ROOT,
        'https://docs.example.com/guide/a',
        'https://docs.example.com/guide/c',
      ]);
      expect(result.skippedUrls).not.toContain('https://docs.example.com/guide/b');
    });

    it('pauses before every fetch with the polite delay', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: page('Root', ['next']), [`${ROOT}next`]: page('Next') });
      const sleep = vi.fn(noSleep);
      await crawl(ROOT, { fetcher, delaySeconds: 2, delayJitter: 1, random: () => 0.5, sleep });

      expect(sleep.mock.calls).toEqual([[3000], [3000]]);
    });

    it('applies include and exclude globs', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('Root', ['tutorials/one', 'internal/notes', 'reference']),
        'https://docs.example.com/guide/tutorials/one': page('Tutorial'),
        'https://docs.example.com/guide/internal/notes': page('Notes'),
        'https://docs.example.com/guide/reference': page('Reference'),
      });
      const result = await crawl(ROOT, {
        fetcher,
        exclude: ['/guide/internal/**'],
        sleep: noSleep,
      });

      expect(result.pages.map((p) => p.title)).toEqual(['Root', 'Tutorial', 'Reference']);
      expect(result.skippedUrls).toEqual(['https://docs.example.com/guide/internal/notes']);
    });

    it('uses custom rules', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('Root', ['changelog', 'setup']),
        'https://docs.example.com/guide/setup': page('Setup'),
      });
      const result = await crawl(ROOT, {
        fetcher,
        sleep: noSleep,
        rules: {
          excludedExtensions: [],
          excludedPathPatterns: ['/changelog'],
          softNotFoundPhrases: [],
          botChallengePatterns: [],
        },
      });

      expect(result.pages.map((p) => p.title)).toEqual(['Root', 'Setup']);
      expect(result.skippedUrls).toEqual(['https://docs.example.com/guide/changelog']);
    });
  });
});
