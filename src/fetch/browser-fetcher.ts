/**
 * Browser-backed page fetcher with periodic session rotation.
 * The browser context is torn down and recreated every few fetches so a long
 * crawl does not present a single, long-lived fingerprint.
 */
import { errors } from 'playwright-core';
import type { Browser, BrowserContext, Page } from 'playwright-core';
import { logger } from '../logger.js';
import { DESKTOP_USER_AGENT, launchBrowser } from './browser.js';
import type { BrowserLaunchOptions } from './browser.js';
import type { FetchOutcome, PageFetcher } from './types.js';

/** Rendering waits, capped by whatever is left of the caller's timeout */
const RENDER_SETTLE_MS = 2000;
const NETWORK_IDLE_MAX_MS = 10000;

const DEFAULT_MAX_FETCHES_PER_SESSION = 10;

const BLOCKED_STATUSES = new Set([403, 429]);

/** Hides the most common automation tells from page scripts */
const STEALTH_SCRIPT = `
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
  Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
`;

export interface BrowserFetcherOptions extends BrowserLaunchOptions {
  userAgent?: string;
  /** Recreate the browser context after this many fetches */
  maxFetchesPerSession?: number;
}

/** Session metadata for lifecycle management */
interface Session {
  context: BrowserContext;
  page: Page;
  fetchCount: number;
  created: number;
}

export class BrowserFetcher implements PageFetcher {
  /** Pending or settled launch, shared by every caller */
  private browserPromise: Promise<Browser> | null = null;
  private session: Session | null = null;
  /** Context being opened; concurrent callers wait on the same one */
  private sessionPromise: Promise<Session> | null = null;
  private sessionsCreated = 0;
  private readonly userAgent: string;
  private readonly maxFetchesPerSession: number;

  constructor(private readonly options: BrowserFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DESKTOP_USER_AGENT;
    this.maxFetchesPerSession = options.maxFetchesPerSession ?? DEFAULT_MAX_FETCHES_PER_SESSION;
  }

  async fetch(url: string, timeoutMs: number): Promise<FetchOutcome> {
    const start = Date.now();
    const deadline = start + timeoutMs;

    try {
      const session = await this.acquireSession();
      session.fetchCount++;

      // Launch and rotation come out of the same budget as navigation
      const response = await session.page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: Math.max(1, deadline - Date.now()),
      });
      const statusCode = response?.status() ?? null;

      if (statusCode !== null && statusCode >= 400) {
        return {
          ok: false,
          url,
          error: BLOCKED_STATUSES.has(statusCode) ? 'blocked' : 'other',
          message: `HTTP ${statusCode}`,
          statusCode,
          latencyMs: Date.now() - start,
        };
      }

      await this.settle(session.page, url, deadline);

      return {
        ok: true,
        url,
        content: await session.page.content(),
        statusCode,
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      const isTimeout = error instanceof errors.TimeoutError;
      const message = error instanceof Error ? error.message : String(error);
      logger.debug({ url, error: message }, isTimeout ? 'Page load timed out' : 'Page load failed');
      return {
        ok: false,
        url,
        error: isTimeout ? 'timeout' : 'other',
        message,
        statusCode: null,
        latencyMs: Date.now() - start,
      };
    }
  }

  /** Give client-side rendering time to finish, within the remaining budget. */
  private async settle(page: Page, url: string, deadline: number): Promise<void> {
    const renderWait = Math.min(RENDER_SETTLE_MS, deadline - Date.now());
    if (renderWait > 0) await page.waitForTimeout(renderWait);

    const idleWait = Math.min(NETWORK_IDLE_MAX_MS, deadline - Date.now());
    if (idleWait <= 0) return;

    try {
      await page.waitForLoadState('networkidle', { timeout: idleWait });
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) throw error;
      // Long-polling pages never go idle; the DOM is usually complete by now
      logger.debug({ url, idleWait }, 'Network did not go idle, using current DOM');
    }
  }

  private acquireSession(): Promise<Session> {
    if (this.session && this.session.fetchCount < this.maxFetchesPerSession) {
      return Promise.resolve(this.session);
    }
    if (!this.sessionPromise) {
      this.sessionPromise = this.openSession().finally(() => {
        this.sessionPromise = null;
      });
    }
    return this.sessionPromise;
  }

  private async openSession(): Promise<Session> {
    if (this.session) {
      logger.info(
        {
          fetches: this.session.fetchCount,
          ageMs: Date.now() - this.session.created,
        },
        'Rotating browser context'
      );
      await this.closeSession();
    }

    const browser = await this.getBrowser();
    const context = await browser.newContext({
      userAgent: this.userAgent,
      viewport: { width: 1920, height: 1080 },
      locale: 'en-US',
      timezoneId: 'America/New_York',
      javaScriptEnabled: true,
    });
    await context.addInitScript({ content: STEALTH_SCRIPT });
    const page = await context.newPage();

    this.sessionsCreated++;
    this.session = { context, page, fetchCount: 0, created: Date.now() };
    return this.session;
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browserPromise) {
      this.browserPromise = launchBrowser(this.options).catch((error: unknown) => {
        this.browserPromise = null;
        throw error;
      });
    }
    return this.browserPromise;
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) return;
    try {
      await session.context.close();
    } catch (error) {
      logger.warn({ error: String(error) }, 'Error closing browser context');
    }
  }

  /** Number of browser contexts opened so far */
  get sessionCount(): number {
    return this.sessionsCreated;
  }

  /**
   * Close the context and the browser. Waits for a launch or context that is
   * still opening, so an abandoned fetch cannot leave Chromium running.
   */
  async close(): Promise<void> {
    const pendingSession = this.sessionPromise;
    if (pendingSession) {
      try {
        await pendingSession;
      } catch (error) {
        logger.debug({ error: String(error) }, 'Pending browser context failed to open');
      }
    }
    await this.closeSession();

    const browserPromise = this.browserPromise;
    this.browserPromise = null;
    if (!browserPromise) return;

    let browser: Browser;
    try {
      browser = await browserPromise;
    } catch (error) {
      logger.debug({ error: String(error) }, 'Browser never started');
      return;
    }
    await browser.close();
    logger.info('Browser stopped');
  }
}
