/**
 * Shared types for the fetch module
 */

export type FetchErrorKind = 'timeout' | 'blocked' | 'other';

/** Result of rendering one URL. Errors are values; fetchers do not throw per URL. */
export type FetchOutcome =
  | { ok: true; url: string; content: string; statusCode: number | null; latencyMs: number }
  | {
      ok: false;
      url: string;
      error: FetchErrorKind;
      message: string;
      statusCode: number | null;
      latencyMs: number;
    };

/**
 * Renders a URL into DOM-stable markup. Implementations own any session state
 * (browser contexts, connection pools); the crawler only sees this operation.
 */
export interface PageFetcher {
  fetch(url: string, timeoutMs: number): Promise<FetchOutcome>;
  close(): Promise<void>;
}
