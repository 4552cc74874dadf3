/**
 * Headless Chromium launch shared by the fetcher and the PDF converter
 */
import { chromium } from 'playwright-core';
import type { Browser } from 'playwright-core';
import { logger } from '../logger.js';

export interface BrowserLaunchOptions {
  /** Chromium/Chrome executable; defaults to DOCSITE_BROWSER_PATH, then Playwright's lookup */
  executablePath?: string;
  headless?: boolean;
}

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--no-sandbox',
  '--disable-dev-shm-usage',
];

export function resolveExecutablePath(explicit?: string): string | undefined {
  return explicit || process.env.DOCSITE_BROWSER_PATH || undefined;
}

export async function launchBrowser(options: BrowserLaunchOptions = {}): Promise<Browser> {
  const executablePath = resolveExecutablePath(options.executablePath);
  logger.debug({ executablePath: executablePath ?? 'playwright-default' }, 'Launching Chromium');
  return chromium.launch({
    headless: options.headless ?? true,
    executablePath,
    args: LAUNCH_ARGS,
  });
}
