/**
 * Renders crawled pages to individual PDF files with headless Chromium.
 * Pages are printed from their already-rendered markup with scripts disabled and
 * every network request aborted, so printing never waits on the live site.
 */
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Browser, BrowserContext } from 'playwright-core';
import type { CrawledPage } from '../crawl/types.js';
import { launchBrowser } from '../fetch/browser.js';
import type { BrowserLaunchOptions } from '../fetch/browser.js';
import { logger } from '../logger.js';
import { preparePrintHtml } from './html-sanitizer.js';
import type { ConversionResult, PageConverter } from './types.js';

const SET_CONTENT_TIMEOUT_MS = 30000;

const PAGE_MARGINS = { top: '20mm', right: '15mm', bottom: '20mm', left: '15mm' };

export interface PdfConverterOptions extends BrowserLaunchOptions {
  /** Directory for per-page PDFs; a fresh temp directory by default */
  workDir?: string;
}

export class BrowserPdfConverter implements PageConverter {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private workDir: string | null;
  private ownsWorkDir: boolean;

  constructor(private readonly options: PdfConverterOptions = {}) {
    this.workDir = options.workDir ?? null;
    this.ownsWorkDir = !options.workDir;
  }

  async convertPages(pages: readonly CrawledPage[]): Promise<ConversionResult[]> {
    const results: ConversionResult[] = [];
    const total = pages.length;

    for (const [index, page] of pages.entries()) {
      logger.info(
        { index: index + 1, total, title: page.title.slice(0, 50) },
        'Converting page'
      );
      const result = await this.convertPage(page, index);
      if (result.success) {
        logger.debug({ url: page.url, pdfPath: result.pdfPath }, 'Page converted');
      } else {
        logger.warn({ url: page.url, error: result.error }, 'Page conversion failed');
      }
      results.push(result);
    }

    return results;
  }

  private async convertPage(page: CrawledPage, index: number): Promise<ConversionResult> {
    const base = { url: page.url, title: page.title };
    try {
      const workDir = await this.ensureWorkDir();
      const context = await this.ensureContext();
      const pdfPath = join(workDir, `page_${String(index).padStart(4, '0')}.pdf`);

      const tab = await context.newPage();
      try {
        await tab.setContent(preparePrintHtml(page.content, page.url), {
          waitUntil: 'load',
          timeout: SET_CONTENT_TIMEOUT_MS,
        });
        await tab.pdf({ path: pdfPath, format: 'A4', margin: PAGE_MARGINS, printBackground: true });
      } finally {
        await tab.close();
      }

      const { size } = await stat(pdfPath);
      if (size === 0) {
        return { ...base, pdfPath: null, success: false, error: 'PDF file is empty' };
      }
      return { ...base, pdfPath, success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ...base, pdfPath: null, success: false, error: `Failed to convert: ${message}` };
    }
  }

  private async ensureWorkDir(): Promise<string> {
    if (!this.workDir) {
      this.workDir = await mkdtemp(join(tmpdir(), 'docsite-to-pdf-'));
    }
    return this.workDir;
  }

  private async ensureContext(): Promise<BrowserContext> {
    if (this.context) return this.context;
    if (!this.browser) {
      this.browser = await launchBrowser(this.options);
    }
    const context = await this.browser.newContext({ javaScriptEnabled: false });
    await context.route('**/*', (route) => route.abort());
    this.context = context;
    return context;
  }

  async cleanup(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    if (browser) {
      await browser.close();
    }

    if (this.workDir && this.ownsWorkDir) {
      try {
        await rm(this.workDir, { recursive: true, force: true });
        logger.debug({ workDir: this.workDir }, 'Removed conversion work directory');
      } catch (error) {
        logger.warn({ workDir: this.workDir, error: String(error) }, 'Failed to remove work directory');
      }
      this.workDir = null;
    }
  }
}
