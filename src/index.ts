/**
 * docsite-to-pdf - Crawl a documentation site in a headless browser and merge
 * every page into one bookmarked PDF.
 *
 * @module docsite-to-pdf
 */
export * from './crawl/index.js';
export { BrowserFetcher } from './fetch/browser-fetcher.js';
export { launchBrowser, resolveExecutablePath, DESKTOP_USER_AGENT } from './fetch/browser.js';
export { BrowserPdfConverter } from './convert/pdf-converter.js';
export { PdfMerger, addOutline, addPageNumbers } from './convert/pdf-merger.js';
export { sanitizeHtml, preparePrintHtml, PRINT_CSS } from './convert/html-sanitizer.js';
export {
  classifyPage,
  detectBotChallenge,
  detectSoftNotFound,
  formatVerdict,
} from './antibot/detector.js';
export {
  loadCrawlRules,
  parseCrawlRules,
  getDefaultCrawlRules,
  DEFAULT_RULES_PATH,
} from './rules/crawl-rules.js';
export { runPipeline } from './pipeline.js';
export { logger, enableVerboseLogging } from './logger.js';
export type { BrowserFetcherOptions } from './fetch/browser-fetcher.js';
export type { BrowserLaunchOptions } from './fetch/browser.js';
export type { FetchErrorKind, FetchOutcome, PageFetcher } from './fetch/types.js';
export type { PdfConverterOptions } from './convert/pdf-converter.js';
export type { Bookmark } from './convert/pdf-merger.js';
export type {
  ConversionResult,
  DocumentMerger,
  MergeResult,
  PageConverter,
} from './convert/types.js';
export type { PageVerdict } from './antibot/detector.js';
export type { ContentPattern, CrawlRules } from './rules/crawl-rules.js';
export type { PipelineCollaborators, PipelineOptions, PipelineReport } from './pipeline.js';
export type { LogLevel } from './logger.js';
