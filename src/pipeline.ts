/**
 * Crawl → convert → merge, end to end
 */
import { crawl } from './crawl/crawler.js';
import type { CrawlOptions, CrawlResult } from './crawl/types.js';
import type { DocumentMerger, MergeResult, PageConverter } from './convert/types.js';
import type { PageFetcher } from './fetch/types.js';
import { logger } from './logger.js';

export interface PipelineOptions extends Omit<CrawlOptions, 'fetcher'> {
  url: string;
  outputPath: string;
  /** Keep only the first N crawled pages; applied after crawling */
  maxPages?: number;
}

export interface PipelineCollaborators {
  fetcher: PageFetcher;
  converter: PageConverter;
  merger: DocumentMerger;
}

export interface PipelineReport {
  exitCode: number;
  crawl: CrawlResult;
  pagesConverted: number;
  merge: MergeResult | null;
}

/**
 * Run the whole tool. Exit code 1 when nothing was crawled, nothing converted,
 * or the merge failed. Collaborators are released whatever happens.
 */
export async function runPipeline(
  options: PipelineOptions,
  collaborators: PipelineCollaborators
): Promise<PipelineReport> {
  const { url, outputPath, maxPages, ...crawlOptions } = options;
  const { fetcher, converter, merger } = collaborators;

  logger.info({ url, outputPath, maxDepth: crawlOptions.maxDepth, maxPages }, 'Phase 1: crawling');

  try {
    let crawlResult: CrawlResult;
    try {
      crawlResult = await crawl(url, { ...crawlOptions, fetcher });
    } finally {
      await fetcher.close();
    }

    if (crawlResult.pages.length === 0) {
      logger.error({ failed: crawlResult.failedUrls.length }, 'No pages were crawled successfully');
      return { exitCode: 1, crawl: crawlResult, pagesConverted: 0, merge: null };
    }
    if (crawlResult.failedUrls.length > 0) {
      logger.warn({ failed: crawlResult.failedUrls.length }, 'Some URLs could not be crawled');
    }

    let pages = crawlResult.pages;
    if (maxPages !== undefined && pages.length > maxPages) {
      logger.info({ crawled: pages.length, maxPages }, 'Limiting pages before conversion');
      pages = pages.slice(0, maxPages);
    }

    logger.info({ pages: pages.length }, 'Phase 2: converting pages to PDF');
    const conversions = await converter.convertPages(pages);
    const pagesConverted = conversions.filter((c) => c.success).length;
    logger.info({ converted: pagesConverted, total: pages.length }, 'Conversion finished');

    if (pagesConverted === 0) {
      logger.error('No pages were converted successfully');
      return { exitCode: 1, crawl: crawlResult, pagesConverted, merge: null };
    }

    logger.info({ outputPath }, 'Phase 3: merging PDFs');
    const merge = await merger.merge(conversions, outputPath);
    if (!merge.success) {
      logger.error({ error: merge.error }, 'Failed to merge PDFs');
      return { exitCode: 1, crawl: crawlResult, pagesConverted, merge };
    }

    logger.info({ outputPath: merge.outputPath, totalPages: merge.totalPages }, 'Done');
    return { exitCode: 0, crawl: crawlResult, pagesConverted, merge };
  } finally {
    await converter.cleanup();
  }
}
