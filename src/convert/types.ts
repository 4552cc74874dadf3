/**
 * Collaborator contracts for turning crawled pages into one PDF
 */
import type { CrawledPage } from '../crawl/types.js';

export interface ConversionResult {
  url: string;
  title: string;
  pdfPath: string | null;
  success: boolean;
  error?: string;
}

/** Converts pages one by one; a page failure is reported, never thrown. */
export interface PageConverter {
  convertPages(pages: readonly CrawledPage[]): Promise<ConversionResult[]>;
  /** Remove intermediate files and release the renderer */
  cleanup(): Promise<void>;
}

export interface MergeResult {
  outputPath: string | null;
  success: boolean;
  totalPages: number;
  error?: string;
}

export interface DocumentMerger {
  /** Merge successful conversions in order, with one bookmark per page title */
  merge(results: readonly ConversionResult[], outputPath: string): Promise<MergeResult>;
}
