/**
 * Merges per-page PDFs into one document with bookmarks and page numbers
 */
import { readFile, writeFile } from 'node:fs/promises';
import { PDFDocument, PDFHexString, PDFName, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont } from 'pdf-lib';
import { logger } from '../logger.js';
import type { ConversionResult, DocumentMerger, MergeResult } from './types.js';

const PAGE_NUMBER_SIZE = 9;
const PAGE_NUMBER_BOTTOM = 15;

export interface Bookmark {
  title: string;
  /** Zero-based index of the first page of the section */
  pageIndex: number;
}

/**
 * Write a flat document outline, one entry per bookmark, each opening its page
 * fitted to the window.
 */
export function addOutline(doc: PDFDocument, bookmarks: readonly Bookmark[]): void {
  if (bookmarks.length === 0) return;

  const { context } = doc;
  const outlinesRef = context.nextRef();
  const itemRefs = bookmarks.map(() => context.nextRef());

  bookmarks.forEach((bookmark, i) => {
    const item = context.obj({
      Title: PDFHexString.fromText(bookmark.title),
      Parent: outlinesRef,
      Dest: [doc.getPage(bookmark.pageIndex).ref, 'Fit'],
    });
    if (i > 0) item.set(PDFName.of('Prev'), itemRefs[i - 1]);
    if (i < bookmarks.length - 1) item.set(PDFName.of('Next'), itemRefs[i + 1]);
    context.assign(itemRefs[i], item);
  });

  context.assign(
    outlinesRef,
    context.obj({
      Type: 'Outlines',
      First: itemRefs[0],
      Last: itemRefs[itemRefs.length - 1],
      Count: bookmarks.length,
    })
  );
  doc.catalog.set(PDFName.of('Outlines'), outlinesRef);
  doc.catalog.set(PDFName.of('PageMode'), PDFName.of('UseOutlines'));
}

/** Stamp 1-based page numbers, bottom centre. */
export function addPageNumbers(doc: PDFDocument, font: PDFFont): void {
  doc.getPages().forEach((page, i) => {
    const text = String(i + 1);
    const { width } = page.getSize();
    const textWidth = font.widthOfTextAtSize(text, PAGE_NUMBER_SIZE);
    page.drawText(text, {
      x: (width - textWidth) / 2,
      y: PAGE_NUMBER_BOTTOM,
      size: PAGE_NUMBER_SIZE,
      font,
      color: rgb(0, 0, 0),
    });
  });
}

export class PdfMerger implements DocumentMerger {
  async merge(results: readonly ConversionResult[], outputPath: string): Promise<MergeResult> {
    try {
      const merged = await PDFDocument.create();
      const bookmarks: Bookmark[] = [];

      for (const result of results) {
        if (!result.success || result.pdfPath === null) {
          logger.warn({ url: result.url }, 'Skipping failed conversion');
          continue;
        }

        const source = await PDFDocument.load(await readFile(result.pdfPath));
        const copied = await merged.copyPages(source, source.getPageIndices());
        if (copied.length === 0) continue;

        bookmarks.push({ title: result.title, pageIndex: merged.getPageCount() });
        for (const page of copied) {
          merged.addPage(page);
        }
        logger.debug({ title: result.title, pages: copied.length }, 'Added section');
      }

      const totalPages = merged.getPageCount();
      if (totalPages === 0) {
        return { outputPath: null, success: false, totalPages: 0, error: 'No pages to merge' };
      }

      addOutline(merged, bookmarks);
      addPageNumbers(merged, await merged.embedFont(StandardFonts.Helvetica));

      await writeFile(outputPath, await merged.save());
      logger.info({ outputPath, totalPages }, 'Merged PDF created');

      return { outputPath, success: true, totalPages };
    } catch (error) {
      const message = `Failed to merge PDFs: ${error instanceof Error ? error.message : String(error)}`;
      logger.error({ outputPath, error: message }, 'Merge failed');
      return { outputPath: null, success: false, totalPages: 0, error: message };
    }
  }
}
