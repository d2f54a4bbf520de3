import type { LoggerMethods } from '@invoice-audit/logger';

import { spawnAsync } from '@invoice-audit/shared';

/**
 * Reads the embedded text layer of a PDF page by page using Poppler's
 * pdftotext.
 *
 * Per-page failures are logged as warnings and produce empty strings so
 * the caller can fall back to OCR.
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 */
export class PdfTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Extract the embedded text of all pages.
   *
   * @param pdfPath - Path to the source PDF file
   * @param totalPages - Total number of pages in the PDF
   * @returns Map of 1-based page numbers to extracted text
   */
  async extractText(
    pdfPath: string,
    totalPages: number,
  ): Promise<Map<number, string>> {
    this.logger.info(
      `[PdfTextExtractor] Extracting embedded text from ${totalPages} pages...`,
    );

    const pageTexts = new Map<number, string>();

    for (let page = 1; page <= totalPages; page++) {
      pageTexts.set(page, await this.extractPageText(pdfPath, page));
    }

    return pageTexts;
  }

  /**
   * Get the page count of a PDF using pdfinfo.
   * Returns 0 on failure.
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await spawnAsync('pdfinfo', [pdfPath]);
    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdfinfo failed: ${result.stderr || 'Unknown error'}`,
      );
      return 0;
    }
    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    return match ? parseInt(match[1], 10) : 0;
  }

  /**
   * Extract the embedded text of a single page.
   * Returns empty string on failure (logged as warning).
   */
  async extractPageText(pdfPath: string, page: number): Promise<string> {
    const result = await spawnAsync('pdftotext', [
      '-f',
      page.toString(),
      '-l',
      page.toString(),
      '-enc',
      'UTF-8',
      '-layout',
      pdfPath,
      '-',
    ]);

    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr || 'Unknown error'}`,
      );
      return '';
    }

    return result.stdout;
  }
}
