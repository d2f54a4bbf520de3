import type { LoggerMethods } from '@invoice-audit/logger';

import { isCommandAvailable, spawnAsync } from '@invoice-audit/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { TEXT_ACQUIRER } from '../config/constants';

/** Result of page rendering */
export interface PageRenderResult {
  /** Total number of pages rendered */
  pageCount: number;
  /** Absolute path to the pages directory */
  pagesDir: string;
  /** Rendered page file paths in page order */
  pageFiles: string[];
}

/** Options for page rendering */
export interface PageRendererOptions {
  /** DPI for rendered images (default: 150) */
  dpi?: number;
}

/** Identifier of a rendering backend */
export type PageRendererBackend = 'pdftoppm' | 'magick';

/**
 * Renders every page of a PDF to a PNG file.
 *
 * Implementations are interchangeable: same inputs, same result shape.
 */
export interface PageRenderer {
  readonly backend: PageRendererBackend;

  renderPages(
    pdfPath: string,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult>;
}

/**
 * List rendered page files in numeric page order.
 * `pattern` must capture the page number in its first group.
 */
function listPageFiles(pagesDir: string, pattern: RegExp): string[] {
  return readdirSync(pagesDir)
    .map((file) => ({ file, match: file.match(pattern) }))
    .filter(
      (entry): entry is { file: string; match: RegExpMatchArray } =>
        entry.match !== null,
    )
    .sort((a, b) => parseInt(a.match[1], 10) - parseInt(b.match[1], 10))
    .map((entry) => join(pagesDir, entry.file));
}

function ensurePagesDir(outputDir: string): string {
  const pagesDir = join(outputDir, 'pages');
  if (!existsSync(pagesDir)) {
    mkdirSync(pagesDir, { recursive: true });
  }
  return pagesDir;
}

/**
 * Renders PDF pages with Poppler's pdftoppm.
 *
 * pdftoppm names pages `page-1.png`, zero-padding the number to the width
 * of the page count (`page-01.png` for 10+ pages).
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 */
export class PdftoppmPageRenderer implements PageRenderer {
  readonly backend = 'pdftoppm';

  constructor(private readonly logger: LoggerMethods) {}

  async renderPages(
    pdfPath: string,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult> {
    const dpi = options?.dpi ?? TEXT_ACQUIRER.RENDER_DPI;
    const pagesDir = ensurePagesDir(outputDir);

    this.logger.info(`[PageRenderer] Rendering PDF at ${dpi} DPI (pdftoppm)...`);

    const result = await spawnAsync('pdftoppm', [
      '-r',
      dpi.toString(),
      '-png',
      pdfPath,
      join(pagesDir, 'page'),
    ]);

    if (result.code !== 0) {
      throw new Error(
        `[PageRenderer] Failed to render PDF pages: ${result.stderr || 'Unknown error'}`,
      );
    }

    const pageFiles = listPageFiles(pagesDir, /^page-(\d+)\.png$/);

    this.logger.info(
      `[PageRenderer] Rendered ${pageFiles.length} pages to ${pagesDir}`,
    );

    return { pageCount: pageFiles.length, pagesDir, pageFiles };
  }
}

/**
 * Renders PDF pages with ImageMagick (Ghostscript delegate).
 *
 * ## System Requirements
 * - ImageMagick 7 (`magick`)
 * - Ghostscript
 */
export class MagickPageRenderer implements PageRenderer {
  readonly backend = 'magick';

  constructor(private readonly logger: LoggerMethods) {}

  async renderPages(
    pdfPath: string,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult> {
    const dpi = options?.dpi ?? TEXT_ACQUIRER.RENDER_DPI;
    const pagesDir = ensurePagesDir(outputDir);

    this.logger.info(`[PageRenderer] Rendering PDF at ${dpi} DPI (magick)...`);

    const result = await spawnAsync('magick', [
      '-density',
      dpi.toString(),
      pdfPath,
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      join(pagesDir, 'page_%d.png'),
    ]);

    if (result.code !== 0) {
      throw new Error(
        `[PageRenderer] Failed to render PDF pages: ${result.stderr || 'Unknown error'}`,
      );
    }

    const pageFiles = listPageFiles(pagesDir, /^page_(\d+)\.png$/);

    this.logger.info(
      `[PageRenderer] Rendered ${pageFiles.length} pages to ${pagesDir}`,
    );

    return { pageCount: pageFiles.length, pagesDir, pageFiles };
  }
}

/**
 * Pick the first available rendering backend: pdftoppm, then magick.
 * Returns null when neither can be started.
 */
export async function selectPageRenderer(
  logger: LoggerMethods,
): Promise<PageRenderer | null> {
  if (await isCommandAvailable('pdftoppm', ['-v'])) {
    logger.info('[PageRenderer] Using pdftoppm backend');
    return new PdftoppmPageRenderer(logger);
  }

  if (await isCommandAvailable('magick', ['-version'])) {
    logger.warn('[PageRenderer] pdftoppm not found, using ImageMagick backend');
    return new MagickPageRenderer(logger);
  }

  logger.warn('[PageRenderer] No page renderer available; OCR is disabled');
  return null;
}
