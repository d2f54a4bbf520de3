import type { LoggerMethods } from '@invoice-audit/logger';
import type {
  ExtractedText,
  PageExtraction,
  TextAcquirer,
} from '@invoice-audit/model';

import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { TEXT_ACQUIRER } from '../config/constants';
import { DocumentNotFoundError } from '../errors/document-not-found-error';
import { TextExtractionError } from '../errors/text-extraction-error';
import { ImagePreprocessor } from '../processors/image-preprocessor';
import { OcrRecognizer } from '../processors/ocr-recognizer';
import { type PageRenderer, selectPageRenderer } from '../processors/page-renderer';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';

/**
 * DocumentTextAcquirer options
 */
export interface DocumentTextAcquirerOptions {
  logger: LoggerMethods;

  /**
   * Rendering backend for OCR. `null` disables OCR; documents without
   * embedded text then fail with TextExtractionError.
   */
  renderer: PageRenderer | null;

  /**
   * Tesseract language codes, primary first (default: ['rus', 'eng'])
   */
  ocrLanguages?: readonly string[];

  /**
   * Parent directory for temporary page images (default: OS temp dir)
   */
  tempDir?: string;

  textExtractor?: PdfTextExtractor;
  preprocessor?: ImagePreprocessor;
  recognizer?: OcrRecognizer;
}

/**
 * DocumentTextAcquirer
 *
 * Produces the raw text of a PDF.
 *
 * 1. Reads the embedded text layer page by page; blank pages are skipped.
 * 2. Only when the whole embedded text is blank, renders every page at
 *    150 DPI, preprocesses it and runs OCR on it.
 *
 * Page images live in a temporary directory removed before returning.
 *
 * @example
 * ```typescript
 * const acquirer = await DocumentTextAcquirer.create({ logger });
 * const { text, pages } = await acquirer.acquire('/data/invoice.pdf');
 * ```
 */
export class DocumentTextAcquirer implements TextAcquirer {
  private readonly logger: LoggerMethods;
  private readonly renderer: PageRenderer | null;
  private readonly tempDir: string;
  private readonly textExtractor: PdfTextExtractor;
  private readonly preprocessor: ImagePreprocessor;
  private readonly recognizer: OcrRecognizer;

  constructor(options: DocumentTextAcquirerOptions) {
    this.logger = options.logger;
    this.renderer = options.renderer;
    this.tempDir = options.tempDir ?? tmpdir();
    this.textExtractor =
      options.textExtractor ?? new PdfTextExtractor(options.logger);
    this.preprocessor =
      options.preprocessor ?? new ImagePreprocessor(options.logger);
    this.recognizer =
      options.recognizer ??
      new OcrRecognizer(options.logger, { languages: options.ocrLanguages });
  }

  /**
   * Create an acquirer with the first available rendering backend
   */
  static async create(
    options: Omit<DocumentTextAcquirerOptions, 'renderer'>,
  ): Promise<DocumentTextAcquirer> {
    const renderer = await selectPageRenderer(options.logger);
    return new DocumentTextAcquirer({ ...options, renderer });
  }

  async acquire(documentPath: string): Promise<ExtractedText> {
    if (!existsSync(documentPath)) {
      throw new DocumentNotFoundError(documentPath);
    }

    this.logger.info(
      `[DocumentTextAcquirer] Processing ${basename(documentPath)}`,
    );

    const embedded = await this.extractEmbeddedText(documentPath);
    const result = embedded.text.trim()
      ? embedded
      : await this.recognizeText(documentPath);

    if (!result.text.trim()) {
      throw new TextExtractionError(
        documentPath,
        'no embedded text and OCR produced nothing',
      );
    }

    this.logger.info(
      `[DocumentTextAcquirer] Extracted ${result.text.length} characters`,
    );

    return result;
  }

  private async extractEmbeddedText(
    documentPath: string,
  ): Promise<ExtractedText> {
    this.logger.info('[DocumentTextAcquirer] Reading embedded text...');

    let pageTexts: Map<number, string>;
    try {
      const pageCount = await this.textExtractor.getPageCount(documentPath);
      pageTexts = await this.textExtractor.extractText(documentPath, pageCount);
    } catch (error) {
      this.logger.warn(
        '[DocumentTextAcquirer] Embedded text extraction failed:',
        TextExtractionError.getErrorMessage(error),
      );
      return { text: '', pages: [] };
    }

    let text = '';
    const pages: PageExtraction[] = [];

    for (const [pageNo, pageText] of pageTexts) {
      if (pageText.trim()) {
        text += pageText + '\n';
        pages.push({ pageNo, method: 'embedded', charCount: pageText.length });
      } else {
        this.logger.info(
          `[DocumentTextAcquirer] Page ${pageNo}: no embedded text`,
        );
      }
    }

    return { text, pages };
  }

  private async recognizeText(documentPath: string): Promise<ExtractedText> {
    if (!this.renderer) {
      throw new TextExtractionError(
        documentPath,
        'no embedded text and no page renderer is available for OCR',
      );
    }

    this.logger.info(
      `[DocumentTextAcquirer] No embedded text, running OCR (${this.renderer.backend})...`,
    );

    const workDir = await mkdtemp(
      join(this.tempDir, TEXT_ACQUIRER.WORK_DIR_PREFIX),
    );

    try {
      const rendered = await this.renderer.renderPages(documentPath, workDir, {
        dpi: TEXT_ACQUIRER.RENDER_DPI,
      });

      let text = '';
      const pages: PageExtraction[] = [];

      for (const [index, pageFile] of rendered.pageFiles.entries()) {
        const pageNo = index + 1;
        this.logger.info(
          `[DocumentTextAcquirer] OCR page ${pageNo}/${rendered.pageCount}...`,
        );

        const cleanFile = await this.preprocessor.preprocess(
          pageFile,
          join(workDir, `clean_${pageNo}.png`),
        );
        const pageText = await this.recognizer.recognize(cleanFile);

        text += pageText + '\n';
        pages.push({ pageNo, method: 'ocr', charCount: pageText.length });
      }

      return { text, pages };
    } catch (error) {
      throw new TextExtractionError(
        documentPath,
        `OCR failed: ${TextExtractionError.getErrorMessage(error)}`,
        { cause: error },
      );
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
