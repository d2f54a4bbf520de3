import type { LoggerMethods } from '@invoice-audit/logger';

import { spawnAsync } from '@invoice-audit/shared';

import { OCR_RECOGNIZER } from '../config/constants';

/** Options for OcrRecognizer */
export interface OcrRecognizerOptions {
  /**
   * Tesseract language codes, primary first (default: ['rus', 'eng'])
   */
  languages?: readonly string[];
}

/**
 * Recognizes text in page images with the Tesseract CLI.
 *
 * Runs `tesseract <image> stdout -l rus+eng --oem 3 --psm 6`: mixed
 * dictionary, default engine, the page treated as one block of text.
 * A failed recognition is logged and yields an empty string.
 *
 * ## System Requirements
 * - Tesseract 4+ with the configured traineddata files
 */
export class OcrRecognizer {
  private readonly languages: readonly string[];

  constructor(
    private readonly logger: LoggerMethods,
    options?: OcrRecognizerOptions,
  ) {
    this.languages = options?.languages?.length
      ? options.languages
      : OCR_RECOGNIZER.DEFAULT_LANGUAGES;
  }

  async recognize(imagePath: string): Promise<string> {
    const result = await spawnAsync('tesseract', [
      imagePath,
      'stdout',
      '-l',
      this.languages.join('+'),
      '--oem',
      OCR_RECOGNIZER.ENGINE_MODE.toString(),
      '--psm',
      OCR_RECOGNIZER.PAGE_SEGMENTATION_MODE.toString(),
    ]);

    if (result.code !== 0) {
      this.logger.warn(
        `[OcrRecognizer] tesseract failed for ${imagePath}: ${result.stderr || 'Unknown error'}`,
      );
      return '';
    }

    return result.stdout;
  }
}
