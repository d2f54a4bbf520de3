import type { LoggerMethods } from '@invoice-audit/logger';

import { isCommandAvailable, spawnAsync } from '@invoice-audit/shared';

import { OCR_RECOGNIZER } from '../config/constants';

/**
 * Result of an environment probe
 */
export interface ToolEnvironmentReport {
  ok: boolean;
  /** Human-readable description of every missing requirement */
  problems: string[];
}

/**
 * Parse the output of `tesseract --list-langs`.
 *
 * The first line is a header ("List of available languages in ...").
 * Older releases print the list to stderr, so callers pass both streams.
 */
export function parseTesseractLanguages(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('List of available languages'));
}

/**
 * Probes the command-line tools the acquisition pipeline depends on.
 *
 * ## System Requirements
 * - Tesseract with the primary language data (`apt install tesseract-ocr tesseract-ocr-rus`)
 * - Poppler utils (`pdfinfo`, `pdftotext`, `pdftoppm`)
 * - ImageMagick 7 (`magick`), used for preprocessing and as the fallback renderer
 */
export class ToolEnvironment {
  private readonly logger: LoggerMethods;
  private readonly languages: readonly string[];

  constructor(options: {
    logger: LoggerMethods;
    ocrLanguages?: readonly string[];
  }) {
    this.logger = options.logger;
    this.languages = options.ocrLanguages ?? OCR_RECOGNIZER.DEFAULT_LANGUAGES;
  }

  async check(): Promise<ToolEnvironmentReport> {
    this.logger.info('[ToolEnvironment] Checking required tools...');

    const problems: string[] = [];

    const tesseractProblem = await this.checkTesseract();
    if (tesseractProblem) {
      problems.push(tesseractProblem);
    }

    for (const tool of ['pdfinfo', 'pdftotext']) {
      if (!(await isCommandAvailable(tool, ['-v']))) {
        problems.push(`${tool} is not installed (poppler-utils)`);
      }
    }

    if (!(await isCommandAvailable('magick', ['-version']))) {
      problems.push('magick is not installed (ImageMagick 7)');
    } else {
      this.logger.debug('[ToolEnvironment] magick available');
    }

    if (!(await isCommandAvailable('pdftoppm', ['-v']))) {
      this.logger.warn(
        '[ToolEnvironment] pdftoppm not found; pages will be rendered with magick',
      );
    }

    for (const problem of problems) {
      this.logger.error(`[ToolEnvironment] ${problem}`);
    }
    if (problems.length === 0) {
      this.logger.info('[ToolEnvironment] All required tools are available');
    }

    return { ok: problems.length === 0, problems };
  }

  private async checkTesseract(): Promise<string | null> {
    let output: string;
    try {
      const result = await spawnAsync('tesseract', ['--list-langs']);
      output = result.stdout + '\n' + result.stderr;
    } catch {
      return 'tesseract is not installed';
    }

    const installed = parseTesseractLanguages(output);
    const primary = this.languages[0];
    this.logger.debug(
      `[ToolEnvironment] Tesseract languages: ${installed.join(', ')}`,
    );

    if (primary && !installed.includes(primary)) {
      return `Tesseract language data '${primary}' is not installed`;
    }
    return null;
  }
}
