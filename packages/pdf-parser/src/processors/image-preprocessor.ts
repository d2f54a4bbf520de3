import type { LoggerMethods } from '@invoice-audit/logger';

import { spawnAsync } from '@invoice-audit/shared';

import { IMAGE_PREPROCESSOR } from '../config/constants';

/**
 * Build the ImageMagick arguments that turn a rendered page into a clean
 * binary image for OCR.
 *
 * Steps, in order:
 * 1. luminance (skipped for single-channel input)
 * 2. CLAHE over an 8x8 tile grid, clip limit 2
 * 3. linear stretch, gain 1.8 / bias 10
 * 4. local adaptive threshold, 15x15 window, offset 3
 * 5. despeckle
 * 6. morphological closing, 2x2 rectangle
 *
 * Values on the 0-255 scale are converted to the fractions and
 * percentages ImageMagick expects.
 */
export function buildPreprocessArgs(
  inputPath: string,
  outputPath: string,
  options: { isGrayscale: boolean },
): string[] {
  const {
    CLAHE_TILE_GRID,
    CLAHE_BINS,
    CLAHE_CLIP_LIMIT,
    GAIN,
    BIAS,
    THRESHOLD_WINDOW,
    THRESHOLD_OFFSET,
    CLOSING_KERNEL,
  } = IMAGE_PREPROCESSOR;

  const tilePercent = 100 / CLAHE_TILE_GRID;
  const biasFraction = (BIAS / 255).toFixed(4);
  const offsetPercent = ((THRESHOLD_OFFSET / 255) * 100).toFixed(2);

  return [
    inputPath,
    ...(options.isGrayscale ? [] : ['-colorspace', 'Gray']),
    '-clahe',
    `${tilePercent}x${tilePercent}%+${CLAHE_BINS}+${CLAHE_CLIP_LIMIT}`,
    '-function',
    'Polynomial',
    `${GAIN},${biasFraction}`,
    '-clamp',
    '-lat',
    `${THRESHOLD_WINDOW}x${THRESHOLD_WINDOW}-${offsetPercent}%`,
    '-despeckle',
    '-morphology',
    'Close',
    `Rectangle:${CLOSING_KERNEL}x${CLOSING_KERNEL}`,
    outputPath,
  ];
}

/**
 * Prepares rendered page images for recognition.
 *
 * Deterministic: the same input file always yields the same output file.
 *
 * ## System Requirements
 * - ImageMagick 7 (`magick`)
 */
export class ImagePreprocessor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Write the preprocessed version of `inputPath` to `outputPath`.
   *
   * @returns outputPath
   */
  async preprocess(inputPath: string, outputPath: string): Promise<string> {
    const isGrayscale = await this.isGrayscale(inputPath);
    const result = await spawnAsync(
      'magick',
      buildPreprocessArgs(inputPath, outputPath, { isGrayscale }),
    );

    if (result.code !== 0) {
      throw new Error(
        `[ImagePreprocessor] Failed to preprocess ${inputPath}: ${result.stderr || 'Unknown error'}`,
      );
    }

    return outputPath;
  }

  /**
   * Whether the image already has a single luminance channel.
   * Unknown colorspaces count as colour so they get converted.
   */
  async isGrayscale(imagePath: string): Promise<boolean> {
    const result = await spawnAsync('magick', [
      'identify',
      '-format',
      '%[colorspace]',
      imagePath,
    ]);

    if (result.code !== 0) {
      this.logger.debug(
        `[ImagePreprocessor] identify failed for ${imagePath}: ${result.stderr || 'Unknown error'}`,
      );
      return false;
    }

    return result.stdout.trim().toLowerCase() === 'gray';
  }
}
