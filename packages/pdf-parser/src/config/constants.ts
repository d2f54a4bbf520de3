/**
 * Configuration constants for DocumentTextAcquirer
 */
export const TEXT_ACQUIRER = {
  /**
   * Rendering resolution for OCR. Fixed: higher values slow recognition
   * down without a measurable gain on invoice scans.
   */
  RENDER_DPI: 150,

  /**
   * Prefix of the per-document temporary working directory
   */
  WORK_DIR_PREFIX: 'invoice-audit-',
} as const;

/**
 * Configuration constants for OcrRecognizer (Tesseract)
 */
export const OCR_RECOGNIZER = {
  /**
   * Primary language followed by auxiliary languages
   */
  DEFAULT_LANGUAGES: ['rus', 'eng'],

  /**
   * OCR engine mode: default (LSTM when available)
   */
  ENGINE_MODE: 3,

  /**
   * Page segmentation mode: a single uniform block of text
   */
  PAGE_SEGMENTATION_MODE: 6,
} as const;

/**
 * Configuration constants for ImagePreprocessor
 */
export const IMAGE_PREPROCESSOR = {
  /**
   * CLAHE grid: the image is split into TILE_GRID x TILE_GRID tiles
   */
  CLAHE_TILE_GRID: 8,

  CLAHE_CLIP_LIMIT: 2.0,

  CLAHE_BINS: 128,

  /**
   * Linear stretch: out = GAIN * in + BIAS (8-bit scale)
   */
  GAIN: 1.8,

  BIAS: 10,

  /**
   * Adaptive threshold neighbourhood in pixels
   */
  THRESHOLD_WINDOW: 15,

  /**
   * Subtracted from the local mean (8-bit scale)
   */
  THRESHOLD_OFFSET: 3,

  /**
   * Side of the square structuring element used for closing
   */
  CLOSING_KERNEL: 2,
} as const;
