/**
 * How the text of a page was obtained
 * - embedded: read from the PDF text layer
 * - ocr: rendered, preprocessed and recognized
 */
export type TextAcquisitionMethod = 'embedded' | 'ocr';

/**
 * Per-page acquisition summary
 */
export interface PageExtraction {
  /** 1-based page number */
  pageNo: number;

  method: TextAcquisitionMethod;

  /** Number of characters obtained for this page */
  charCount: number;
}

/**
 * Raw text of a whole document
 */
export interface ExtractedText {
  /**
   * Concatenated page texts, each followed by a newline.
   * Never blank.
   */
  text: string;

  /** Pages that contributed text, in page order */
  pages: PageExtraction[];
}

/**
 * Anything able to turn a document path into raw text
 */
export interface TextAcquirer {
  acquire(documentPath: string): Promise<ExtractedText>;
}
