/**
 * Error thrown when no text can be obtained from a document, neither
 * from its embedded text layer nor through OCR.
 */
export class TextExtractionError extends Error {
  public readonly name = 'TextExtractionError';

  constructor(
    public readonly documentPath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to extract text from ${documentPath}: ${reason}`, options);
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
