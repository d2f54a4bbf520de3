/**
 * Error thrown when the input document does not exist.
 */
export class DocumentNotFoundError extends Error {
  public readonly name = 'DocumentNotFoundError';

  constructor(public readonly documentPath: string) {
    super(`Document not found: ${documentPath}`);
  }
}
