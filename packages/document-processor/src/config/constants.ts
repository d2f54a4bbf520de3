/**
 * ConsistencyValidator constants
 */
export const CONSISTENCY_VALIDATOR = {
  /**
   * Largest accepted absolute difference between reported and computed VAT
   */
  VAT_TOLERANCE: 0.01,
} as const;

/**
 * InvoiceExtractor constants
 */
export const INVOICE_EXTRACTOR = {
  /**
   * Completion attempts per document
   */
  MAX_ATTEMPTS: 3,

  /**
   * Backoff unit after a timeout, multiplied by the number of timeouts so far
   */
  TIMEOUT_BACKOFF_MS: 1000,

  /**
   * Delay after a transport failure or an empty answer
   */
  RETRY_DELAY_MS: 1000,

  /**
   * Characters of normalized text sent in the prompt
   */
  PROMPT_TEXT_LIMIT: 4000,

  /**
   * Characters of normalized text kept in a diagnostic failure
   */
  DIAGNOSTIC_TEXT_LIMIT: 1000,

  /**
   * Characters of the raw reply logged when recovery gives up
   */
  REPLY_PREVIEW_LIMIT: 500,
} as const;
