import type { LoggerMethods } from '@invoice-audit/logger';
import type {
  InvoiceAuditReport,
  InvoiceField,
  TextAcquirer,
} from '@invoice-audit/model';

import { INVOICE_FIELDS, isDiagnosticFailure } from '@invoice-audit/model';

import {
  type CompletionService,
  InvoiceExtractor,
  type InvoiceExtractorOptions,
} from './extractors/invoice-extractor';
import { TextNormalizer } from './utils/text-normalizer';
import {
  ConsistencyValidator,
  type ConsistencyValidatorOptions,
} from './validators/consistency-validator';

/**
 * InvoiceAuditor Options
 */
export interface InvoiceAuditorOptions {
  logger: LoggerMethods;

  /**
   * Source of raw document text (DocumentTextAcquirer from
   * @invoice-audit/pdf-parser)
   */
  acquirer: TextAcquirer;

  /**
   * Chat-completion transport (ChatCompletionApi from @invoice-audit/shared)
   */
  completion: CompletionService;

  extractor?: InvoiceExtractorOptions;
  validator?: ConsistencyValidatorOptions;

  /**
   * Abort signal for cancellation support.
   * When aborted, the audit stops at the next checkpoint between stages.
   */
  abortSignal?: AbortSignal;
}

/**
 * InvoiceAuditor
 *
 * Runs the audit pipeline for one document:
 *
 * 1. Acquire raw text (embedded layer, OCR fallback)
 * 2. Normalize recognition artifacts
 * 3. Extract the invoice record with the completion service
 * 4. Cross-check the record
 *
 * The output is either the record or a DiagnosticFailure keeping the raw
 * reply. Acquisition errors, CompletionExhaustedError, AuthError and the
 * final TransportError propagate.
 */
export class InvoiceAuditor {
  private readonly logger: LoggerMethods;
  private readonly acquirer: TextAcquirer;
  private readonly extractor: InvoiceExtractor;
  private readonly validator: ConsistencyValidator;
  private readonly abortSignal?: AbortSignal;

  constructor(options: InvoiceAuditorOptions) {
    this.logger = options.logger;
    this.acquirer = options.acquirer;
    this.extractor = new InvoiceExtractor(
      options.logger,
      options.completion,
      options.extractor,
    );
    this.validator = new ConsistencyValidator(
      options.logger,
      options.validator,
    );
    this.abortSignal = options.abortSignal;
  }

  /**
   * Check if abort has been requested and throw error if so
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      const error = new Error('Invoice audit was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }

  async audit(pdfPath: string): Promise<InvoiceAuditReport> {
    this.logger.info('[InvoiceAuditor] Starting invoice audit...');
    this.checkAborted();

    const startTimeAcquire = Date.now();
    const { text, pages } = await this.acquirer.acquire(pdfPath);
    this.logger.info(
      `[InvoiceAuditor] Text acquisition took ${Date.now() - startTimeAcquire}ms`,
    );

    const normalizedText = TextNormalizer.normalize(text);
    this.logger.info(
      `[InvoiceAuditor] Normalized text: ${normalizedText.length} characters`,
    );

    this.checkAborted();

    const startTimeExtract = Date.now();
    const { output, attempts, recoveryTier } =
      await this.extractor.extract(normalizedText);
    this.logger.info(
      `[InvoiceAuditor] Extraction took ${Date.now() - startTimeExtract}ms`,
    );

    if (isDiagnosticFailure(output)) {
      this.logger.warn(
        '[InvoiceAuditor] Audit finished without a record; raw reply kept',
      );
      return {
        output,
        pages,
        attempts,
        recoveryTier,
        validation: null,
        unsetFields: [],
      };
    }

    const validation = this.validator.validate(output);
    const unsetFields: InvoiceField[] = INVOICE_FIELDS.filter(
      (field) => output[field] === null,
    );

    this.logger.info(
      `[InvoiceAuditor] Audit completed (${validation.isConsistent ? 'consistent' : 'with warnings'})`,
    );

    return {
      output,
      pages,
      attempts,
      recoveryTier,
      validation,
      unsetFields,
    };
  }
}
