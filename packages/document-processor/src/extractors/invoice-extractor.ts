import type { LoggerMethods } from '@invoice-audit/logger';
import type {
  AuditOutput,
  DiagnosticFailure,
  InvoiceRecord,
  RecoveryTier,
} from '@invoice-audit/model';

import {
  RequestTimeoutError,
  TransportError,
  UnauthorizedError,
} from '@invoice-audit/shared';
import { setTimeout as delay } from 'node:timers/promises';

import { INVOICE_EXTRACTOR } from '../config/constants';
import {
  ResponseRecoveryParser,
  isBlankRecord,
} from '../parsers/response-recovery-parser';
import { buildInvoiceExtractionPrompt } from '../prompts/invoice-extraction-prompt';
import { CompletionExhaustedError } from './completion-exhausted-error';
import {
  type CompletionOutcome,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  decideNextStep,
} from './retry-policy';

/**
 * Chat-completion transport used by the extractor.
 * Implemented by ChatCompletionApi from @invoice-audit/shared.
 */
export interface CompletionService {
  complete(prompt: string): Promise<string>;
  invalidateCredential(): void;
}

export interface InvoiceExtractorOptions {
  parser?: ResponseRecoveryParser;
  retryPolicy?: RetryPolicy;

  /**
   * Wait between attempts (default: timers/promises setTimeout)
   */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Result of an extraction run
 */
export interface ExtractionResult {
  output: AuditOutput;

  /** Attempts made, 1-based */
  attempts: number;

  /** Null when the output is a diagnostic failure */
  recoveryTier: RecoveryTier | null;
}

type AttemptResult =
  | { outcome: 'success'; record: InvoiceRecord; tier: RecoveryTier }
  | { outcome: 'empty-answer'; reply: string }
  | { outcome: 'auth-expired' | 'timeout'; error: Error }
  | { outcome: 'other-failure'; error: TransportError };

/**
 * InvoiceExtractor
 *
 * Sends the extraction prompt to the completion service and recovers a
 * record from the reply, retrying per RetryPolicy:
 *
 * - expired credential: invalidate and retry at once
 * - timeout: back off 1 s, then 2 s
 * - transport failure or a reply without usable fields: retry after 1 s
 *
 * When attempts run out, a reply without usable fields yields a
 * DiagnosticFailure, a transport failure is rethrown and expired
 * credentials or timeouts end in CompletionExhaustedError. AuthError from
 * the credential exchange is never retried.
 */
export class InvoiceExtractor {
  private readonly parser: ResponseRecoveryParser;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly completion: CompletionService,
    options: InvoiceExtractorOptions = {},
  ) {
    this.parser = options.parser ?? new ResponseRecoveryParser();
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async extract(normalizedText: string): Promise<ExtractionResult> {
    const prompt = buildInvoiceExtractionPrompt(normalizedText);
    let timeouts = 0;

    for (let attempt = 1; ; attempt++) {
      this.logger.info(
        `[InvoiceExtractor] Attempt ${attempt}/${this.retryPolicy.maxAttempts}`,
      );

      const result = await this.runAttempt(prompt);
      if (result.outcome === 'success') {
        this.logger.info(
          `[InvoiceExtractor] Record recovered (${result.tier})`,
        );
        return {
          output: result.record,
          attempts: attempt,
          recoveryTier: result.tier,
        };
      }

      if (result.outcome === 'timeout') {
        timeouts++;
      }
      if (result.outcome === 'auth-expired') {
        this.completion.invalidateCredential();
      }

      const decision = decideNextStep(
        result.outcome,
        attempt,
        timeouts,
        this.retryPolicy,
      );

      if (decision.action !== 'retry') {
        return this.giveUp(result, attempt, normalizedText);
      }

      if (decision.delayMs > 0) {
        this.logger.info(
          `[InvoiceExtractor] Retrying in ${decision.delayMs}ms (${result.outcome})`,
        );
        await this.sleep(decision.delayMs);
      }
    }
  }

  private async runAttempt(prompt: string): Promise<AttemptResult> {
    let reply: string;
    try {
      reply = await this.completion.complete(prompt);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        this.logAttemptFailure('auth-expired', error);
        return { outcome: 'auth-expired', error };
      }
      if (error instanceof RequestTimeoutError) {
        this.logAttemptFailure('timeout', error);
        return { outcome: 'timeout', error };
      }
      if (error instanceof TransportError) {
        this.logAttemptFailure('other-failure', error);
        return { outcome: 'other-failure', error };
      }
      throw error;
    }

    const { record, tier } = this.parser.recover(reply);
    if (isBlankRecord(record)) {
      this.logger.warn(
        `[InvoiceExtractor] Reply has no usable fields: ${reply.slice(0, INVOICE_EXTRACTOR.REPLY_PREVIEW_LIMIT)}`,
      );
      return { outcome: 'empty-answer', reply };
    }

    return { outcome: 'success', record, tier };
  }

  private logAttemptFailure(outcome: CompletionOutcome, error: Error): void {
    this.logger.warn(
      `[InvoiceExtractor] Attempt failed (${outcome}):`,
      error.message,
    );
  }

  private giveUp(
    result: Exclude<AttemptResult, { outcome: 'success' }>,
    attempts: number,
    normalizedText: string,
  ): ExtractionResult {
    switch (result.outcome) {
      case 'empty-answer': {
        this.logger.error(
          `[InvoiceExtractor] No usable record after ${attempts} attempts`,
        );
        const failure: DiagnosticFailure = {
          error: 'JSON parse failed',
          raw_response: result.reply,
          extracted_text: normalizedText.slice(
            0,
            INVOICE_EXTRACTOR.DIAGNOSTIC_TEXT_LIMIT,
          ),
        };
        return { output: failure, attempts, recoveryTier: null };
      }
      case 'other-failure':
        this.logger.error(
          `[InvoiceExtractor] Completion failed after ${attempts} attempts`,
        );
        throw result.error;
      case 'auth-expired':
      case 'timeout':
        throw new CompletionExhaustedError(attempts, result.outcome, {
          cause: result.error,
        });
    }
  }
}
