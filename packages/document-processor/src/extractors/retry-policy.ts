import { INVOICE_EXTRACTOR } from '../config/constants';

/**
 * Classified result of one completion attempt
 */
export type CompletionOutcome =
  | 'success'
  | 'auth-expired'
  | 'timeout'
  | 'other-failure'
  | 'empty-answer';

export interface RetryPolicy {
  maxAttempts: number;

  /** Delay unit after a timeout; the n-th timeout waits n units */
  timeoutBackoffMs: number;

  /** Delay after a transport failure or an empty answer */
  retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: INVOICE_EXTRACTOR.MAX_ATTEMPTS,
  timeoutBackoffMs: INVOICE_EXTRACTOR.TIMEOUT_BACKOFF_MS,
  retryDelayMs: INVOICE_EXTRACTOR.RETRY_DELAY_MS,
};

export type RetryDecision =
  | { action: 'done' }
  | { action: 'retry'; delayMs: number }
  | { action: 'fail' };

/**
 * Decide what follows a completion attempt.
 *
 * @param outcome - Outcome of the attempt just made
 * @param attempt - 1-based ordinal of that attempt
 * @param timeouts - Timeouts so far, including this attempt
 *
 * An expired credential is retried at once; it does not count towards
 * the timeout backoff.
 */
export function decideNextStep(
  outcome: CompletionOutcome,
  attempt: number,
  timeouts: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): RetryDecision {
  if (outcome === 'success') {
    return { action: 'done' };
  }
  if (attempt >= policy.maxAttempts) {
    return { action: 'fail' };
  }

  switch (outcome) {
    case 'auth-expired':
      return { action: 'retry', delayMs: 0 };
    case 'timeout':
      return { action: 'retry', delayMs: timeouts * policy.timeoutBackoffMs };
    case 'other-failure':
    case 'empty-answer':
      return { action: 'retry', delayMs: policy.retryDelayMs };
  }
}
