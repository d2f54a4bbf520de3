import type { CompletionOutcome } from './retry-policy';

/**
 * CompletionExhaustedError
 *
 * Thrown when every completion attempt ended in an expired credential or
 * a timeout. The error of the last attempt is the cause.
 */
export class CompletionExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastOutcome: CompletionOutcome,
    options?: ErrorOptions,
  ) {
    super(
      `Completion service unavailable after ${attempts} attempts (last: ${lastOutcome})`,
      options,
    );
    this.name = 'CompletionExhaustedError';
  }
}
