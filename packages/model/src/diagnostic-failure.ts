import type { InvoiceRecord } from './invoice-record';

/**
 * Terminal result when no usable record could be recovered from the
 * completion service. Keeps the raw reply for offline inspection.
 */
export interface DiagnosticFailure {
  error: 'JSON parse failed';

  /** Raw reply text of the last attempt */
  raw_response: string;

  /** Leading sample of the normalized source text */
  extracted_text: string;
}

/**
 * Value written as the audit output
 */
export type AuditOutput = InvoiceRecord | DiagnosticFailure;

export function isDiagnosticFailure(
  output: AuditOutput,
): output is DiagnosticFailure {
  return 'error' in output;
}
