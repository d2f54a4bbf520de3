import type { AuditOutput } from './diagnostic-failure';
import type { PageExtraction } from './extracted-text';
import type { InvoiceField, RequiredInvoiceField } from './invoice-record';

/**
 * Tier of the reply recovery chain that produced the record
 */
export type RecoveryTier = 'strict' | 'repaired' | 'salvaged';

/**
 * Mismatch between reported VAT and amount * rate
 */
export interface VatMismatch {
  /** amount * vat_rate / 100, rounded to cents */
  expected: number;

  /** VAT as reported in the record */
  actual: number;
}

/**
 * Result of cross-field validation. Observations only: a report with
 * issues never blocks the output.
 */
export interface ValidationReport {
  missingFields: RequiredInvoiceField[];
  vatMismatch: VatMismatch | null;
  isConsistent: boolean;
}

/**
 * Complete result of auditing one document
 */
export interface InvoiceAuditReport {
  output: AuditOutput;

  /** Text acquisition summary per page */
  pages: PageExtraction[];

  /** Completion attempts used (1-based count) */
  attempts: number;

  /** Recovery tier of the final record, null for a diagnostic failure */
  recoveryTier: RecoveryTier | null;

  /** Validation of the final record, null for a diagnostic failure */
  validation: ValidationReport | null;

  /** Fields that ended up unset, in record order */
  unsetFields: InvoiceField[];
}
