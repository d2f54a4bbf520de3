import type { LoggerMethods } from '@invoice-audit/logger';
import type {
  InvoiceRecord,
  RequiredInvoiceField,
  ValidationReport,
  VatMismatch,
} from '@invoice-audit/model';

import { REQUIRED_INVOICE_FIELDS } from '@invoice-audit/model';

import { CONSISTENCY_VALIDATOR } from '../config/constants';

/**
 * Validation options for ConsistencyValidator
 */
export interface ConsistencyValidatorOptions {
  /**
   * Accepted absolute VAT difference (default: 0.01)
   */
  vatTolerance?: number;
}

function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * ConsistencyValidator
 *
 * Cross-field checks on an extracted invoice. Findings are logged as
 * warnings and returned; the record itself is never modified.
 */
export class ConsistencyValidator {
  private readonly vatTolerance: number;

  constructor(
    private readonly logger: LoggerMethods,
    options?: ConsistencyValidatorOptions,
  ) {
    this.vatTolerance =
      options?.vatTolerance ?? CONSISTENCY_VALIDATOR.VAT_TOLERANCE;
  }

  validate(record: InvoiceRecord): ValidationReport {
    const missingFields = this.findMissingFields(record);
    if (missingFields.length > 0) {
      this.logger.warn(
        `[ConsistencyValidator] Missing required fields: ${missingFields.join(', ')}`,
      );
    }

    const vatMismatch = this.checkVat(record);
    if (vatMismatch) {
      this.logger.warn(
        `[ConsistencyValidator] VAT mismatch: expected ${vatMismatch.expected}, got ${vatMismatch.actual}`,
      );
    }

    return {
      missingFields,
      vatMismatch,
      isConsistent: missingFields.length === 0 && vatMismatch === null,
    };
  }

  private findMissingFields(record: InvoiceRecord): RequiredInvoiceField[] {
    return REQUIRED_INVOICE_FIELDS.filter((field) => record[field] === null);
  }

  /**
   * Compare VAT with amount * rate / 100. Skipped unless all three are set.
   */
  private checkVat(record: InvoiceRecord): VatMismatch | null {
    const { amount, vat, vat_rate: vatRate } = record;
    if (amount === null || vat === null || vatRate === null) {
      return null;
    }

    const expected = roundToCents((amount * vatRate) / 100);
    if (Math.abs(vat - expected) <= this.vatTolerance) {
      return null;
    }

    return { expected, actual: vat };
  }
}
