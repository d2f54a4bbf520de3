export {
  INVOICE_FIELDS,
  INVOICE_NUMERIC_FIELDS,
  INVOICE_OPTIONAL_FIELDS,
  INVOICE_TEXT_FIELDS,
  REQUIRED_INVOICE_FIELDS,
} from './invoice-record';
export type {
  InvoiceField,
  InvoiceNumericField,
  InvoiceRecord,
  InvoiceTextField,
  RequiredInvoiceField,
} from './invoice-record';
export { isDiagnosticFailure } from './diagnostic-failure';
export type { AuditOutput, DiagnosticFailure } from './diagnostic-failure';
export type {
  ExtractedText,
  PageExtraction,
  TextAcquirer,
  TextAcquisitionMethod,
} from './extracted-text';
export type {
  InvoiceAuditReport,
  RecoveryTier,
  ValidationReport,
  VatMismatch,
} from './audit-report';
