/**
 * Invoice record types
 *
 * The record has a fixed shape: every field is always present and holds
 * `null` when the value could not be determined. Keys use the wire names
 * the extraction prompt asks for, so a record serializes to the output
 * JSON without mapping.
 */

/**
 * Fields holding free text
 */
export const INVOICE_TEXT_FIELDS = [
  'invoice_number',
  'date',
  'supplier',
  'buyer',
] as const;

/**
 * Fields holding real numbers
 */
export const INVOICE_NUMERIC_FIELDS = ['amount', 'vat', 'vat_rate'] as const;

/**
 * Text fields the prompt explicitly allows to be null
 */
export const INVOICE_OPTIONAL_FIELDS = [
  'contract_number',
  'payment_date',
  'meter_number',
] as const;

/**
 * All fields in prompt order
 */
export const INVOICE_FIELDS = [
  'invoice_number',
  'date',
  'supplier',
  'buyer',
  'amount',
  'vat',
  'vat_rate',
  'contract_number',
  'payment_date',
  'meter_number',
] as const;

/**
 * Fields reported as missing by validation when unset
 */
export const REQUIRED_INVOICE_FIELDS = [
  'invoice_number',
  'date',
  'supplier',
  'buyer',
  'amount',
  'vat',
] as const;

export type InvoiceTextField =
  | (typeof INVOICE_TEXT_FIELDS)[number]
  | (typeof INVOICE_OPTIONAL_FIELDS)[number];

export type InvoiceNumericField = (typeof INVOICE_NUMERIC_FIELDS)[number];

export type InvoiceField = (typeof INVOICE_FIELDS)[number];

export type RequiredInvoiceField = (typeof REQUIRED_INVOICE_FIELDS)[number];

/**
 * Structured invoice extracted from a document
 */
export interface InvoiceRecord {
  /** Invoice number as printed */
  invoice_number: string | null;

  /** Issue date, ISO 8601 (YYYY-MM-DD) */
  date: string | null;

  /** Organization that issued the invoice */
  supplier: string | null;

  /** Organization the invoice is addressed to */
  buyer: string | null;

  /** Amount net of VAT */
  amount: number | null;

  /** VAT amount */
  vat: number | null;

  /** VAT rate in percent (e.g. 20) */
  vat_rate: number | null;

  contract_number: string | null;

  /** Payment due date, ISO 8601 */
  payment_date: string | null;

  meter_number: string | null;
}
