import type { InvoiceRecord, RecoveryTier } from '@invoice-audit/model';

import {
  INVOICE_FIELDS,
  INVOICE_NUMERIC_FIELDS,
  INVOICE_OPTIONAL_FIELDS,
  INVOICE_TEXT_FIELDS,
} from '@invoice-audit/model';

/**
 * One step of the recovery chain
 */
export interface RecoveryStrategy {
  readonly tier: RecoveryTier;

  /**
   * Try to build a record from the isolated candidate.
   * Returns null when this tier cannot handle the candidate.
   */
  tryRecover(candidate: string): InvoiceRecord | null;
}

/**
 * Result of recovering a reply
 */
export interface RecoveryResult {
  record: InvoiceRecord;
  tier: RecoveryTier;
}

export function createEmptyRecord(): InvoiceRecord {
  return {
    invoice_number: null,
    date: null,
    supplier: null,
    buyer: null,
    amount: null,
    vat: null,
    vat_rate: null,
    contract_number: null,
    payment_date: null,
    meter_number: null,
  };
}

/**
 * Whether every field of the record is unset
 */
export function isBlankRecord(record: InvoiceRecord): boolean {
  return INVOICE_FIELDS.every((field) => record[field] === null);
}

/**
 * Strip code fences and cut the reply down to the outermost JSON object.
 *
 * Inside the object every whitespace run becomes one space. This joins
 * values broken across lines ("ООО\nРога" -> "ООО Рога") and is harmless
 * for JSON structure. Without braces the trimmed text is returned as is.
 */
export function isolateJsonCandidate(reply: string): string {
  const text = reply.replace(/```(?:json)?\s*/g, '').trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');

  if (start === -1 || end <= start) {
    return text;
  }

  return text.slice(start, end + 1).replace(/\s+/g, ' ');
}

/**
 * Fix the syntax errors models commonly make: trailing commas and
 * single-quoted strings.
 */
export function repairJson(candidate: string): string {
  return candidate
    .replace(/,\s*}/g, '}')
    .replace(/,\s*\]/g, ']')
    .replace(/'/g, '"');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Numbers pass through; numeric strings are converted, accepting a
 * decimal comma and digit-group spaces ("1 200,50").
 */
function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const compact = value.replace(/\s/g, '').replace(',', '.');
  if (!DECIMAL_PATTERN.test(compact)) return null;

  const parsed = Number(compact);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Coerce a parsed JSON value to the fixed record shape.
 * Returns null unless the value is a plain object; unknown keys are dropped.
 */
export function toInvoiceRecord(value: unknown): InvoiceRecord | null {
  if (!isPlainObject(value)) return null;

  const record = createEmptyRecord();
  for (const field of [...INVOICE_TEXT_FIELDS, ...INVOICE_OPTIONAL_FIELDS]) {
    record[field] = toText(value[field]);
  }
  for (const field of INVOICE_NUMERIC_FIELDS) {
    record[field] = toNumber(value[field]);
  }
  return record;
}

function parseJson(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

/**
 * Tier 1: the candidate is valid JSON
 */
export class StrictJsonStrategy implements RecoveryStrategy {
  readonly tier = 'strict';

  tryRecover(candidate: string): InvoiceRecord | null {
    return toInvoiceRecord(parseJson(candidate));
  }
}

/**
 * Tier 2: valid JSON after repairJson()
 */
export class RepairedJsonStrategy implements RecoveryStrategy {
  readonly tier = 'repaired';

  tryRecover(candidate: string): InvoiceRecord | null {
    return toInvoiceRecord(parseJson(repairJson(candidate)));
  }
}

/**
 * Tier 3: per-field regular expressions over the repaired candidate.
 * Always yields a record; fields without a match stay unset.
 */
export class FieldSalvageStrategy implements RecoveryStrategy {
  readonly tier = 'salvaged';

  tryRecover(candidate: string): InvoiceRecord {
    const text = repairJson(candidate);
    const record = createEmptyRecord();

    for (const field of INVOICE_TEXT_FIELDS) {
      const match = text.match(new RegExp(`"${field}"\\s*:\\s*"([^"]*)"`));
      record[field] = match?.[1] || null;
    }

    for (const field of INVOICE_NUMERIC_FIELDS) {
      const match = text.match(new RegExp(`"${field}"\\s*:\\s*([0-9.]+)`));
      const parsed = match ? Number(match[1]) : NaN;
      record[field] = Number.isFinite(parsed) ? parsed : null;
    }

    for (const field of INVOICE_OPTIONAL_FIELDS) {
      const match = text.match(
        new RegExp(`"${field}"\\s*:\\s*(?:"([^"]*)"|null)`),
      );
      record[field] = match?.[1] || null;
    }

    return record;
  }
}

/**
 * ResponseRecoveryParser
 *
 * Turns a free-form completion reply into an invoice record. Tiers run in
 * order on the isolated candidate and the first record wins. Never throws.
 *
 * @example
 * ```typescript
 * const { record, tier } = new ResponseRecoveryParser().recover(reply);
 * ```
 */
export class ResponseRecoveryParser {
  constructor(
    private readonly strategies: readonly RecoveryStrategy[] = [
      new StrictJsonStrategy(),
      new RepairedJsonStrategy(),
      new FieldSalvageStrategy(),
    ],
  ) {}

  recover(reply: string): RecoveryResult {
    const candidate = isolateJsonCandidate(reply);

    for (const strategy of this.strategies) {
      const record = strategy.tryRecover(candidate);
      if (record) {
        return { record, tier: strategy.tier };
      }
    }

    return { record: createEmptyRecord(), tier: 'salvaged' };
  }
}
