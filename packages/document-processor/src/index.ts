export { InvoiceAuditor } from './invoice-auditor';
export type { InvoiceAuditorOptions } from './invoice-auditor';
export { InvoiceExtractor } from './extractors/invoice-extractor';
export type {
  CompletionService,
  ExtractionResult,
  InvoiceExtractorOptions,
} from './extractors/invoice-extractor';
export { CompletionExhaustedError } from './extractors/completion-exhausted-error';
export { DEFAULT_RETRY_POLICY, decideNextStep } from './extractors/retry-policy';
export type {
  CompletionOutcome,
  RetryDecision,
  RetryPolicy,
} from './extractors/retry-policy';
export {
  FieldSalvageStrategy,
  RepairedJsonStrategy,
  ResponseRecoveryParser,
  StrictJsonStrategy,
  createEmptyRecord,
  isBlankRecord,
  isolateJsonCandidate,
  repairJson,
  toInvoiceRecord,
} from './parsers/response-recovery-parser';
export type {
  RecoveryResult,
  RecoveryStrategy,
} from './parsers/response-recovery-parser';
export { buildInvoiceExtractionPrompt } from './prompts/invoice-extraction-prompt';
export { TextNormalizer } from './utils/text-normalizer';
export { ConsistencyValidator } from './validators/consistency-validator';
export type { ConsistencyValidatorOptions } from './validators/consistency-validator';
export { CONSISTENCY_VALIDATOR, INVOICE_EXTRACTOR } from './config/constants';
