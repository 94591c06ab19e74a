/**
 * Remittance Matching Engine
 *
 * Pure, deterministic matching of remittance lines to invoice numbers
 * using three normalization passes:
 * - exact   (trimmed, uppercased)
 * - relaxed (letters and digits only)
 * - numeric (digits only, at least 3)
 *
 * Usage:
 * ```typescript
 * import { matchPayments } from './matching';
 *
 * const { results, summary } = await matchPayments(invoiceNumbers, lines, { checkAmount });
 * console.log(results[0].pass); // 'exact' | 'relaxed' | 'numeric' | null
 * ```
 */

// Main entry points
export { MatchingOrchestrator, matchPayments } from './matchingOrchestrator';
export type { MatchingOrchestratorOptions, OrchestratorState } from './matchingOrchestrator';
export { matchPaymentsConcurrent } from './matchPaymentsConcurrent';

// Building blocks (for testing/debugging)
export {
  exactNormalize,
  relaxedNormalize,
  numericNormalize,
  normalizeForPass,
  isUsableKey,
  generateVariations,
} from './normalizeInvoiceNumber';
export { buildLookupTable, buildLookupTables, countVariations } from './lookupTable';
export { findInPass } from './passMatcher';
export { resolveMatch } from './resolveMatch';
export { calculateCharacterSimilarity } from './characterSimilarity';
export { isAmountWithinTolerance } from './amountTolerance';
export {
  calculateMatchConfidence,
  calculateOverallConfidence,
  generateExplanation,
  getConfidenceCategory,
  shouldAutoApprove,
  requiresManualReview,
} from './confidenceCalculator';
export { buildMatchSummary } from './summary';

// Constants
export {
  NUMERIC_MIN_DIGITS,
  BASE_CONFIDENCE,
  AMOUNT_TOLERANCE,
  AMOUNT_MISMATCH_PENALTY,
  CONFIDENCE_CATEGORY_THRESHOLDS,
} from './constants';

// Types
export { NORMALIZATION_PASSES } from './types';
export type {
  InvoiceIdentifier,
  PaymentLine,
  AmountCheck,
  NormalizationPass,
  LookupTable,
  LookupTables,
  PassMatch,
  MatchedResult,
  UnmatchedResult,
  MatchResult,
  MatchSummary,
  MatchingOutcome,
  ConfidenceParams,
  ConfidenceBreakdown,
  ConfidenceCategory,
} from './types';
