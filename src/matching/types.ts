/**
 * Type Definitions for the Remittance Matching Engine
 *
 * The engine is pure and deterministic: it takes a snapshot of invoice
 * numbers and the lines of one payment advice, and returns one result per line.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * Canonical invoice number as recorded in the ledger.
 */
export type InvoiceIdentifier = string;

/**
 * One line item extracted from a payment-advice document.
 */
export interface PaymentLine {
  /** Invoice reference exactly as it appears on the remittance */
  rawInvoiceText: string;
  /** Amount paid against that reference */
  paidAmount: number;
}

/**
 * Decides whether a line's paid amount agrees with the matched invoice's total.
 * Supplied by the caller, which owns the invoice totals.
 */
export type AmountCheck = (line: PaymentLine, matchedInvoice: InvoiceIdentifier) => boolean;

// ============================================
// NORMALIZATION
// ============================================

/**
 * Normalization passes in priority order. Exact wins over relaxed, relaxed over numeric.
 */
export const NORMALIZATION_PASSES = ['exact', 'relaxed', 'numeric'] as const;

export type NormalizationPass = (typeof NORMALIZATION_PASSES)[number];

/**
 * Normalized key → invoice numbers sharing that key, in snapshot order.
 */
export interface LookupTable {
  readonly pass: NormalizationPass;
  readonly entries: ReadonlyMap<string, readonly InvoiceIdentifier[]>;
}

export type LookupTables = Readonly<Record<NormalizationPass, LookupTable>>;

/**
 * Outcome of probing the lookup tables for one payment line.
 */
export interface PassMatch {
  pass: NormalizationPass;
  invoiceNumber: InvoiceIdentifier;
}

// ============================================
// OUTPUT TYPES
// ============================================

interface MatchResultBase {
  /** 1-based position of the line in the payment advice */
  lineNumber: number;
  paymentRawText: string;
  paidAmount: number;
}

export interface MatchedResult extends MatchResultBase {
  matchedInvoice: InvoiceIdentifier;
  pass: NormalizationPass;
  /** Confidence in [0, 1] */
  confidence: number;
}

export interface UnmatchedResult extends MatchResultBase {
  matchedInvoice: null;
  pass: null;
  confidence: null;
}

/**
 * Result for a single payment line. `pass` and `confidence` are set exactly when `matchedInvoice` is.
 */
export type MatchResult = MatchedResult | UnmatchedResult;

/**
 * Aggregate statistics for one matching run.
 */
export interface MatchSummary {
  totalLines: number;
  matchedCount: number;
  unmatchedCount: number;
  /** Percentage of lines matched (0-100, one decimal place) */
  matchPercentage: number;
  allMatched: boolean;
  exactMatches: number;
  relaxedMatches: number;
  numericMatches: number;
  /** Wall-clock time of the whole run */
  processingTimeMs: number;
}

export interface MatchingOutcome {
  results: MatchResult[];
  summary: MatchSummary;
}

// ============================================
// CONFIDENCE
// ============================================

/**
 * Parameters for the confidence calculator function.
 */
export interface ConfidenceParams {
  pass: NormalizationPass;
  originalText: string;
  matchedInvoice: InvoiceIdentifier;
  amountWithinTolerance: boolean;
}

/**
 * How a confidence value was reached.
 */
export interface ConfidenceBreakdown {
  pass: NormalizationPass;
  /** Base confidence for the pass */
  baseConfidence: number;
  /** Jaccard index of the two strings' character sets (0-1) */
  similarity: number;
  /** Multiplier derived from the similarity for this pass */
  similarityFactor: number;
  /** 1 when the amounts agree, the mismatch penalty otherwise */
  amountFactor: number;
  /** Confidence before clamping */
  rawConfidence: number;
}

export type ConfidenceCategory = 'very_high' | 'high' | 'medium' | 'low' | 'very_low';
