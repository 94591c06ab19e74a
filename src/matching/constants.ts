/**
 * Constants for the Remittance Matching Engine
 *
 * These values define how normalization keys are accepted and how
 * confidence is scored for each pass.
 */

import type { ConfidenceCategory, NormalizationPass } from './types';

// ============================================
// NORMALIZATION
// ============================================

/**
 * Minimum number of digits for a numeric key.
 * Shorter keys ("1", "42") collide across unrelated invoices, so they are
 * never stored in the numeric table and never probed.
 */
export const NUMERIC_MIN_DIGITS = 3;

// ============================================
// CONFIDENCE SCORING
// ============================================

/**
 * Starting confidence for each pass before similarity and amount adjustments.
 */
export const BASE_CONFIDENCE: Readonly<Record<NormalizationPass, number>> = {
  exact: 0.95,
  relaxed: 0.85,
  numeric: 0.7,
};

/**
 * Exact-pass matches whose strings are less similar than this are penalized.
 * Trimming and case folding alone can leave the raw texts looking quite different.
 */
export const EXACT_SIMILARITY_FLOOR = 0.95;
export const EXACT_DISSIMILAR_PENALTY = 0.9;

/**
 * Similarity weighting: factor = floor + weight × similarity.
 */
export const SIMILARITY_WEIGHTING = {
  relaxed: { floor: 0.7, weight: 0.3 },
  numeric: { floor: 0.5, weight: 0.5 },
} as const;

/**
 * Multiplier applied when the paid amount does not agree with the invoice total
 * (or the total is unknown).
 */
export const AMOUNT_MISMATCH_PENALTY = 0.7;

/**
 * Absolute tolerance between paid amount and invoice total, in currency units.
 */
export const AMOUNT_TOLERANCE = 0.01;

/**
 * Decimal places kept on stored confidence values.
 */
export const CONFIDENCE_PRECISION = 4;

// ============================================
// REMITTANCE-LEVEL CONFIDENCE
// ============================================

/**
 * Overall confidence of a remittance in which no line matched.
 */
export const NO_MATCH_OVERALL_CONFIDENCE = 0.2;

/**
 * Lower bounds of each confidence category, highest first.
 */
export const CONFIDENCE_CATEGORY_THRESHOLDS: ReadonlyArray<{
  category: ConfidenceCategory;
  min: number;
}> = [
  { category: 'very_high', min: 0.9 },
  { category: 'high', min: 0.75 },
  { category: 'medium', min: 0.5 },
  { category: 'low', min: 0.3 },
];
