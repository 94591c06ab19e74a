/**
 * Confidence Score Calculator for Remittance Matching
 *
 * Combines three signals into a single confidence in [0, 1]:
 * 1. The pass that produced the match (exact 0.95, relaxed 0.85, numeric 0.70)
 * 2. Character-set similarity between the remittance text and the invoice number
 * 3. Whether the paid amount agrees with the invoice total
 *
 * Per pass:
 * - exact:   base × (similarity < 0.95 ? 0.90 : 1)
 * - relaxed: base × (0.7 + 0.3 × similarity)
 * - numeric: base × (0.5 + 0.5 × similarity)
 * then × 0.70 when the amounts disagree, clamped to [0, 1].
 */

import { env } from '../config';
import { calculateCharacterSimilarity } from './characterSimilarity';
import {
  AMOUNT_MISMATCH_PENALTY,
  BASE_CONFIDENCE,
  CONFIDENCE_CATEGORY_THRESHOLDS,
  CONFIDENCE_PRECISION,
  EXACT_DISSIMILAR_PENALTY,
  EXACT_SIMILARITY_FLOOR,
  NO_MATCH_OVERALL_CONFIDENCE,
  SIMILARITY_WEIGHTING,
} from './constants';
import type {
  ConfidenceBreakdown,
  ConfidenceCategory,
  ConfidenceParams,
  NormalizationPass,
} from './types';

const PRECISION_FACTOR = 10 ** CONFIDENCE_PRECISION;

const roundConfidence = (value: number): number =>
  Math.round(value * PRECISION_FACTOR) / PRECISION_FACTOR;

const clampUnit = (value: number): number => Math.max(0, Math.min(1, value));

function similarityFactorFor(pass: NormalizationPass, similarity: number): number {
  switch (pass) {
    case 'exact':
      return similarity < EXACT_SIMILARITY_FLOOR ? EXACT_DISSIMILAR_PENALTY : 1;
    case 'relaxed':
      return SIMILARITY_WEIGHTING.relaxed.floor + SIMILARITY_WEIGHTING.relaxed.weight * similarity;
    case 'numeric':
      return SIMILARITY_WEIGHTING.numeric.floor + SIMILARITY_WEIGHTING.numeric.weight * similarity;
  }
}

/**
 * Calculates the confidence of a single match with a detailed breakdown.
 *
 * @example
 * calculateMatchConfidence({
 *   pass: 'relaxed',
 *   originalText: 'INV39832',
 *   matchedInvoice: 'INV 39832',
 *   amountWithinTolerance: true,
 * })
 * // confidence: 0.85 × (0.7 + 0.3 × 0.875) = 0.8181
 */
export function calculateMatchConfidence(params: ConfidenceParams): {
  confidence: number;
  breakdown: ConfidenceBreakdown;
} {
  const { pass, originalText, matchedInvoice, amountWithinTolerance } = params;

  const baseConfidence = BASE_CONFIDENCE[pass];
  const similarity = calculateCharacterSimilarity(originalText, matchedInvoice);
  const similarityFactor = similarityFactorFor(pass, similarity);
  const amountFactor = amountWithinTolerance ? 1 : AMOUNT_MISMATCH_PENALTY;

  const rawConfidence = baseConfidence * similarityFactor * amountFactor;

  return {
    confidence: roundConfidence(clampUnit(rawConfidence)),
    breakdown: {
      pass,
      baseConfidence,
      similarity: roundConfidence(similarity),
      similarityFactor: roundConfidence(similarityFactor),
      amountFactor,
      rawConfidence: roundConfidence(rawConfidence),
    },
  };
}

/**
 * Generates a human-readable explanation of the confidence calculation.
 */
export function generateExplanation(breakdown: ConfidenceBreakdown): string {
  const parts: string[] = [];

  parts.push(`Matched via ${breakdown.pass} pass (base ${breakdown.baseConfidence})`);
  parts.push(
    `Character similarity: ${breakdown.similarity} (factor: ${breakdown.similarityFactor})`
  );

  if (breakdown.amountFactor < 1) {
    parts.push(`Amount mismatch penalty: x${breakdown.amountFactor}`);
  } else {
    parts.push('Amount within tolerance');
  }

  parts.push(`Final confidence: ${roundConfidence(clampUnit(breakdown.rawConfidence))}`);

  return parts.join('. ');
}

/**
 * Overall confidence of a remittance from its per-line confidences.
 *
 * The mean of the matched lines is scaled by the share of lines matched,
 * then averaged with the extraction confidence when one is known.
 *
 * @param lineConfidences - One entry per line; null for unmatched lines
 * @param extractionConfidence - Confidence reported by document extraction, if any
 *
 * @example
 * calculateOverallConfidence([0.9, null, 0.7, null]) // 0.8 × 2/4 = 0.4
 */
export function calculateOverallConfidence(
  lineConfidences: ReadonlyArray<number | null>,
  extractionConfidence?: number
): number {
  const matched = lineConfidences.filter((c): c is number => c !== null);

  let base: number;
  if (matched.length === 0) {
    base = NO_MATCH_OVERALL_CONFIDENCE;
  } else {
    const average = matched.reduce((sum, c) => sum + c, 0) / matched.length;
    base = average * (matched.length / lineConfidences.length);
  }

  const combined = extractionConfidence === undefined ? base : (base + extractionConfidence) / 2;

  return roundConfidence(clampUnit(combined));
}

export function getConfidenceCategory(confidence: number): ConfidenceCategory {
  const match = CONFIDENCE_CATEGORY_THRESHOLDS.find(({ min }) => confidence >= min);
  return match ? match.category : 'very_low';
}

export function shouldAutoApprove(
  confidence: number,
  threshold: number = env.MATCHING_AUTO_APPROVE_THRESHOLD
): boolean {
  return confidence >= threshold;
}

export function requiresManualReview(
  confidence: number,
  threshold: number = env.MATCHING_MANUAL_REVIEW_THRESHOLD
): boolean {
  return confidence < threshold;
}

export default calculateMatchConfidence;
