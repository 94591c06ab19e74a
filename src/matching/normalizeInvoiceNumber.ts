/**
 * Invoice Number Normalization
 *
 * Remittances quote invoice numbers with arbitrary casing, spacing and
 * punctuation. Each pass maps a raw reference onto a key; two references
 * match under a pass when their keys are equal.
 *
 * Example keys for "  Inv-00123/a ":
 * - exact   → "INV-00123/A"
 * - relaxed → "INV00123A"
 * - numeric → "00123"
 */

import { NUMERIC_MIN_DIGITS } from './constants';
import { NORMALIZATION_PASSES, type NormalizationPass } from './types';

/**
 * Trims surrounding whitespace and uppercases.
 *
 * @example
 * exactNormalize("  inv-001 ") // "INV-001"
 */
export function exactNormalize(input: string): string {
  return input.trim().toUpperCase();
}

/**
 * Keeps only ASCII letters and digits, uppercased.
 *
 * @example
 * relaxedNormalize("Inv--39791") // "INV39791"
 */
export function relaxedNormalize(input: string): string {
  return input
    .trim()
    .replace(/[^A-Za-z0-9]/g, '')
    .toUpperCase();
}

/**
 * Keeps only the decimal digits (any script), in their original order.
 *
 * @example
 * numericNormalize("Invoice-Sarah-39859") // "39859"
 */
export function numericNormalize(input: string): string {
  return input.replace(/\P{Nd}/gu, '');
}

const NORMALIZERS: Readonly<Record<NormalizationPass, (input: string) => string>> = {
  exact: exactNormalize,
  relaxed: relaxedNormalize,
  numeric: numericNormalize,
};

export function normalizeForPass(pass: NormalizationPass, input: string): string {
  return NORMALIZERS[pass](input);
}

/**
 * Whether a normalized key may be stored in, or probed against, a pass's table.
 * Empty keys never are; numeric keys also need at least NUMERIC_MIN_DIGITS digits.
 */
export function isUsableKey(pass: NormalizationPass, key: string): boolean {
  if (key.length === 0) return false;
  if (pass === 'numeric') return [...key].length >= NUMERIC_MIN_DIGITS;
  return true;
}

/**
 * Returns the distinct usable keys of an invoice number, in pass priority order.
 *
 * @example
 * generateVariations("INV-123") // ["INV-123", "INV123", "123"]
 * generateVariations("ABC")     // ["ABC"]
 */
export function generateVariations(input: string): string[] {
  const variations: string[] = [];

  for (const pass of NORMALIZATION_PASSES) {
    const key = normalizeForPass(pass, input);
    if (isUsableKey(pass, key) && !variations.includes(key)) {
      variations.push(key);
    }
  }

  return variations;
}
