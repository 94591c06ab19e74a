/**
 * Character-set similarity between a remittance reference and an invoice number.
 *
 * Jaccard index over the distinct characters of both strings, compared
 * case-insensitively. Character order is ignored, so "ABC" and "CBA" score 1.
 *
 * @returns Similarity from 0 to 1; 0 when either string is empty
 *
 * @example
 * calculateCharacterSimilarity("INV39832", "INV 39832") // 7/8 = 0.875
 * calculateCharacterSimilarity("123", "ABC-123-DEF")     // 3/10 = 0.3
 */
export function calculateCharacterSimilarity(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  const setA = new Set(a.toLowerCase());
  const setB = new Set(b.toLowerCase());

  let intersection = 0;
  for (const char of setA) {
    if (setB.has(char)) intersection++;
  }

  const union = setA.size + setB.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

export default calculateCharacterSimilarity;
