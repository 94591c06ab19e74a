/**
 * Lookup Table Construction
 *
 * One table per pass, built fresh for every matching run from the
 * current invoice snapshot. A key keeps every invoice number that
 * normalizes to it, in snapshot order; matching only ever reads the first.
 */

import { isUsableKey, normalizeForPass } from './normalizeInvoiceNumber';
import type { InvoiceIdentifier, LookupTable, LookupTables, NormalizationPass } from './types';

/**
 * Builds the lookup table for a single pass.
 *
 * @example
 * buildLookupTable('numeric', ['A-123', 'B-123', 'C-7']).entries
 * // Map { '123' => ['A-123', 'B-123'] }   ('7' is below the digit floor)
 */
export function buildLookupTable(
  pass: NormalizationPass,
  invoiceNumbers: readonly InvoiceIdentifier[]
): LookupTable {
  const entries = new Map<string, InvoiceIdentifier[]>();

  for (const invoiceNumber of invoiceNumbers) {
    const key = normalizeForPass(pass, invoiceNumber);
    if (!isUsableKey(pass, key)) continue;

    const bucket = entries.get(key);
    if (bucket) {
      bucket.push(invoiceNumber);
    } else {
      entries.set(key, [invoiceNumber]);
    }
  }

  return { pass, entries };
}

/**
 * Builds the exact, relaxed and numeric tables concurrently.
 * Each build owns its own map; nothing is shared until all three have finished.
 */
export async function buildLookupTables(
  invoiceNumbers: readonly InvoiceIdentifier[]
): Promise<LookupTables> {
  const build = async (pass: NormalizationPass): Promise<LookupTable> =>
    buildLookupTable(pass, invoiceNumbers);

  const [exact, relaxed, numeric] = await Promise.all([
    build('exact'),
    build('relaxed'),
    build('numeric'),
  ]);

  return { exact, relaxed, numeric };
}

/**
 * Number of distinct keys across all three tables.
 */
export function countVariations(tables: LookupTables): number {
  return tables.exact.entries.size + tables.relaxed.entries.size + tables.numeric.entries.size;
}
