import { isUsableKey, normalizeForPass } from './normalizeInvoiceNumber';
import type { InvoiceIdentifier, LookupTable } from './types';

/**
 * Probes one lookup table with a payment's raw invoice text.
 *
 * Returns the first invoice number registered under the normalized key,
 * or null when the key is unusable or absent. The table is never modified.
 */
export function findInPass(rawText: string, table: LookupTable): InvoiceIdentifier | null {
  const key = normalizeForPass(table.pass, rawText);
  if (!isUsableKey(table.pass, key)) {
    return null;
  }

  const candidates = table.entries.get(key);
  return candidates && candidates.length > 0 ? candidates[0] : null;
}

export default findInPass;
