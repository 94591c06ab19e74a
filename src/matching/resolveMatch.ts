/**
 * Match Resolution for a single payment line
 *
 * Logically a cascade (exact, then relaxed, then numeric), but all three
 * probes are launched together and the winner is picked once they have
 * all settled. Only the priority at selection time decides the result;
 * completion order never does.
 */

import { findInPass } from './passMatcher';
import { NORMALIZATION_PASSES, type LookupTables, type PassMatch } from './types';

export async function resolveMatch(rawText: string, tables: LookupTables): Promise<PassMatch | null> {
  const probes = await Promise.all(
    NORMALIZATION_PASSES.map(async (pass) => findInPass(rawText, tables[pass]))
  );

  // probes[i] belongs to NORMALIZATION_PASSES[i], which is in priority order
  for (let i = 0; i < NORMALIZATION_PASSES.length; i++) {
    const invoiceNumber = probes[i];
    if (invoiceNumber !== null) {
      return { pass: NORMALIZATION_PASSES[i], invoiceNumber };
    }
  }

  return null;
}

export default resolveMatch;
