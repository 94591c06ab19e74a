import { buildLookupTables } from './lookupTable';
import { resolveMatch } from './resolveMatch';
import type { InvoiceIdentifier, PassMatch } from './types';

/**
 * Resolves bare invoice references without scoring them.
 *
 * Kept for callers that only need the pass and invoice per reference.
 * Tables are built once for the whole call and shared by every reference.
 *
 * @example
 * await matchPaymentsConcurrent(['123', 'NOPE'], ['ABC-123-DEF'])
 * // [['123', { pass: 'numeric', invoiceNumber: 'ABC-123-DEF' }], ['NOPE', null]]
 */
export async function matchPaymentsConcurrent(
  paymentTexts: readonly string[],
  invoiceNumbers: readonly InvoiceIdentifier[]
): Promise<Array<[string, PassMatch | null]>> {
  const tables = await buildLookupTables(invoiceNumbers);

  return Promise.all(
    paymentTexts.map(async (text): Promise<[string, PassMatch | null]> => [
      text,
      await resolveMatch(text, tables),
    ])
  );
}

export default matchPaymentsConcurrent;
