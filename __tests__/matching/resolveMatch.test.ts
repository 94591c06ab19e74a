/**
 * Tests for priority-ordered match resolution
 */

import { buildLookupTables } from '../../src/matching/lookupTable';
import { resolveMatch } from '../../src/matching/resolveMatch';

describe('resolveMatch', () => {
  it('should prefer exact over relaxed and numeric', async () => {
    const tables = await buildLookupTables(['INV-100']);

    // 'inv-100' matches under all three passes
    await expect(resolveMatch('inv-100', tables)).resolves.toEqual({
      pass: 'exact',
      invoiceNumber: 'INV-100',
    });
  });

  it('should prefer relaxed over numeric', async () => {
    // numeric '555' would pick X-555 (first in snapshot); relaxed picks AB 555
    const tables = await buildLookupTables(['X-555', 'AB 555']);

    await expect(resolveMatch('AB555', tables)).resolves.toEqual({
      pass: 'relaxed',
      invoiceNumber: 'AB 555',
    });
  });

  it('should fall back to numeric', async () => {
    const tables = await buildLookupTables(['Invoice-Sarah-39859']);

    await expect(resolveMatch('39859', tables)).resolves.toEqual({
      pass: 'numeric',
      invoiceNumber: 'Invoice-Sarah-39859',
    });
  });

  it('should return null when no pass matches', async () => {
    const tables = await buildLookupTables(['INV-100']);

    await expect(resolveMatch('NOMATCH99999', tables)).resolves.toBeNull();
  });

  it('should return null against empty tables', async () => {
    const tables = await buildLookupTables([]);

    await expect(resolveMatch('INV-100', tables)).resolves.toBeNull();
  });
});
