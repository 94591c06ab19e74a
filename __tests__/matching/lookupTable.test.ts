/**
 * Tests for Lookup Table Construction
 */

import {
  buildLookupTable,
  buildLookupTables,
  countVariations,
} from '../../src/matching/lookupTable';

describe('buildLookupTable', () => {
  it('should tag the table with its pass', () => {
    expect(buildLookupTable('relaxed', ['A-1']).pass).toBe('relaxed');
  });

  it('should keep every invoice sharing a key, in snapshot order', () => {
    const table = buildLookupTable('exact', ['INV-1', 'inv-1 ', 'B']);

    expect(table.entries.get('INV-1')).toEqual(['INV-1', 'inv-1 ']);
    expect(table.entries.get('B')).toEqual(['B']);
    expect(table.entries.size).toBe(2);
  });

  it('should skip invoices whose key is empty', () => {
    const invoices = ['   ', '---'];

    expect([...buildLookupTable('exact', invoices).entries.keys()]).toEqual(['---']);
    expect(buildLookupTable('relaxed', invoices).entries.size).toBe(0);
  });

  it('should skip numeric keys shorter than three digits', () => {
    const table = buildLookupTable('numeric', ['A-12', 'B-123', 'C-7']);

    expect([...table.entries.keys()]).toEqual(['123']);
    expect(table.entries.get('123')).toEqual(['B-123']);
  });

  it('should return an empty table for an empty snapshot', () => {
    expect(buildLookupTable('exact', []).entries.size).toBe(0);
  });
});

describe('buildLookupTables', () => {
  it('should build one table per pass', async () => {
    const tables = await buildLookupTables(['INV 39832', 'ABC-123-DEF']);

    expect(tables.exact.pass).toBe('exact');
    expect(tables.relaxed.pass).toBe('relaxed');
    expect(tables.numeric.pass).toBe('numeric');

    expect([...tables.exact.entries.keys()]).toEqual(['INV 39832', 'ABC-123-DEF']);
    expect([...tables.relaxed.entries.keys()]).toEqual(['INV39832', 'ABC123DEF']);
    expect([...tables.numeric.entries.keys()]).toEqual(['39832', '123']);
  });

  it('should map keys back to the original invoice numbers', async () => {
    const tables = await buildLookupTables(['Inv--39791']);

    expect(tables.relaxed.entries.get('INV39791')).toEqual(['Inv--39791']);
    expect(tables.numeric.entries.get('39791')).toEqual(['Inv--39791']);
  });

  it('should count distinct keys across all tables', async () => {
    // exact: 2 keys, relaxed: 2 keys, numeric: 1 key ('12' is below the floor)
    const tables = await buildLookupTables(['A-123', 'B-12']);

    expect(countVariations(tables)).toBe(5);
  });
});
