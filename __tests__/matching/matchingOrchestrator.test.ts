/**
 * Tests for the Matching Orchestrator
 *
 * Covers the full run: table build, per-line resolution, scoring and summary,
 * plus the ordering, determinism and tie-break guarantees.
 */

import { MatchingOrchestrator, matchPayments } from '../../src/matching/matchingOrchestrator';
import type { MatchResult, PaymentLine } from '../../src/matching/types';

describe('MatchingOrchestrator', () => {
  // ============================================
  // Test fixtures
  // ============================================

  const INVOICES = [
    'Invoice-Sarah-39859',
    'INV 39832',
    'Inv--39791',
    'ABC-123-DEF',
    'XYZ456QRS',
    'EXACT-MATCH-001',
  ];

  const lines = (...texts: string[]): PaymentLine[] =>
    texts.map((rawInvoiceText, index) => ({ rawInvoiceText, paidAmount: 100 + index }));

  const SCENARIO_LINES = lines(
    'EXACT-MATCH-001',
    '39859',
    'INV39832',
    'INV39791',
    '123',
    '456',
    'NOMATCH99999'
  );

  const passAndInvoice = (results: MatchResult[]) =>
    results.map((r) => [r.paymentRawText, r.pass, r.matchedInvoice]);

  // ============================================
  // End-to-end scenario
  // ============================================

  describe('end-to-end', () => {
    it('should resolve each line through the highest-priority pass that matches', async () => {
      const { results } = await matchPayments(INVOICES, SCENARIO_LINES);

      expect(passAndInvoice(results)).toEqual([
        ['EXACT-MATCH-001', 'exact', 'EXACT-MATCH-001'],
        ['39859', 'numeric', 'Invoice-Sarah-39859'],
        ['INV39832', 'relaxed', 'INV 39832'],
        ['INV39791', 'relaxed', 'Inv--39791'],
        ['123', 'numeric', 'ABC-123-DEF'],
        ['456', 'numeric', 'XYZ456QRS'],
        ['NOMATCH99999', null, null],
      ]);
    });

    it('should summarize the run', async () => {
      const { summary } = await matchPayments(INVOICES, SCENARIO_LINES);

      expect(summary.totalLines).toBe(7);
      expect(summary.matchedCount).toBe(6);
      expect(summary.unmatchedCount).toBe(1);
      expect(summary.matchPercentage).toBe(85.7);
      expect(summary.allMatched).toBe(false);
      expect(summary.exactMatches).toBe(1);
      expect(summary.relaxedMatches).toBe(2);
      expect(summary.numericMatches).toBe(3);
      expect(summary.processingTimeMs).toBeGreaterThanOrEqual(0);
    });

    it('should carry line numbers and paid amounts through', async () => {
      const { results } = await matchPayments(INVOICES, SCENARIO_LINES);

      expect(results[2].lineNumber).toBe(3);
      expect(results[2].paidAmount).toBe(102);
    });
  });

  // ============================================
  // Degenerate input
  // ============================================

  describe('degenerate input', () => {
    it('should mark every line unmatched when the snapshot is empty', async () => {
      const { results, summary } = await matchPayments([], SCENARIO_LINES);

      expect(results).toHaveLength(7);
      for (const result of results) {
        expect(result.matchedInvoice).toBeNull();
        expect(result.pass).toBeNull();
        expect(result.confidence).toBeNull();
      }
      expect(summary.matchedCount).toBe(0);
      expect(summary.unmatchedCount).toBe(7);
      expect(summary.matchPercentage).toBe(0);
    });

    it('should return an empty result list for an empty batch', async () => {
      const { results, summary } = await matchPayments(INVOICES, []);

      expect(results).toEqual([]);
      expect(summary.totalLines).toBe(0);
      expect(summary.matchPercentage).toBe(0);
    });

    it.each([Number.NaN, 0, -3, Number.POSITIVE_INFINITY])(
      'should fall back to the configured chunk size when given %p',
      async (chunkSize) => {
        const { results } = await matchPayments(
          ['INV-001'],
          [{ rawInvoiceText: 'INV-001', paidAmount: 100 }],
          { chunkSize }
        );

        expect(results[0].matchedInvoice).toBe('INV-001');
        expect(results[0].pass).toBe('exact');
      }
    );
  });

  // ============================================
  // Guarantees
  // ============================================

  describe('guarantees', () => {
    it('should keep input order across chunks', async () => {
      const input = lines('456', 'NOPE', '123', 'INV39791', 'EXACT-MATCH-001');
      const { results } = await matchPayments(INVOICES, input, { chunkSize: 2 });

      expect(results.map((r) => r.paymentRawText)).toEqual(input.map((l) => l.rawInvoiceText));
      expect(results.map((r) => r.lineNumber)).toEqual([1, 2, 3, 4, 5]);
    });

    it('should be deterministic apart from the elapsed time', async () => {
      const first = await matchPayments(INVOICES, SCENARIO_LINES);
      const second = await matchPayments(INVOICES, SCENARIO_LINES);

      expect(second.results).toEqual(first.results);
      expect({ ...second.summary, processingTimeMs: 0 }).toEqual({
        ...first.summary,
        processingTimeMs: 0,
      });
    });

    it('should always return the earliest invoice sharing a key', async () => {
      const { results } = await matchPayments(['A-100', 'B-100'], lines('100', 'C100', '#100'));

      expect(results.map((r) => r.matchedInvoice)).toEqual(['A-100', 'A-100', 'A-100']);
      expect(results.map((r) => r.pass)).toEqual(['numeric', 'numeric', 'numeric']);
    });

    it('should never match numerically on fewer than three digits', async () => {
      const { results } = await matchPayments(['INV-12', 'X-7'], lines('12', 'A12', '7'));

      expect(results.map((r) => r.matchedInvoice)).toEqual([null, null, null]);
    });

    it('should report the highest-priority pass when several succeed', async () => {
      const { results } = await matchPayments(['INV-100'], lines('inv-100'));

      expect(results[0].pass).toBe('exact');
    });

    it('should keep every confidence within [0, 1]', async () => {
      const { results } = await matchPayments(INVOICES, SCENARIO_LINES);

      for (const result of results) {
        if (result.confidence !== null) {
          expect(result.confidence).toBeGreaterThanOrEqual(0);
          expect(result.confidence).toBeLessThanOrEqual(1);
        }
      }
    });
  });

  // ============================================
  // Scoring
  // ============================================

  describe('scoring', () => {
    it('should apply the amount penalty when no amount check is given', async () => {
      const { results } = await matchPayments(INVOICES, lines('EXACT-MATCH-001'));

      expect(results[0].confidence).toBeCloseTo(0.665, 4);
    });

    it('should ask the caller whether each matched amount agrees', async () => {
      const checkAmount = jest.fn().mockReturnValue(true);
      const input = lines('EXACT-MATCH-001', 'NOMATCH99999');

      const { results } = await matchPayments(INVOICES, input, { checkAmount });

      expect(checkAmount).toHaveBeenCalledTimes(1);
      expect(checkAmount).toHaveBeenCalledWith(input[0], 'EXACT-MATCH-001');
      expect(results[0].confidence).toBe(0.95);
    });
  });

  // ============================================
  // Lifecycle
  // ============================================

  describe('lifecycle', () => {
    it('should move from init to resolved', async () => {
      const orchestrator = new MatchingOrchestrator(INVOICES, SCENARIO_LINES);

      expect(orchestrator.currentState).toBe('init');
      await orchestrator.run();
      expect(orchestrator.currentState).toBe('resolved');
    });

    it('should reach resolved for an empty snapshot', async () => {
      const orchestrator = new MatchingOrchestrator([], SCENARIO_LINES);

      await orchestrator.run();
      expect(orchestrator.currentState).toBe('resolved');
    });

    it('should run only once', async () => {
      const orchestrator = new MatchingOrchestrator(INVOICES, SCENARIO_LINES);

      const first = orchestrator.run();
      const second = orchestrator.run();

      expect(second).toBe(first);
      await expect(second).resolves.toBe(await first);
    });
  });
});
