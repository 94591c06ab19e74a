/**
 * Matching Orchestrator
 *
 * Coordinates one matching run over a whole payment advice:
 *
 *   init → building_tables → resolving → scoring → resolved
 *
 * 1. Build the exact, relaxed and numeric lookup tables concurrently (join #1).
 *    An empty invoice snapshot skips straight to resolved, every line unmatched.
 * 2. Resolve every payment line concurrently, each line fanning out its own
 *    three probes (join #2, one join per chunk of lines).
 * 3. Score every matched line.
 * 4. Assemble the ordered results and the summary.
 *
 * Results are written into a pre-sized slot per input position, so the output
 * order is the input order whatever order the line tasks finish in.
 * Nothing here can fail: every step is in-memory computation over read-only input.
 */

import { env } from '../config';
import { logger } from '../utils';
import { calculateMatchConfidence } from './confidenceCalculator';
import { buildLookupTables, countVariations } from './lookupTable';
import { resolveMatch } from './resolveMatch';
import { buildMatchSummary } from './summary';
import type {
  AmountCheck,
  InvoiceIdentifier,
  LookupTables,
  MatchResult,
  MatchingOutcome,
  PassMatch,
  PaymentLine,
  UnmatchedResult,
} from './types';

export type OrchestratorState = 'init' | 'building_tables' | 'resolving' | 'scoring' | 'resolved';

export interface MatchingOrchestratorOptions {
  /**
   * Whether a line's paid amount agrees with the matched invoice's total.
   * Without one, every total is treated as unknown and the amount penalty applies.
   */
  checkAmount?: AmountCheck;
  /** Number of lines resolved per join. Anything but a finite number >= 1 falls back to MATCHING_CHUNK_SIZE. */
  chunkSize?: number;
}

const amountUnknown: AmountCheck = () => false;

function unmatchedResult(line: PaymentLine, index: number): UnmatchedResult {
  return {
    lineNumber: index + 1,
    paymentRawText: line.rawInvoiceText,
    paidAmount: line.paidAmount,
    matchedInvoice: null,
    pass: null,
    confidence: null,
  };
}

export class MatchingOrchestrator {
  private state: OrchestratorState = 'init';
  private outcome: Promise<MatchingOutcome> | null = null;
  private readonly checkAmount: AmountCheck;
  private readonly chunkSize: number;

  constructor(
    private readonly invoiceNumbers: readonly InvoiceIdentifier[],
    private readonly lines: readonly PaymentLine[],
    options: MatchingOrchestratorOptions = {}
  ) {
    this.checkAmount = options.checkAmount ?? amountUnknown;
    const chunkSize = options.chunkSize;
    this.chunkSize =
      chunkSize !== undefined && Number.isFinite(chunkSize) && chunkSize >= 1
        ? Math.floor(chunkSize)
        : env.MATCHING_CHUNK_SIZE;
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  /**
   * Runs the batch. An orchestrator runs once; later calls return the same outcome.
   */
  run(): Promise<MatchingOutcome> {
    if (!this.outcome) {
      this.outcome = this.execute();
    }
    return this.outcome;
  }

  private async execute(): Promise<MatchingOutcome> {
    const startedAt = Date.now();

    this.transition('building_tables');

    if (this.invoiceNumbers.length === 0) {
      logger.warn(
        `No invoices available for matching; ${this.lines.length} line(s) left unmatched`
      );
      const results = this.lines.map((line, index) => unmatchedResult(line, index));
      return this.finish(results, startedAt);
    }

    const tables = await buildLookupTables(this.invoiceNumbers);
    logger.debug(
      `Built lookup tables with ${countVariations(tables)} variations from ${this.invoiceNumbers.length} invoices`
    );

    this.transition('resolving');
    const matches = await this.resolveAll(tables);

    this.transition('scoring');
    const results = matches.map((match, index) => this.score(this.lines[index], index, match));

    return this.finish(results, startedAt);
  }

  private async resolveAll(tables: LookupTables): Promise<Array<PassMatch | null>> {
    const slots: Array<PassMatch | null> = this.lines.map(() => null);

    for (let start = 0; start < this.lines.length; start += this.chunkSize) {
      const chunk = this.lines.slice(start, start + this.chunkSize);

      await Promise.all(
        chunk.map(async (line, offset) => {
          slots[start + offset] = await resolveMatch(line.rawInvoiceText, tables);
        })
      );
    }

    return slots;
  }

  private score(line: PaymentLine, index: number, match: PassMatch | null): MatchResult {
    if (!match) {
      return unmatchedResult(line, index);
    }

    const { confidence } = calculateMatchConfidence({
      pass: match.pass,
      originalText: line.rawInvoiceText,
      matchedInvoice: match.invoiceNumber,
      amountWithinTolerance: this.checkAmount(line, match.invoiceNumber),
    });

    logger.debug(
      `Matched '${line.rawInvoiceText}' to '${match.invoiceNumber}' via ${match.pass} with confidence ${confidence}`
    );

    return {
      lineNumber: index + 1,
      paymentRawText: line.rawInvoiceText,
      paidAmount: line.paidAmount,
      matchedInvoice: match.invoiceNumber,
      pass: match.pass,
      confidence,
    };
  }

  private finish(results: MatchResult[], startedAt: number): MatchingOutcome {
    this.transition('resolved');

    const summary = buildMatchSummary(results, Date.now() - startedAt);
    logger.info(
      `Matching completed: ${summary.matchedCount}/${summary.totalLines} matched in ${summary.processingTimeMs}ms ` +
        `(exact ${summary.exactMatches}, relaxed ${summary.relaxedMatches}, numeric ${summary.numericMatches})`
    );

    return { results, summary };
  }

  private transition(next: OrchestratorState): void {
    logger.debug(`Matching run: ${this.state} → ${next}`);
    this.state = next;
  }
}

/**
 * Matches a batch of payment lines against an invoice snapshot in one run.
 *
 * @example
 * const { results, summary } = await matchPayments(
 *   ['INV 39832', 'EXACT-MATCH-001'],
 *   [{ rawInvoiceText: 'INV39832', paidAmount: 120.5 }]
 * );
 * // results[0].pass === 'relaxed', summary.matchPercentage === 100
 */
export function matchPayments(
  invoiceNumbers: readonly InvoiceIdentifier[],
  lines: readonly PaymentLine[],
  options: MatchingOrchestratorOptions = {}
): Promise<MatchingOutcome> {
  return new MatchingOrchestrator(invoiceNumbers, lines, options).run();
}

export default matchPayments;
