/**
 * Remittance Matching Service
 *
 * Runs the matching engine for one payment advice:
 * - Validates the extracted lines
 * - Fetches the organization's invoice snapshot from the injected store
 * - Supplies amount agreement from the invoice totals
 * - Derives the remittance status and overall confidence from the results
 *
 * All failures (invalid input, store errors) happen here, before the
 * engine runs. The engine itself has no failure mode.
 */

import { env } from '../config';
import {
  calculateOverallConfidence,
  isAmountWithinTolerance,
  matchPayments,
  type AmountCheck,
  type MatchingOutcome,
  type MatchSummary,
} from '../matching';
import { logger, MatchingFailedError } from '../utils';
import type { InvoiceRecord, InvoiceStore } from './invoiceStore';
import { parseMatchRemittanceInput } from './remittanceMatching.schemas';

// ============================================
// Types
// ============================================

export type RemittanceMatchStatus = 'AWAITING_APPROVAL' | 'PARTIALLY_MATCHED' | 'UNMATCHED';

export interface RemittanceMatchingOptions {
  /** Invoice statuses eligible for matching. Defaults to MATCHING_INVOICE_STATUSES. */
  invoiceStatuses?: readonly string[];
  /** Lines resolved per join. Defaults to MATCHING_CHUNK_SIZE. */
  chunkSize?: number;
}

export interface RemittanceMatchingReport extends MatchingOutcome {
  organizationId: string;
  status: RemittanceMatchStatus;
  overallConfidence: number;
}

// ============================================
// Helpers
// ============================================

/**
 * All lines matched → awaiting approval; some → partially matched; none → unmatched.
 */
export function determineRemittanceStatus(summary: MatchSummary): RemittanceMatchStatus {
  if (summary.allMatched) return 'AWAITING_APPROVAL';
  if (summary.matchedCount > 0) return 'PARTIALLY_MATCHED';
  return 'UNMATCHED';
}

/**
 * Amount check backed by invoice totals. When an invoice number appears more
 * than once, the first record's total is used, the same record the lookup
 * tables resolve to.
 */
export function createAmountCheck(invoices: readonly InvoiceRecord[]): AmountCheck {
  const totals = new Map<string, number | null>();
  for (const invoice of invoices) {
    if (!totals.has(invoice.invoiceNumber)) {
      totals.set(invoice.invoiceNumber, invoice.total);
    }
  }

  return (line, matchedInvoice) =>
    isAmountWithinTolerance(line.paidAmount, totals.get(matchedInvoice));
}

// ============================================
// Service
// ============================================

export class RemittanceMatchingService {
  private readonly invoiceStatuses: readonly string[];
  private readonly chunkSize: number | undefined;

  constructor(
    private readonly invoiceStore: InvoiceStore,
    options: RemittanceMatchingOptions = {}
  ) {
    this.invoiceStatuses = options.invoiceStatuses ?? env.MATCHING_INVOICE_STATUSES;
    this.chunkSize = options.chunkSize;
  }

  /**
   * Matches the lines of one payment advice against the organization's invoices.
   *
   * @param input - `{ organizationId, payments, extractionConfidence? }`, validated here
   * @throws AppError (400) when the input is invalid
   * @throws MatchingFailedError when the invoice snapshot cannot be fetched
   */
  async matchRemittance(input: unknown): Promise<RemittanceMatchingReport> {
    const { organizationId, payments, extractionConfidence } = parseMatchRemittanceInput(input);

    const invoices = await this.fetchInvoiceSnapshot(organizationId);

    logger.info(
      `Matching ${payments.length} line(s) against ${invoices.length} invoice(s) for organization ${organizationId}`
    );

    const outcome = await matchPayments(
      invoices.map((invoice) => invoice.invoiceNumber),
      payments,
      { checkAmount: createAmountCheck(invoices), chunkSize: this.chunkSize }
    );

    const status = determineRemittanceStatus(outcome.summary);
    const overallConfidence = calculateOverallConfidence(
      outcome.results.map((result) => result.confidence),
      extractionConfidence
    );

    logger.info(
      `Remittance for organization ${organizationId}: ${status} ` +
        `(${outcome.summary.matchPercentage}% matched, overall confidence ${overallConfidence})`
    );

    return { ...outcome, organizationId, status, overallConfidence };
  }

  private async fetchInvoiceSnapshot(organizationId: string): Promise<InvoiceRecord[]> {
    try {
      return await this.invoiceStore.findMatchableInvoices({
        organizationId,
        statuses: this.invoiceStatuses,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to fetch invoices for organization ${organizationId}: ${reason}`);
      throw new MatchingFailedError(`Failed to fetch invoices: ${reason}`, error);
    }
  }
}

export default RemittanceMatchingService;
