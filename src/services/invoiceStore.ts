/**
 * Invoice snapshot source for matching runs.
 *
 * The matching engine only needs invoice numbers and totals; whatever
 * persists invoices implements InvoiceStore and is injected into the
 * RemittanceMatchingService.
 */

export interface InvoiceRecord {
  id: string;
  organizationId: string;
  invoiceNumber: string;
  /** Invoice total; null when the ledger has none recorded */
  total: number | null;
  status: string;
}

export interface InvoiceQuery {
  organizationId: string;
  /** Only invoices in one of these statuses are returned */
  statuses: readonly string[];
}

export interface InvoiceStore {
  /**
   * Returns the organization's invoices that have a non-empty invoice number
   * and one of the requested statuses, in a stable order.
   */
  findMatchableInvoices(query: InvoiceQuery): Promise<InvoiceRecord[]>;
}

/**
 * InvoiceStore over an in-memory list, in insertion order.
 */
export class InMemoryInvoiceStore implements InvoiceStore {
  private readonly invoices: readonly InvoiceRecord[];

  constructor(invoices: readonly InvoiceRecord[] = []) {
    this.invoices = [...invoices];
  }

  async findMatchableInvoices(query: InvoiceQuery): Promise<InvoiceRecord[]> {
    return this.invoices.filter(
      (invoice) =>
        invoice.organizationId === query.organizationId &&
        invoice.invoiceNumber.trim() !== '' &&
        query.statuses.includes(invoice.status)
    );
  }
}
