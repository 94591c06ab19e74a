export {
  RemittanceMatchingService,
  determineRemittanceStatus,
  createAmountCheck,
} from './remittanceMatching.service';
export type {
  RemittanceMatchStatus,
  RemittanceMatchingOptions,
  RemittanceMatchingReport,
} from './remittanceMatching.service';
export { InMemoryInvoiceStore } from './invoiceStore';
export type { InvoiceRecord, InvoiceQuery, InvoiceStore } from './invoiceStore';
export {
  paymentLineSchema,
  matchRemittanceSchema,
  parseMatchRemittanceInput,
} from './remittanceMatching.schemas';
export type { MatchRemittanceInput } from './remittanceMatching.schemas';
