import Decimal from 'decimal.js';
import { AMOUNT_TOLERANCE } from './constants';

/**
 * Checks whether a paid amount agrees with an invoice total within AMOUNT_TOLERANCE.
 *
 * The difference is taken in decimal arithmetic, so 100.01 against 100.00 is
 * exactly one cent apart. An unknown total counts as a disagreement.
 *
 * @example
 * isAmountWithinTolerance(250.0, 250.01)  // true
 * isAmountWithinTolerance(100.0, 100.014) // false
 * isAmountWithinTolerance(250.0, null)    // false
 */
export function isAmountWithinTolerance(
  paidAmount: number,
  invoiceTotal: number | null | undefined
): boolean {
  if (invoiceTotal === null || invoiceTotal === undefined || !Number.isFinite(invoiceTotal)) {
    return false;
  }

  return new Decimal(paidAmount).minus(invoiceTotal).abs().lte(AMOUNT_TOLERANCE);
}

export default isAmountWithinTolerance;
