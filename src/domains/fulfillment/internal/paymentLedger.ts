import { fromMinorUnits, sumMoney, toMinorUnits } from '../../../lib/numbers';
import { FULFILLMENT_ERROR, FulfillmentError, validationFailed } from '../errors';
import type { PaymentEntry } from '../types';

export type OutstandingFilter = {
  collectingBranchId?: string;
  fulfillmentId?: string;
};

export type OutstandingSummary = {
  count: number;
  totalAmount: number;
};

/** Sum of completed entries in minor units; pending and voided entries count for nothing. */
export function collectedMinorUnits(entries: PaymentEntry[]): number {
  let total = 0;
  for (const entry of entries) {
    if (entry.status === 'completed') {
      total += toMinorUnits(entry.amount);
    }
  }
  return total;
}

export function assertPositiveAmount(amount: number): void {
  if (!Number.isFinite(amount) || toMinorUnits(amount) <= 0) {
    throw validationFailed('AMOUNT_NOT_POSITIVE', { amount });
  }
}

/**
 * Fails with OVER_COLLECTION when adding `amount` to the completed entries
 * would take the collected total above the order value.
 */
export function assertWithinOrderValue(entries: PaymentEntry[], amount: number, orderTotalValue: number): void {
  const collected = collectedMinorUnits(entries);
  const ceiling = toMinorUnits(orderTotalValue);
  const next = collected + toMinorUnits(amount);
  if (next > ceiling) {
    throw new FulfillmentError(FULFILLMENT_ERROR.OVER_COLLECTION, {
      orderTotalValue: fromMinorUnits(ceiling),
      collected: fromMinorUnits(collected),
      requested: amount,
      available: fromMinorUnits(Math.max(0, ceiling - collected))
    });
  }
}

/**
 * Decides whether an entry can be deposited. Returns false for an entry that is
 * already deposited; throws INVALID_ENTRY for anything not completed.
 */
export function isDepositable(entry: PaymentEntry): boolean {
  if (entry.isDeposited) return false;
  if (entry.status !== 'completed') {
    throw new FulfillmentError(FULFILLMENT_ERROR.INVALID_ENTRY, {
      reason: 'PAYMENT_NOT_COMPLETED',
      paymentId: entry.id,
      status: entry.status
    });
  }
  return true;
}

export function assertConfirmable(entry: PaymentEntry): void {
  if (entry.status !== 'pending') {
    throw new FulfillmentError(FULFILLMENT_ERROR.INVALID_ENTRY, {
      reason: 'PAYMENT_NOT_PENDING',
      paymentId: entry.id,
      status: entry.status
    });
  }
}

export function assertVoidable(entry: PaymentEntry): void {
  if (entry.status === 'voided') {
    throw new FulfillmentError(FULFILLMENT_ERROR.INVALID_ENTRY, { reason: 'PAYMENT_ALREADY_VOIDED', paymentId: entry.id });
  }
  if (entry.isDeposited) {
    throw new FulfillmentError(FULFILLMENT_ERROR.INVALID_ENTRY, { reason: 'PAYMENT_DEPOSITED', paymentId: entry.id });
  }
}

export function isOutstanding(entry: PaymentEntry): boolean {
  return entry.status === 'completed' && !entry.isDeposited;
}

export function filterOutstanding(entries: PaymentEntry[], filter: OutstandingFilter = {}): PaymentEntry[] {
  return entries.filter(
    (entry) =>
      isOutstanding(entry) &&
      (!filter.collectingBranchId || entry.collectingBranchId === filter.collectingBranchId) &&
      (!filter.fulfillmentId || entry.fulfillmentId === filter.fulfillmentId)
  );
}

export function summarizeOutstanding(entries: PaymentEntry[]): OutstandingSummary {
  return {
    count: entries.length,
    totalAmount: sumMoney(entries.map((entry) => entry.amount))
  };
}
