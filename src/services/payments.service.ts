import {
  appendPaymentEntry,
  applyRecompute,
  assertConfirmable,
  assertVoidable,
  assertWithinOrderValue,
  filterOutstanding,
  isDepositable,
  lockFulfillmentOrThrow,
  lockPaymentWithFulfillment,
  notFound,
  summarizeOutstanding,
  type Fulfillment,
  type FulfillmentStore,
  type OutstandingFilter,
  type OutstandingSummary,
  type PaymentDraft,
  type PaymentEntry
} from '../domains/fulfillment';
import { emitFulfillmentEvent, FULFILLMENT_EVENT } from '../observability/fulfillment.events';

export type PaymentResult = {
  entry: PaymentEntry;
  fulfillment: Fulfillment;
};

export type DepositResult = {
  outcome: 'deposited' | 'already_deposited';
  entry: PaymentEntry;
};

export type OutstandingReport = {
  data: PaymentEntry[];
  summary: OutstandingSummary;
};

function emitRecorded(entry: PaymentEntry): void {
  emitFulfillmentEvent(FULFILLMENT_EVENT.PAYMENT_RECORDED, {
    fulfillmentId: entry.fulfillmentId,
    paymentId: entry.id,
    amount: entry.amount,
    status: entry.status
  });
}

/**
 * Appends a payment to the fulfillment's ledger. Completed entries may never
 * take the collected total above the order value; pending entries are checked
 * when they are confirmed. Cancelled fulfillments still accept payments.
 */
export async function collectPayment(
  store: FulfillmentStore,
  fulfillmentId: string,
  draft: PaymentDraft
): Promise<PaymentResult> {
  const result = await store.transaction(async (tx) => {
    const fulfillment = await lockFulfillmentOrThrow(tx, fulfillmentId);
    const now = new Date();
    const entry = await appendPaymentEntry(tx, fulfillment, draft, now);
    return { entry, fulfillment: await applyRecompute(tx, fulfillment, now) };
  });
  emitRecorded(result.entry);
  return result;
}

export async function confirmPayment(store: FulfillmentStore, paymentId: string): Promise<PaymentResult> {
  const result = await store.transaction(async (tx) => {
    const { fulfillment, entry } = await lockPaymentWithFulfillment(tx, paymentId);
    assertConfirmable(entry);
    const entries = await tx.listPaymentsForFulfillment(fulfillment.id);
    assertWithinOrderValue(entries, entry.amount, fulfillment.snapshot.orderedAmount);

    const now = new Date();
    const confirmed: PaymentEntry = { ...entry, status: 'completed', updatedAt: now };
    await tx.updatePayment(confirmed);
    return { entry: confirmed, fulfillment: await applyRecompute(tx, fulfillment, now) };
  });
  emitRecorded(result.entry);
  return result;
}

export async function voidPayment(store: FulfillmentStore, paymentId: string, reason: string): Promise<PaymentResult> {
  const result = await store.transaction(async (tx) => {
    const { fulfillment, entry } = await lockPaymentWithFulfillment(tx, paymentId);
    assertVoidable(entry);
    const now = new Date();
    const voided: PaymentEntry = { ...entry, status: 'voided', voidedAt: now, voidReason: reason, updatedAt: now };
    await tx.updatePayment(voided);
    return { entry: voided, fulfillment: await applyRecompute(tx, fulfillment, now) };
  });
  emitFulfillmentEvent(FULFILLMENT_EVENT.PAYMENT_VOIDED, {
    fulfillmentId: result.entry.fulfillmentId,
    paymentId: result.entry.id,
    amount: result.entry.amount,
    reason: result.entry.voidReason
  });
  return result;
}

/**
 * Flags a completed entry as banked at `targetBranchId`. Flipping happens once;
 * a repeat call reports `already_deposited` and leaves the entry as it was.
 */
export async function markDeposited(
  store: FulfillmentStore,
  paymentId: string,
  targetBranchId: string
): Promise<DepositResult> {
  const result = await store.transaction(async (tx): Promise<DepositResult> => {
    const { fulfillment, entry } = await lockPaymentWithFulfillment(tx, paymentId);
    if (!isDepositable(entry)) {
      return { outcome: 'already_deposited', entry };
    }
    const now = new Date();
    const deposited: PaymentEntry = {
      ...entry,
      isDeposited: true,
      depositBranchId: targetBranchId,
      depositedAt: now,
      updatedAt: now
    };
    await tx.updatePayment(deposited);
    await applyRecompute(tx, fulfillment, now);
    return { outcome: 'deposited', entry: deposited };
  });

  emitFulfillmentEvent(FULFILLMENT_EVENT.PAYMENT_DEPOSITED, {
    fulfillmentId: result.entry.fulfillmentId,
    paymentId,
    outcome: result.outcome,
    depositBranchId: result.entry.depositBranchId
  });
  return result;
}

/** Completed payments still waiting to be banked. */
export async function outstandingPayments(
  store: FulfillmentStore,
  filter: OutstandingFilter = {}
): Promise<PaymentEntry[]> {
  const rows = await store.reader.listPayments({
    collectingBranchId: filter.collectingBranchId,
    fulfillmentId: filter.fulfillmentId,
    status: 'completed',
    isDeposited: false
  });
  return filterOutstanding(rows, filter);
}

export async function outstandingReport(
  store: FulfillmentStore,
  filter: OutstandingFilter = {}
): Promise<OutstandingReport> {
  const data = await outstandingPayments(store, filter);
  return { data, summary: summarizeOutstanding(data) };
}

export async function listPayments(store: FulfillmentStore, fulfillmentId: string): Promise<PaymentEntry[]> {
  const fulfillment = await store.reader.getFulfillment(fulfillmentId);
  if (!fulfillment) throw notFound('fulfillment', fulfillmentId);
  return store.reader.listPayments({ fulfillmentId });
}

export async function getPayment(store: FulfillmentStore, id: string): Promise<PaymentEntry> {
  const entry = await store.reader.getPayment(id);
  if (!entry) throw notFound('payment', id);
  return entry;
}
