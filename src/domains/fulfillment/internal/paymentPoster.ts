import { v4 as uuidv4 } from 'uuid';
import { roundMoney } from '../../../lib/numbers';
import { FULFILLMENT_ERROR, FulfillmentError } from '../errors';
import type { FulfillmentTx } from '../store';
import type { Fulfillment, PaymentEntry, PaymentMethod } from '../types';
import { assertPositiveAmount, assertWithinOrderValue } from './paymentLedger';

export type PaymentDraft = {
  shipmentId?: string | null;
  amount: number;
  method: PaymentMethod;
  collectingBranchId: string;
  status?: 'pending' | 'completed';
  referenceNumber?: string | null;
  receiptNumber?: string | null;
  collectedBy?: string | null;
  paidAt?: Date;
  notes?: string | null;
};

/**
 * Appends one entry to the fulfillment's payment ledger. The caller holds the
 * fulfillment lock and recomputes afterwards.
 */
export async function appendPaymentEntry(
  tx: FulfillmentTx,
  fulfillment: Fulfillment,
  draft: PaymentDraft,
  now: Date
): Promise<PaymentEntry> {
  assertPositiveAmount(draft.amount);

  if (draft.shipmentId) {
    const owner = await tx.findShipmentFulfillmentId(draft.shipmentId);
    if (owner !== fulfillment.id) {
      throw new FulfillmentError(FULFILLMENT_ERROR.INVALID_ENTRY, {
        reason: 'SHIPMENT_NOT_IN_FULFILLMENT',
        shipmentId: draft.shipmentId,
        fulfillmentId: fulfillment.id
      });
    }
  }

  const status = draft.status ?? 'completed';
  if (status === 'completed') {
    const entries = await tx.listPaymentsForFulfillment(fulfillment.id);
    assertWithinOrderValue(entries, draft.amount, fulfillment.snapshot.orderedAmount);
  }

  const entry: PaymentEntry = {
    id: uuidv4(),
    paymentNumber: await tx.nextNumber('payment'),
    fulfillmentId: fulfillment.id,
    shipmentId: draft.shipmentId ?? null,
    collectingBranchId: draft.collectingBranchId,
    amount: roundMoney(draft.amount),
    method: draft.method,
    status,
    isDeposited: false,
    depositBranchId: null,
    depositedAt: null,
    referenceNumber: draft.referenceNumber ?? null,
    receiptNumber: draft.receiptNumber ?? null,
    collectedBy: draft.collectedBy ?? null,
    paidAt: draft.paidAt ?? now,
    voidedAt: null,
    voidReason: null,
    notes: draft.notes ?? null,
    createdAt: now,
    updatedAt: now
  };
  await tx.insertPayment(entry);
  return entry;
}
