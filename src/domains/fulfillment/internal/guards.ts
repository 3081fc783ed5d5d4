import { invalidState, notFound } from '../errors';
import type { FulfillmentTx } from '../store';
import type { Fulfillment, PaymentEntry, Shipment } from '../types';

export async function lockFulfillmentOrThrow(tx: FulfillmentTx, id: string): Promise<Fulfillment> {
  const fulfillment = await tx.lockFulfillment(id);
  if (!fulfillment) throw notFound('fulfillment', id);
  return fulfillment;
}

export function assertNotCancelled(fulfillment: Fulfillment): void {
  if (fulfillment.snapshot.status === 'CANCELLED') {
    throw invalidState('FULFILLMENT_CANCELLED', { fulfillmentId: fulfillment.id });
  }
}

/**
 * Locks the owning fulfillment first, then the shipment, so every writer takes
 * row locks in the same order.
 */
export async function lockShipmentWithFulfillment(
  tx: FulfillmentTx,
  shipmentId: string
): Promise<{ fulfillment: Fulfillment; shipment: Shipment }> {
  const fulfillmentId = await tx.findShipmentFulfillmentId(shipmentId);
  if (!fulfillmentId) throw notFound('shipment', shipmentId);
  const fulfillment = await lockFulfillmentOrThrow(tx, fulfillmentId);
  const shipment = await tx.lockShipment(shipmentId);
  if (!shipment) throw notFound('shipment', shipmentId);
  return { fulfillment, shipment };
}

export async function lockPaymentWithFulfillment(
  tx: FulfillmentTx,
  paymentId: string
): Promise<{ fulfillment: Fulfillment; entry: PaymentEntry }> {
  const fulfillmentId = await tx.findPaymentFulfillmentId(paymentId);
  if (!fulfillmentId) throw notFound('payment', paymentId);
  const fulfillment = await lockFulfillmentOrThrow(tx, fulfillmentId);
  const entry = await tx.lockPayment(paymentId);
  if (!entry) throw notFound('payment', paymentId);
  return { fulfillment, entry };
}
