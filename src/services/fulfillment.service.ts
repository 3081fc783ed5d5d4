import { v4 as uuidv4 } from 'uuid';
import {
  applyRecompute,
  assertNotCancelled,
  buildQuantityLedger,
  checkInvariants,
  diffSnapshots,
  emptySnapshot,
  invalidState,
  lockFulfillmentOrThrow,
  notFound,
  recompute,
  validationFailed,
  type Fulfillment,
  type FulfillmentFilter,
  type FulfillmentLine,
  type FulfillmentSnapshot,
  type FulfillmentStore,
  type InvariantViolation,
  type LineProgress
} from '../domains/fulfillment';
import { roundMoney } from '../lib/numbers';
import { updateRequestContext } from '../lib/requestContext';
import { emitFulfillmentEvent, FULFILLMENT_EVENT, summarizeSnapshot } from '../observability/fulfillment.events';
import type { OrderInput } from '../schemas/fulfillments.schema';

export type FulfillmentStatusView = {
  fulfillmentId: string;
  fulfillmentNumber: string;
  state: FulfillmentSnapshot['status'];
  percentages: {
    fulfillment: number;
    payment: number;
  };
  totals: {
    orderedQuantity: number;
    deliveredQuantity: number;
    inFlightQuantity: number;
    remainingQuantity: number;
    unallocatedQuantity: number;
    orderedAmount: number;
    deliveredAmount: number;
    collectedAmount: number;
    remainingBalance: number;
  };
  lines: LineProgress[];
};

export type VerificationReport = {
  fulfillmentId: string;
  consistent: boolean;
  stored: FulfillmentSnapshot;
  recomputed: FulfillmentSnapshot;
  violations: InvariantViolation[];
};

function assertOrder(order: OrderInput): void {
  if (order.lines.length === 0) {
    throw validationFailed('ORDER_NO_LINES', { orderId: order.id });
  }
  const seen = new Set<string>();
  for (const line of order.lines) {
    if (seen.has(line.lineId)) {
      throw validationFailed('ORDER_DUPLICATE_LINE', { orderId: order.id, lineId: line.lineId });
    }
    seen.add(line.lineId);
    if (!Number.isInteger(line.quantityOrdered) || line.quantityOrdered <= 0) {
      throw validationFailed('ORDER_LINE_QUANTITY_INVALID', { lineId: line.lineId, quantity: line.quantityOrdered });
    }
    if (!(line.unitPrice >= 0)) {
      throw validationFailed('ORDER_LINE_PRICE_INVALID', { lineId: line.lineId, unitPrice: line.unitPrice });
    }
  }
  if (!(order.totalValue >= 0)) {
    throw validationFailed('ORDER_TOTAL_INVALID', { orderId: order.id, totalValue: order.totalValue });
  }
}

export async function createFulfillment(
  store: FulfillmentStore,
  order: OrderInput,
  destinationBranchId: string,
  options: { notes?: string | null } = {}
): Promise<Fulfillment> {
  assertOrder(order);

  const fulfillment = await store.transaction(async (tx) => {
    const active = await tx.findActiveFulfillmentForOrder(order.id);
    if (active) {
      throw invalidState('FULFILLMENT_EXISTS_FOR_ORDER', { orderId: order.id, fulfillmentId: active.id });
    }
    const now = new Date();
    const lines: FulfillmentLine[] = order.lines.map((line) => ({
      orderLineId: line.lineId,
      productId: line.productId,
      productName: line.productName ?? null,
      quantityOrdered: line.quantityOrdered,
      unitPrice: roundMoney(line.unitPrice)
    }));
    const created: Fulfillment = {
      id: uuidv4(),
      fulfillmentNumber: await tx.nextNumber('fulfillment'),
      orderId: order.id,
      orderNumber: order.orderNumber ?? null,
      destinationBranchId,
      lines,
      snapshot: emptySnapshot(lines, order.totalValue),
      notes: options.notes ?? null,
      cancelledAt: null,
      cancelReason: null,
      recomputedAt: now,
      createdAt: now,
      updatedAt: now
    };
    await tx.insertFulfillment(created);
    return created;
  });

  updateRequestContext({ fulfillmentId: fulfillment.id });
  emitFulfillmentEvent(FULFILLMENT_EVENT.CREATED, {
    fulfillmentId: fulfillment.id,
    fulfillmentNumber: fulfillment.fulfillmentNumber,
    orderId: fulfillment.orderId
  });
  return fulfillment;
}

export async function getFulfillment(store: FulfillmentStore, id: string): Promise<Fulfillment> {
  const fulfillment = await store.reader.getFulfillment(id);
  if (!fulfillment) throw notFound('fulfillment', id);
  return fulfillment;
}

export async function listFulfillments(store: FulfillmentStore, filter: FulfillmentFilter = {}): Promise<Fulfillment[]> {
  return store.reader.listFulfillments(filter);
}

export async function fulfillmentStatus(store: FulfillmentStore, id: string): Promise<FulfillmentStatusView> {
  const fulfillment = await getFulfillment(store, id);
  const shipments = await store.reader.listShipments({ fulfillmentId: id });
  const { snapshot } = fulfillment;
  return {
    fulfillmentId: fulfillment.id,
    fulfillmentNumber: fulfillment.fulfillmentNumber,
    state: snapshot.status,
    percentages: {
      fulfillment: snapshot.fulfillmentPercentage,
      payment: snapshot.paymentPercentage
    },
    totals: {
      orderedQuantity: snapshot.orderedQuantity,
      deliveredQuantity: snapshot.deliveredQuantity,
      inFlightQuantity: snapshot.inFlightQuantity,
      remainingQuantity: snapshot.remainingQuantity,
      unallocatedQuantity: snapshot.unallocatedQuantity,
      orderedAmount: snapshot.orderedAmount,
      deliveredAmount: snapshot.deliveredAmount,
      collectedAmount: snapshot.collectedAmount,
      remainingBalance: snapshot.remainingBalance
    },
    lines: buildQuantityLedger(fulfillment.lines, shipments)
  };
}

/**
 * Cancels a fulfillment before any of its deliveries has posted stock.
 * Undelivered shipments are left for the caller to cancel one by one.
 */
export async function cancelFulfillment(
  store: FulfillmentStore,
  id: string,
  reason: string | null = null
): Promise<Fulfillment> {
  const fulfillment = await store.transaction(async (tx) => {
    const current = await lockFulfillmentOrThrow(tx, id);
    assertNotCancelled(current);
    if (current.snapshot.status === 'FULLY_FULFILLED') {
      throw invalidState('FULFILLMENT_NOT_CANCELLABLE', { fulfillmentId: id, status: current.snapshot.status });
    }
    const posted = (await tx.listShipmentsForFulfillment(id)).filter((shipment) => shipment.status === 'delivered');
    if (posted.length > 0) {
      throw invalidState('FULFILLMENT_STOCK_POSTED', {
        fulfillmentId: id,
        deliveredShipments: posted.map((shipment) => shipment.id)
      });
    }
    const now = new Date();
    await tx.markFulfillmentCancelled(id, reason, now);
    const cancelled: Fulfillment = {
      ...current,
      snapshot: { ...current.snapshot, status: 'CANCELLED' },
      cancelledAt: now,
      cancelReason: reason,
      updatedAt: now
    };
    return cancelled;
  });

  emitFulfillmentEvent(FULFILLMENT_EVENT.CANCELLED, { fulfillmentId: id, reason });
  return fulfillment;
}

export async function deleteFulfillment(store: FulfillmentStore, id: string): Promise<void> {
  await store.transaction(async (tx) => {
    await lockFulfillmentOrThrow(tx, id);
    const shipments = await tx.listShipmentsForFulfillment(id);
    const payments = await tx.listPaymentsForFulfillment(id);
    if (shipments.length > 0 || payments.length > 0) {
      throw invalidState('FULFILLMENT_HAS_REFERENCES', {
        fulfillmentId: id,
        shipments: shipments.length,
        payments: payments.length
      });
    }
    await tx.deleteFulfillment(id);
  });
}

export async function recomputeFulfillment(store: FulfillmentStore, id: string): Promise<Fulfillment> {
  const fulfillment = await store.transaction(async (tx) => {
    const current = await lockFulfillmentOrThrow(tx, id);
    return applyRecompute(tx, current, new Date());
  });

  emitFulfillmentEvent(FULFILLMENT_EVENT.RECOMPUTED, {
    fulfillmentId: id,
    snapshot: summarizeSnapshot(fulfillment.snapshot)
  });
  return fulfillment;
}

/**
 * Recomputes from the ledgers without writing and reports how the stored
 * snapshot differs, plus any ledger invariant the data breaks.
 */
export async function verifyFulfillment(store: FulfillmentStore, id: string): Promise<VerificationReport> {
  const fulfillment = await getFulfillment(store, id);
  const [shipments, payments] = await Promise.all([
    store.reader.listShipments({ fulfillmentId: id }),
    store.reader.listPayments({ fulfillmentId: id })
  ]);
  const recomputation = recompute({
    lines: fulfillment.lines,
    orderTotalValue: fulfillment.snapshot.orderedAmount,
    previousStatus: fulfillment.snapshot.status,
    shipments,
    payments
  });
  const violations = checkInvariants(recomputation, fulfillment.snapshot);

  const drift = diffSnapshots(fulfillment.snapshot, recomputation.snapshot);
  if (drift.length > 0) {
    emitFulfillmentEvent(FULFILLMENT_EVENT.DRIFT_DETECTED, {
      fulfillmentId: id,
      fields: drift.map((entry) => entry.field)
    });
  }

  return {
    fulfillmentId: id,
    consistent: violations.length === 0,
    stored: fulfillment.snapshot,
    recomputed: recomputation.snapshot,
    violations
  };
}
