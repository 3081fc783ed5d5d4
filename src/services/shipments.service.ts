import { v4 as uuidv4 } from 'uuid';
import { getFulfillmentPolicy } from '../config/fulfillmentPolicy';
import {
  allocate,
  appendPaymentEntry,
  applyRecompute,
  assertCommittable,
  assertNotCancelled,
  assertShipmentTransition,
  buildQuantityLedger,
  compareLineIds,
  invalidState,
  lockFulfillmentOrThrow,
  lockShipmentWithFulfillment,
  notFound,
  postDelivery,
  postDeliveryExpense,
  remainingVector,
  validationFailed,
  type AllocateOptions,
  type CommitLine,
  type Expense,
  type Fulfillment,
  type FulfillmentStore,
  type FulfillmentTx,
  type PaymentDraft,
  type PaymentEntry,
  type ProposedAllocation,
  type Shipment,
  type ShipmentFilter,
  type ShipmentLineItem,
  type ShipmentStatus,
  type StockMovement
} from '../domains/fulfillment';
import { fromMinorUnits, roundMoney, toMinorUnits } from '../lib/numbers';
import { emitFulfillmentEvent, FULFILLMENT_EVENT, summarizeSnapshot } from '../observability/fulfillment.events';

export type ShipmentProposal = {
  capacity: number;
  lines: CommitLine[];
};

export type ShipmentDetails = {
  scheduledAt?: string | Date;
  deliveryAddress?: string;
  customerName?: string;
  customerPhone?: string;
  vehicleRef?: string;
  driverRef?: string;
  tripRef?: string;
  deliveryFee?: number;
  notes?: string;
  idempotencyKey?: string | null;
};

export type CommitResult = {
  shipment: Shipment;
  fulfillment: Fulfillment;
  replayed: boolean;
};

export type ShipmentTransitionResult = {
  shipment: Shipment;
  fulfillment: Fulfillment;
};

export type DeliveryEvent = {
  shipmentId: string;
  deliveredAt?: string | Date;
  signed?: boolean;
  customerName?: string;
  notes?: string;
  payment?: Omit<PaymentDraft, 'shipmentId' | 'status' | 'paidAt' | 'notes'>;
};

export type DeliveryResult = {
  outcome: 'posted' | 'already_posted';
  shipment: Shipment;
  fulfillment: Fulfillment;
  movements: StockMovement[];
  appliedQuantity: number;
  expense: Expense | null;
  payment: PaymentEntry | null;
};

function toDate(value: string | Date | undefined, fallback: Date): Date {
  if (value === undefined) return fallback;
  const parsed = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw validationFailed('INVALID_TIMESTAMP', { value: String(value) });
  }
  return parsed;
}

function matchesCommittedSplit(shipment: Shipment, proposal: ShipmentProposal): boolean {
  if (shipment.vehicleCapacity !== proposal.capacity) return false;
  const requestedIds = new Set(proposal.lines.map((line) => line.orderLineId));
  if (requestedIds.size !== proposal.lines.length || requestedIds.size !== shipment.lines.length) return false;
  const committed = new Map(shipment.lines.map((line) => [line.orderLineId, line.quantityDelivered]));
  return proposal.lines.every((line) => committed.get(line.orderLineId) === line.quantity);
}

/**
 * Splits one vehicle load across the fulfillment's open lines. Reads only; the
 * proposal is re-validated when it is committed.
 */
export async function proposeShipment(
  store: FulfillmentStore,
  fulfillmentId: string,
  capacity: number,
  options: AllocateOptions = {}
): Promise<ProposedAllocation> {
  const fulfillment = await store.reader.getFulfillment(fulfillmentId);
  if (!fulfillment) throw notFound('fulfillment', fulfillmentId);
  assertNotCancelled(fulfillment);

  const shipments = await store.reader.listShipments({ fulfillmentId });
  const remaining = remainingVector(buildQuantityLedger(fulfillment.lines, shipments));
  const plan = allocate(remaining, capacity, options);
  return { ...plan, fulfillmentId, proposedAt: new Date().toISOString() };
}

/**
 * Turns a proposal (or any caller-built split) into a scheduled shipment. The
 * split is checked again under the fulfillment lock against what is left after
 * every other non-cancelled shipment.
 */
export async function commitShipment(
  store: FulfillmentStore,
  fulfillmentId: string,
  proposal: ShipmentProposal,
  details: ShipmentDetails = {}
): Promise<CommitResult> {
  if (details.deliveryFee !== undefined && !(details.deliveryFee >= 0)) {
    throw validationFailed('DELIVERY_FEE_INVALID', { deliveryFee: details.deliveryFee });
  }

  const result = await store.transaction(async (tx): Promise<CommitResult> => {
    const fulfillment = await lockFulfillmentOrThrow(tx, fulfillmentId);

    const idempotencyKey = details.idempotencyKey ?? null;
    if (idempotencyKey) {
      const existing = await tx.findShipmentByIdempotencyKey(fulfillmentId, idempotencyKey);
      if (existing) {
        if (!matchesCommittedSplit(existing, proposal)) {
          throw invalidState('IDEMPOTENCY_KEY_REUSED', { idempotencyKey, shipmentId: existing.id });
        }
        return { shipment: existing, fulfillment, replayed: true };
      }
    }

    assertNotCancelled(fulfillment);

    const progress = buildQuantityLedger(fulfillment.lines, await tx.listShipmentsForFulfillment(fulfillmentId));
    assertCommittable(proposal.lines, remainingVector(progress), proposal.capacity);

    const now = new Date();
    const shipmentId = uuidv4();
    const byLine = new Map(progress.map((line) => [line.orderLineId, line]));
    const lines: ShipmentLineItem[] = [];
    for (const requested of [...proposal.lines].sort((a, b) => compareLineIds(a.orderLineId, b.orderLineId))) {
      const line = byLine.get(requested.orderLineId);
      if (!line) throw notFound('order_line', requested.orderLineId);
      lines.push({
        id: uuidv4(),
        shipmentId,
        orderLineId: line.orderLineId,
        productId: line.productId,
        quantityOrdered: line.quantityOrdered,
        quantityDelivered: requested.quantity,
        quantityRemaining: line.quantityUnallocated - requested.quantity,
        unitPrice: line.unitPrice,
        subtotal: fromMinorUnits(requested.quantity * toMinorUnits(line.unitPrice))
      });
    }

    const shipment: Shipment = {
      id: shipmentId,
      shipmentNumber: await tx.nextNumber('shipment'),
      fulfillmentId,
      vehicleCapacity: proposal.capacity,
      itemsLoaded: lines.reduce((total, line) => total + line.quantityDelivered, 0),
      status: 'scheduled',
      scheduledAt: toDate(details.scheduledAt, now),
      dispatchedAt: null,
      deliveredAt: null,
      cancelledAt: null,
      cancelReason: null,
      failedAt: null,
      failureReason: null,
      deliveryAddress: details.deliveryAddress ?? null,
      customerName: details.customerName ?? null,
      customerPhone: details.customerPhone ?? null,
      customerSigned: false,
      vehicleRef: details.vehicleRef ?? null,
      driverRef: details.driverRef ?? null,
      tripRef: details.tripRef ?? null,
      deliveryFee: roundMoney(details.deliveryFee ?? 0),
      notes: details.notes ?? null,
      idempotencyKey,
      lines,
      createdAt: now,
      updatedAt: now
    };
    await tx.insertShipment(shipment);
    const updated = await applyRecompute(tx, fulfillment, now);
    return { shipment, fulfillment: updated, replayed: false };
  });

  emitFulfillmentEvent(FULFILLMENT_EVENT.SHIPMENT_COMMITTED, {
    fulfillmentId,
    shipmentId: result.shipment.id,
    shipmentNumber: result.shipment.shipmentNumber,
    itemsLoaded: result.shipment.itemsLoaded,
    replayed: result.replayed
  });
  return result;
}

async function transitionShipment(
  store: FulfillmentStore,
  shipmentId: string,
  to: Exclude<ShipmentStatus, 'delivered'>,
  patch: (shipment: Shipment, now: Date) => Partial<Shipment>
): Promise<ShipmentTransitionResult> {
  const { from, ...result } = await store.transaction(async (tx) => {
    const { fulfillment, shipment } = await lockShipmentWithFulfillment(tx, shipmentId);
    assertShipmentTransition(shipment.id, shipment.status, to);
    if (to !== 'cancelled' && to !== 'failed') {
      assertNotCancelled(fulfillment);
    }
    const now = new Date();
    const updated: Shipment = { ...shipment, ...patch(shipment, now), status: to, updatedAt: now };
    await tx.updateShipment(updated);
    return {
      from: shipment.status,
      shipment: updated,
      fulfillment: await applyRecompute(tx, fulfillment, now)
    };
  });

  emitFulfillmentEvent(FULFILLMENT_EVENT.SHIPMENT_STATUS_CHANGED, {
    fulfillmentId: result.shipment.fulfillmentId,
    shipmentId,
    from,
    to
  });
  return result;
}

export async function startLoading(store: FulfillmentStore, shipmentId: string): Promise<ShipmentTransitionResult> {
  return transitionShipment(store, shipmentId, 'loading', () => ({}));
}

export async function dispatchShipment(store: FulfillmentStore, shipmentId: string): Promise<ShipmentTransitionResult> {
  return transitionShipment(store, shipmentId, 'in_transit', (_shipment, now) => ({ dispatchedAt: now }));
}

/** Releases the shipment's units back to the open quantity. Delivered shipments cannot be cancelled. */
export async function cancelShipment(
  store: FulfillmentStore,
  shipmentId: string,
  reason: string
): Promise<ShipmentTransitionResult> {
  return transitionShipment(store, shipmentId, 'cancelled', (_shipment, now) => ({
    cancelledAt: now,
    cancelReason: reason
  }));
}

/** A delivery attempt that did not arrive. The shipment's units go back to the open quantity. */
export async function failShipment(
  store: FulfillmentStore,
  shipmentId: string,
  reason: string
): Promise<ShipmentTransitionResult> {
  return transitionShipment(store, shipmentId, 'failed', (_shipment, now) => ({
    failedAt: now,
    failureReason: reason
  }));
}

async function replayDelivery(tx: FulfillmentTx, fulfillment: Fulfillment, shipment: Shipment): Promise<DeliveryResult> {
  return {
    outcome: 'already_posted',
    shipment,
    fulfillment,
    movements: await tx.inventory.findMovementsForShipment(shipment.id),
    appliedQuantity: 0,
    expense: await tx.findSystemExpenseForShipment(shipment.id),
    payment: null
  };
}

/**
 * Delivery event from the fleet side. Moves the shipment to delivered, posts
 * stock to the destination branch once, books the delivery fee and any payment
 * taken at the door, then recomputes. A repeat event for a delivered shipment
 * returns the earlier postings.
 */
export async function markDelivered(store: FulfillmentStore, event: DeliveryEvent): Promise<DeliveryResult> {
  const policy = getFulfillmentPolicy();

  const { previousStatus, ...result } = await store.transaction(async (tx): Promise<DeliveryResult & { previousStatus: ShipmentStatus }> => {
    const { fulfillment, shipment } = await lockShipmentWithFulfillment(tx, event.shipmentId);
    if (shipment.status === 'delivered') {
      return { ...(await replayDelivery(tx, fulfillment, shipment)), previousStatus: shipment.status };
    }

    assertNotCancelled(fulfillment);
    assertShipmentTransition(shipment.id, shipment.status, 'delivered');
    const signed = event.signed ?? false;
    if (policy.requireDeliverySignature && !signed) {
      throw validationFailed('DELIVERY_SIGNATURE_REQUIRED', { shipmentId: shipment.id });
    }

    const now = new Date();
    const deliveredAt = toDate(event.deliveredAt, now);
    const delivered: Shipment = {
      ...shipment,
      status: 'delivered',
      dispatchedAt: shipment.dispatchedAt ?? deliveredAt,
      deliveredAt,
      customerSigned: signed,
      customerName: event.customerName ?? shipment.customerName,
      notes: event.notes ?? shipment.notes,
      updatedAt: now
    };
    await tx.updateShipment(delivered);

    const posting = await postDelivery(tx.inventory, delivered, fulfillment.destinationBranchId, now);
    const expense = policy.deliveryExpenseEnabled
      ? (await postDeliveryExpense(tx, delivered, fulfillment.destinationBranchId, now)).expense
      : null;
    const payment = event.payment
      ? await appendPaymentEntry(tx, fulfillment, { ...event.payment, shipmentId: delivered.id, paidAt: deliveredAt }, now)
      : null;

    return {
      previousStatus: shipment.status,
      outcome: posting.outcome,
      shipment: delivered,
      fulfillment: await applyRecompute(tx, fulfillment, now),
      movements: posting.movements,
      appliedQuantity: posting.appliedQuantity,
      expense,
      payment
    };
  });

  const fulfillmentId = result.fulfillment.id;
  if (result.outcome === 'posted') {
    emitFulfillmentEvent(FULFILLMENT_EVENT.SHIPMENT_STATUS_CHANGED, {
      fulfillmentId,
      shipmentId: result.shipment.id,
      from: previousStatus,
      to: 'delivered'
    });
  }
  emitFulfillmentEvent(FULFILLMENT_EVENT.DELIVERY_POSTED, {
    fulfillmentId,
    shipmentId: result.shipment.id,
    outcome: result.outcome,
    appliedQuantity: result.appliedQuantity,
    snapshot: summarizeSnapshot(result.fulfillment.snapshot)
  });
  if (result.payment) {
    emitFulfillmentEvent(FULFILLMENT_EVENT.PAYMENT_RECORDED, {
      fulfillmentId,
      paymentId: result.payment.id,
      amount: result.payment.amount,
      status: result.payment.status
    });
  }
  return result;
}

export async function getShipment(store: FulfillmentStore, id: string): Promise<Shipment> {
  const shipment = await store.reader.getShipment(id);
  if (!shipment) throw notFound('shipment', id);
  return shipment;
}

export async function listShipments(store: FulfillmentStore, filter: ShipmentFilter = {}): Promise<Shipment[]> {
  return store.reader.listShipments(filter);
}

export async function listShipmentMovements(store: FulfillmentStore, shipmentId: string): Promise<StockMovement[]> {
  await getShipment(store, shipmentId);
  return store.reader.listMovements({ shipmentId });
}

export async function branchStockLevel(store: FulfillmentStore, branchId: string, productId: string) {
  return { branchId, productId, quantity: await store.reader.getStockLevel(branchId, productId) };
}
