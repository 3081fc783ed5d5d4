import { fromMinorUnits, percentageOf, toMinorUnits } from '../../../lib/numbers';
import type { FulfillmentTx } from '../store';
import type {
  Fulfillment,
  FulfillmentLine,
  FulfillmentSnapshot,
  FulfillmentStatus,
  PaymentEntry,
  Shipment
} from '../types';
import { collectedMinorUnits } from './paymentLedger';
import { buildQuantityLedger, summarizeQuantityLedger, type LineProgress } from './quantityLedger';

export type RecomputeInput = {
  lines: FulfillmentLine[];
  orderTotalValue: number;
  previousStatus: FulfillmentStatus;
  shipments: Shipment[];
  payments: PaymentEntry[];
};

export type Recomputation = {
  snapshot: FulfillmentSnapshot;
  lines: LineProgress[];
};

export type InvariantViolation = {
  code: 'LINE_OVER_DELIVERED' | 'LINE_OVER_COMMITTED' | 'OVER_COLLECTED' | 'SNAPSHOT_DRIFT';
  detail: Record<string, unknown>;
};

const STATUS_RANK: Record<Exclude<FulfillmentStatus, 'CANCELLED'>, number> = {
  PENDING: 0,
  PARTIALLY_FULFILLED: 1,
  FULLY_FULFILLED: 2
};

const SNAPSHOT_FIELDS = [
  'status',
  'orderedQuantity',
  'orderedAmount',
  'deliveredQuantity',
  'deliveredAmount',
  'inFlightQuantity',
  'remainingQuantity',
  'unallocatedQuantity',
  'collectedAmount',
  'remainingBalance',
  'fulfillmentPercentage',
  'paymentPercentage'
] as const satisfies readonly (keyof FulfillmentSnapshot)[];

export function deriveStatus(delivered: number, ordered: number): Exclude<FulfillmentStatus, 'CANCELLED'> {
  if (delivered <= 0) return 'PENDING';
  if (delivered < ordered) return 'PARTIALLY_FULFILLED';
  return 'FULLY_FULFILLED';
}

/**
 * Status only moves forward. CANCELLED stays CANCELLED; otherwise the later of
 * the previous stage and the derived one wins, so a correction that lowers the
 * delivered total never drags the status back.
 */
export function advanceStatus(
  previous: FulfillmentStatus,
  derived: Exclude<FulfillmentStatus, 'CANCELLED'>
): FulfillmentStatus {
  if (previous === 'CANCELLED') return 'CANCELLED';
  return STATUS_RANK[derived] >= STATUS_RANK[previous] ? derived : previous;
}

export function emptySnapshot(lines: FulfillmentLine[], orderTotalValue: number): FulfillmentSnapshot {
  return recompute({ lines, orderTotalValue, previousStatus: 'PENDING', shipments: [], payments: [] }).snapshot;
}

/**
 * Pure function of ledger contents: non-cancelled shipments and completed
 * payments in, derived snapshot out.
 */
export function recompute(input: RecomputeInput): Recomputation {
  const lines = buildQuantityLedger(input.lines, input.shipments);
  const totals = summarizeQuantityLedger(lines);
  const orderedMinor = toMinorUnits(input.orderTotalValue);
  const collectedMinor = collectedMinorUnits(input.payments);

  const snapshot: FulfillmentSnapshot = {
    status: advanceStatus(input.previousStatus, deriveStatus(totals.delivered, totals.ordered)),
    orderedQuantity: totals.ordered,
    orderedAmount: fromMinorUnits(orderedMinor),
    deliveredQuantity: totals.delivered,
    deliveredAmount: totals.deliveredAmount,
    inFlightQuantity: totals.inFlight,
    remainingQuantity: totals.remaining,
    unallocatedQuantity: totals.unallocated,
    collectedAmount: fromMinorUnits(collectedMinor),
    remainingBalance: fromMinorUnits(orderedMinor - collectedMinor),
    fulfillmentPercentage: percentageOf(totals.delivered, totals.ordered),
    paymentPercentage: percentageOf(collectedMinor, orderedMinor)
  };
  return { snapshot, lines };
}

export function diffSnapshots(stored: FulfillmentSnapshot, fresh: FulfillmentSnapshot) {
  return SNAPSHOT_FIELDS.filter((field) => stored[field] !== fresh[field]).map((field) => ({
    field,
    stored: stored[field],
    recomputed: fresh[field]
  }));
}

export function checkInvariants(
  recomputation: Recomputation,
  stored?: FulfillmentSnapshot
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  for (const line of recomputation.lines) {
    if (line.quantityDelivered > line.quantityOrdered) {
      violations.push({
        code: 'LINE_OVER_DELIVERED',
        detail: { orderLineId: line.orderLineId, ordered: line.quantityOrdered, delivered: line.quantityDelivered }
      });
    }
    if (line.quantityDelivered + line.quantityInFlight > line.quantityOrdered) {
      violations.push({
        code: 'LINE_OVER_COMMITTED',
        detail: {
          orderLineId: line.orderLineId,
          ordered: line.quantityOrdered,
          committed: line.quantityDelivered + line.quantityInFlight
        }
      });
    }
  }
  const { snapshot } = recomputation;
  if (toMinorUnits(snapshot.collectedAmount) > toMinorUnits(snapshot.orderedAmount)) {
    violations.push({
      code: 'OVER_COLLECTED',
      detail: { ordered: snapshot.orderedAmount, collected: snapshot.collectedAmount }
    });
  }
  if (stored) {
    const drift = diffSnapshots(stored, snapshot);
    if (drift.length > 0) {
      violations.push({ code: 'SNAPSHOT_DRIFT', detail: { fields: drift } });
    }
  }
  return violations;
}

export type SnapshotWriter = Pick<FulfillmentTx, 'listShipmentsForFulfillment' | 'listPaymentsForFulfillment' | 'writeSnapshot'>;

/**
 * Reads the fulfillment's ledgers inside the caller's transaction, recomputes
 * and writes the snapshot. The only code path that writes derived fields.
 * Queries go out one at a time since they share the transaction's connection.
 */
export async function applyRecompute(tx: SnapshotWriter, fulfillment: Fulfillment, now: Date): Promise<Fulfillment> {
  const shipments = await tx.listShipmentsForFulfillment(fulfillment.id);
  const payments = await tx.listPaymentsForFulfillment(fulfillment.id);
  const { snapshot } = recompute({
    lines: fulfillment.lines,
    orderTotalValue: fulfillment.snapshot.orderedAmount,
    previousStatus: fulfillment.snapshot.status,
    shipments,
    payments
  });
  await tx.writeSnapshot(fulfillment.id, snapshot, now);
  return { ...fulfillment, snapshot, recomputedAt: now, updatedAt: now };
}
