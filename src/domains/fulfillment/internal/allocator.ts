import { fromMinorUnits, toMinorUnits } from '../../../lib/numbers';
import { FULFILLMENT_ERROR, FulfillmentError, notFound, validationFailed } from '../errors';
import { compareLineIds, type LineProgress } from './quantityLedger';

export type RemainingLine = {
  orderLineId: string;
  productId: string;
  quantityOrdered: number;
  unitPrice: number;
  remaining: number;
};

export type AllocationLine = {
  orderLineId: string;
  productId: string;
  quantityOrdered: number;
  quantity: number;
  remainingAfter: number;
  unitPrice: number;
  subtotal: number;
};

export type AllocationPlan = {
  capacity: number;
  lines: AllocationLine[];
  totalQuantity: number;
  unusedCapacity: number;
};

export type ProposedAllocation = AllocationPlan & {
  fulfillmentId: string;
  proposedAt: string;
};

export type AllocateOptions = {
  /** Lines to serve first, in this order; the rest follow by line id ascending. */
  lineOrder?: string[];
};

export type CommitLine = {
  orderLineId: string;
  quantity: number;
};

export function remainingVector(progress: LineProgress[]): RemainingLine[] {
  return progress.map((line) => ({
    orderLineId: line.orderLineId,
    productId: line.productId,
    quantityOrdered: line.quantityOrdered,
    unitPrice: line.unitPrice,
    remaining: Math.max(0, line.quantityUnallocated)
  }));
}

export function assertCapacity(capacity: number): void {
  if (typeof capacity !== 'number' || Number.isNaN(capacity)) {
    throw validationFailed('CAPACITY_NOT_A_NUMBER', { capacity });
  }
  if (capacity <= 0) {
    throw new FulfillmentError(FULFILLMENT_ERROR.CAPACITY_EXHAUSTED, { capacity });
  }
  if (!Number.isInteger(capacity)) {
    throw validationFailed('CAPACITY_NOT_INTEGER', { capacity });
  }
}

/**
 * Puts the lines in allocation order: `lineOrder` entries first (duplicates
 * ignored), then every other line by id ascending.
 */
export function orderForAllocation(remaining: RemainingLine[], lineOrder: string[] = []): RemainingLine[] {
  const byId = new Map(remaining.map((line) => [line.orderLineId, line]));
  const ordered: RemainingLine[] = [];
  const seen = new Set<string>();
  for (const lineId of lineOrder) {
    if (seen.has(lineId)) continue;
    const line = byId.get(lineId);
    if (!line) {
      throw validationFailed('LINE_ORDER_UNKNOWN_LINE', { orderLineId: lineId });
    }
    seen.add(lineId);
    ordered.push(line);
  }
  const rest = remaining
    .filter((line) => !seen.has(line.orderLineId))
    .sort((a, b) => compareLineIds(a.orderLineId, b.orderLineId));
  return [...ordered, ...rest];
}

/**
 * Greedy split of one vehicle load across the remaining order lines. Each line
 * takes min(its remaining quantity, capacity still free) in allocation order.
 * Pure: the same (remaining, capacity, options) always yields the same plan.
 */
export function allocate(remaining: RemainingLine[], capacity: number, options: AllocateOptions = {}): AllocationPlan {
  assertCapacity(capacity);

  let free = capacity;
  const lines: AllocationLine[] = [];
  for (const line of orderForAllocation(remaining, options.lineOrder)) {
    if (free === 0) break;
    if (line.remaining <= 0) continue;
    const quantity = Math.min(line.remaining, free);
    free -= quantity;
    lines.push({
      orderLineId: line.orderLineId,
      productId: line.productId,
      quantityOrdered: line.quantityOrdered,
      quantity,
      remainingAfter: line.remaining - quantity,
      unitPrice: line.unitPrice,
      subtotal: fromMinorUnits(quantity * toMinorUnits(line.unitPrice))
    });
  }

  return {
    capacity,
    lines,
    totalQuantity: capacity - free,
    unusedCapacity: free
  };
}

/**
 * Commit-time check of a requested load against the true remaining quantities
 * (read under the fulfillment lock) and the declared capacity. Nothing is
 * clamped: any excess is an OVER_ALLOCATION.
 */
export function assertCommittable(requested: CommitLine[], remaining: RemainingLine[], capacity: number): void {
  assertCapacity(capacity);

  if (requested.length === 0) {
    throw validationFailed('SHIPMENT_NO_LINES');
  }

  const byId = new Map(remaining.map((line) => [line.orderLineId, line]));
  const seen = new Set<string>();
  let total = 0;
  for (const line of requested) {
    if (seen.has(line.orderLineId)) {
      throw validationFailed('SHIPMENT_DUPLICATE_LINE', { orderLineId: line.orderLineId });
    }
    seen.add(line.orderLineId);
    if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
      throw validationFailed('SHIPMENT_INVALID_QUANTITY', { orderLineId: line.orderLineId, quantity: line.quantity });
    }
    const available = byId.get(line.orderLineId);
    if (!available) {
      throw notFound('order_line', line.orderLineId);
    }
    if (line.quantity > available.remaining) {
      throw new FulfillmentError(FULFILLMENT_ERROR.OVER_ALLOCATION, {
        reason: 'LINE_REMAINING_EXCEEDED',
        orderLineId: line.orderLineId,
        requested: line.quantity,
        remaining: available.remaining
      });
    }
    total += line.quantity;
  }

  if (total > capacity) {
    throw new FulfillmentError(FULFILLMENT_ERROR.OVER_ALLOCATION, {
      reason: 'CAPACITY_EXCEEDED',
      requested: total,
      capacity
    });
  }
}
