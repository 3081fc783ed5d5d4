import { fromMinorUnits, toMinorUnits } from '../../../lib/numbers';
import type { FulfillmentLine, Shipment, ShipmentStatus } from '../types';

export type LineProgress = {
  orderLineId: string;
  productId: string;
  quantityOrdered: number;
  quantityDelivered: number;
  quantityInFlight: number;
  /** Ordered minus delivered. */
  quantityRemaining: number;
  /** Ordered minus delivered minus in flight: what a new shipment may still take. */
  quantityUnallocated: number;
  unitPrice: number;
  deliveredAmount: number;
};

export type QuantityTotals = {
  ordered: number;
  delivered: number;
  inFlight: number;
  remaining: number;
  unallocated: number;
  deliveredAmount: number;
};

const IN_FLIGHT_STATUSES: ReadonlySet<ShipmentStatus> = new Set(['scheduled', 'loading', 'in_transit']);

/**
 * Code-unit ordering of order-line ids. Locale independent so every process
 * sorts (and therefore allocates) lines the same way.
 */
export function compareLineIds(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Folds shipments into per-line progress. Delivered shipments count as
 * delivered; scheduled, loading and in-transit shipments hold their units as
 * in flight. Failed and cancelled shipments hold nothing.
 */
export function buildQuantityLedger(lines: FulfillmentLine[], shipments: Shipment[]): LineProgress[] {
  const delivered = new Map<string, number>();
  const inFlight = new Map<string, number>();

  for (const shipment of shipments) {
    const target = shipment.status === 'delivered' ? delivered : IN_FLIGHT_STATUSES.has(shipment.status) ? inFlight : null;
    if (!target) continue;
    for (const item of shipment.lines) {
      target.set(item.orderLineId, (target.get(item.orderLineId) ?? 0) + item.quantityDelivered);
    }
  }

  return [...lines]
    .sort((a, b) => compareLineIds(a.orderLineId, b.orderLineId))
    .map((line) => {
      const quantityDelivered = delivered.get(line.orderLineId) ?? 0;
      const quantityInFlight = inFlight.get(line.orderLineId) ?? 0;
      return {
        orderLineId: line.orderLineId,
        productId: line.productId,
        quantityOrdered: line.quantityOrdered,
        quantityDelivered,
        quantityInFlight,
        quantityRemaining: line.quantityOrdered - quantityDelivered,
        quantityUnallocated: line.quantityOrdered - quantityDelivered - quantityInFlight,
        unitPrice: line.unitPrice,
        deliveredAmount: fromMinorUnits(quantityDelivered * toMinorUnits(line.unitPrice))
      };
    });
}

export function summarizeQuantityLedger(progress: LineProgress[]): QuantityTotals {
  const totals = { ordered: 0, delivered: 0, inFlight: 0, remaining: 0, unallocated: 0 };
  let deliveredMinor = 0;
  for (const line of progress) {
    totals.ordered += line.quantityOrdered;
    totals.delivered += line.quantityDelivered;
    totals.inFlight += line.quantityInFlight;
    totals.remaining += line.quantityRemaining;
    totals.unallocated += line.quantityUnallocated;
    deliveredMinor += toMinorUnits(line.deliveredAmount);
  }
  return { ...totals, deliveredAmount: fromMinorUnits(deliveredMinor) };
}
