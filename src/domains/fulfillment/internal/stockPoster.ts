import { v4 as uuidv4 } from 'uuid';
import { invalidState } from '../errors';
import type { Shipment, StockMovement } from '../types';
import { compareLineIds } from './quantityLedger';

/**
 * Destination-branch inventory as seen from inside a fulfillment transaction.
 * Every call participates in the caller's transaction.
 */
export interface InventorySink {
  findMovementsForShipment(shipmentId: string): Promise<StockMovement[]>;
  applyStock(branchId: string, productId: string, delta: number): Promise<void>;
  recordMovement(movement: StockMovement): Promise<void>;
}

export type PostingOutcome = 'posted' | 'already_posted';

export type PostingResult = {
  outcome: PostingOutcome;
  movements: StockMovement[];
  appliedQuantity: number;
  appliedByProduct: Record<string, number>;
};

/**
 * Applies a delivered shipment to the destination branch once. A second call
 * for the same shipment finds the movements written by the first and returns
 * them untouched.
 */
export async function postDelivery(
  inventory: InventorySink,
  shipment: Shipment,
  branchId: string,
  now: Date
): Promise<PostingResult> {
  if (shipment.status !== 'delivered') {
    throw invalidState('SHIPMENT_NOT_DELIVERED', { shipmentId: shipment.id, status: shipment.status });
  }

  const existing = await inventory.findMovementsForShipment(shipment.id);
  if (existing.length > 0) {
    return { outcome: 'already_posted', movements: existing, appliedQuantity: 0, appliedByProduct: {} };
  }

  const appliedByProduct: Record<string, number> = {};
  const movements: StockMovement[] = [];
  const lines = [...shipment.lines].sort((a, b) => compareLineIds(a.orderLineId, b.orderLineId));
  for (const line of lines) {
    if (line.quantityDelivered <= 0) continue;
    appliedByProduct[line.productId] = (appliedByProduct[line.productId] ?? 0) + line.quantityDelivered;
    movements.push({
      id: uuidv4(),
      shipmentId: shipment.id,
      orderLineId: line.orderLineId,
      branchId,
      productId: line.productId,
      quantity: line.quantityDelivered,
      direction: 'in',
      origin: 'SYSTEM',
      note: `Delivery ${shipment.shipmentNumber}`,
      createdAt: now
    });
  }

  // Products in a stable order so concurrent postings lock stock rows the same way.
  const products = Object.keys(appliedByProduct).sort(compareLineIds);
  for (const productId of products) {
    await inventory.applyStock(branchId, productId, appliedByProduct[productId] ?? 0);
  }
  for (const movement of movements) {
    await inventory.recordMovement(movement);
  }

  const appliedQuantity = movements.reduce((total, movement) => total + movement.quantity, 0);
  return { outcome: 'posted', movements, appliedQuantity, appliedByProduct };
}
