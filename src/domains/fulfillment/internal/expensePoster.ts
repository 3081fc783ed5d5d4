import { v4 as uuidv4 } from 'uuid';
import { roundMoney, toMinorUnits } from '../../../lib/numbers';
import type { FulfillmentTx } from '../store';
import type { Expense, Shipment } from '../types';

export type ExpensePosting = {
  outcome: 'recorded' | 'already_recorded' | 'skipped';
  expense: Expense | null;
};

/**
 * Records the transport expense of a delivered shipment. At most one SYSTEM
 * expense exists per shipment; shipments without a fee record nothing.
 */
export async function postDeliveryExpense(
  tx: FulfillmentTx,
  shipment: Shipment,
  branchId: string,
  now: Date
): Promise<ExpensePosting> {
  if (toMinorUnits(shipment.deliveryFee) <= 0) {
    return { outcome: 'skipped', expense: null };
  }
  const existing = await tx.findSystemExpenseForShipment(shipment.id);
  if (existing) {
    return { outcome: 'already_recorded', expense: existing };
  }
  const expense: Expense = {
    id: uuidv4(),
    expenseNumber: await tx.nextNumber('expense'),
    branchId,
    shipmentId: shipment.id,
    category: 'transport',
    amount: roundMoney(shipment.deliveryFee),
    description: `Delivery fee for ${shipment.shipmentNumber}`,
    origin: 'SYSTEM',
    incurredAt: shipment.deliveredAt ?? now,
    createdAt: now
  };
  await tx.insertExpense(expense);
  return { outcome: 'recorded', expense };
}
