import { describe, expect, it } from 'vitest';
import { MemoryFulfillmentStore } from '../domains/fulfillment';
import { createManualExpense, deleteExpense, getExpense, listExpenses } from './expenses.service';
import { createFulfillment } from './fulfillment.service';
import { commitShipment, markDelivered } from './shipments.service';
import { singleLineOrder } from './testOrders';

describe('expenses service', () => {
  it('creates and deletes manual expenses', async () => {
    const store = new MemoryFulfillmentStore();
    const expense = await createManualExpense(store, {
      branchId: 'branch-a',
      category: 'other',
      amount: 45.5,
      description: 'Tarpaulin',
      incurredAt: '2026-03-01T09:00:00Z'
    });

    expect(expense).toMatchObject({ expenseNumber: 'EXP-000001', origin: 'MANUAL', amount: 45.5 });
    expect((await getExpense(store, expense.id)).incurredAt.toISOString()).toBe('2026-03-01T09:00:00.000Z');

    await deleteExpense(store, expense.id);
    await expect(getExpense(store, expense.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('rejects a manual expense for an unknown shipment', async () => {
    const store = new MemoryFulfillmentStore();
    await expect(
      createManualExpense(store, {
        branchId: 'branch-a',
        shipmentId: '00000000-0000-4000-8000-000000000000',
        category: 'transport',
        amount: 10,
        description: 'Fuel'
      })
    ).rejects.toMatchObject({ code: 'NOT_FOUND', details: { entity: 'shipment' } });
  });

  it('refuses to delete the SYSTEM expense of a delivery', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder(), 'branch-a');
    const { shipment } = await commitShipment(
      store,
      fulfillment.id,
      { capacity: 10, lines: [{ orderLineId: 'L1', quantity: 10 }] },
      { deliveryFee: 300 }
    );
    const { expense } = await markDelivered(store, { shipmentId: shipment.id });
    if (!expense) throw new Error('expected a delivery expense');

    await expect(deleteExpense(store, expense.id)).rejects.toMatchObject({ code: 'SYSTEM_RECORD_IMMUTABLE' });
    expect(await listExpenses(store, { origin: 'SYSTEM' })).toHaveLength(1);
  });
});
