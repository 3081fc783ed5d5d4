import { describe, expect, it } from 'vitest';
import { MemoryFulfillmentStore } from '../domains/fulfillment';
import {
  cancelFulfillment,
  createFulfillment,
  deleteFulfillment,
  fulfillmentStatus,
  listFulfillments,
  recomputeFulfillment,
  verifyFulfillment
} from './fulfillment.service';
import { collectPayment } from './payments.service';
import { cancelShipment, commitShipment, markDelivered, proposeShipment } from './shipments.service';
import { singleLineOrder, twoLineOrder } from './testOrders';

describe('fulfillment service', () => {
  it('creates a fulfillment with a pending snapshot and sequential number', async () => {
    const store = new MemoryFulfillmentStore();
    const first = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    const second = await createFulfillment(store, twoLineOrder('order-2'), 'branch-a');

    expect(first.fulfillmentNumber).toBe('FUL-000001');
    expect(second.fulfillmentNumber).toBe('FUL-000002');
    expect(first.snapshot.status).toBe('PENDING');
    expect(first.snapshot.orderedQuantity).toBe(100);
    expect(first.snapshot.remainingBalance).toBe(50000);
    expect(second.lines.map((line) => line.orderLineId)).toEqual(['L2', 'L1']);
  });

  it('refuses a second active fulfillment for the same order', async () => {
    const store = new MemoryFulfillmentStore();
    await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    await expect(createFulfillment(store, singleLineOrder('order-1'), 'branch-a')).rejects.toMatchObject({
      code: 'INVALID_STATE',
      details: { reason: 'FULFILLMENT_EXISTS_FOR_ORDER', orderId: 'order-1' }
    });
  });

  it('rejects orders with duplicate line ids', async () => {
    const store = new MemoryFulfillmentStore();
    const order = singleLineOrder('order-1');
    order.lines.push({ ...order.lines[0] });
    await expect(createFulfillment(store, order, 'branch-a')).rejects.toMatchObject({
      code: 'VALIDATION_FAILED',
      details: { reason: 'ORDER_DUPLICATE_LINE', lineId: 'L1' }
    });
  });

  it('delivers a 100 unit order in four loads of at most 30', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');

    const loads: number[] = [];
    for (let trip = 0; trip < 4; trip += 1) {
      const proposal = await proposeShipment(store, fulfillment.id, 30);
      const { shipment } = await commitShipment(store, fulfillment.id, {
        capacity: 30,
        lines: proposal.lines.map((line) => ({ orderLineId: line.orderLineId, quantity: line.quantity }))
      });
      loads.push(shipment.itemsLoaded);
      await markDelivered(store, { shipmentId: shipment.id, signed: true });
    }

    expect(loads).toEqual([30, 30, 30, 10]);
    const status = await fulfillmentStatus(store, fulfillment.id);
    expect(status.state).toBe('FULLY_FULFILLED');
    expect(status.percentages.fulfillment).toBe(100);
    expect(status.totals.remainingQuantity).toBe(0);
    expect(status.totals.deliveredAmount).toBe(50000);
    expect(status.lines[0]?.quantityDelivered).toBe(100);
    expect(await store.reader.getStockLevel('branch-a', 'cement')).toBe(100);
  });

  it('reports progress part way through', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    const { shipment } = await commitShipment(store, fulfillment.id, {
      capacity: 30,
      lines: [{ orderLineId: 'L1', quantity: 30 }]
    });
    await markDelivered(store, { shipmentId: shipment.id });
    await commitShipment(store, fulfillment.id, { capacity: 30, lines: [{ orderLineId: 'L1', quantity: 20 }] });

    const status = await fulfillmentStatus(store, fulfillment.id);
    expect(status.state).toBe('PARTIALLY_FULFILLED');
    expect(status.percentages.fulfillment).toBe(30);
    expect(status.totals).toMatchObject({
      deliveredQuantity: 30,
      inFlightQuantity: 20,
      remainingQuantity: 70,
      unallocatedQuantity: 50
    });
  });

  it('cancels an open fulfillment and blocks further allocation', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    const cancelled = await cancelFulfillment(store, fulfillment.id, 'customer withdrew');

    expect(cancelled.snapshot.status).toBe('CANCELLED');
    expect(cancelled.cancelReason).toBe('customer withdrew');
    await expect(proposeShipment(store, fulfillment.id, 10)).rejects.toMatchObject({
      details: { reason: 'FULFILLMENT_CANCELLED' }
    });
    await expect(cancelFulfillment(store, fulfillment.id)).rejects.toMatchObject({
      details: { reason: 'FULFILLMENT_CANCELLED' }
    });

    const replacement = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    expect(replacement.fulfillmentNumber).toBe('FUL-000002');
  });

  it('does not cancel a fully delivered fulfillment', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder('order-1', 10), 'branch-a');
    const { shipment } = await commitShipment(store, fulfillment.id, {
      capacity: 10,
      lines: [{ orderLineId: 'L1', quantity: 10 }]
    });
    await markDelivered(store, { shipmentId: shipment.id });

    await expect(cancelFulfillment(store, fulfillment.id)).rejects.toMatchObject({
      details: { reason: 'FULFILLMENT_NOT_CANCELLABLE' }
    });
  });

  it('refuses to cancel once a delivery has posted stock', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    const { shipment } = await commitShipment(store, fulfillment.id, {
      capacity: 30,
      lines: [{ orderLineId: 'L1', quantity: 30 }]
    });
    await markDelivered(store, { shipmentId: shipment.id });

    await expect(cancelFulfillment(store, fulfillment.id, 'late change')).rejects.toMatchObject({
      code: 'INVALID_STATE',
      details: { reason: 'FULFILLMENT_STOCK_POSTED', deliveredShipments: [shipment.id] }
    });
    const status = await fulfillmentStatus(store, fulfillment.id);
    expect(status.state).toBe('PARTIALLY_FULFILLED');
    expect(await store.reader.getStockLevel('branch-a', 'cement')).toBe(30);
  });

  it('cancels with shipments still on the road and blocks their delivery', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    const { shipment } = await commitShipment(store, fulfillment.id, {
      capacity: 30,
      lines: [{ orderLineId: 'L1', quantity: 30 }]
    });

    await cancelFulfillment(store, fulfillment.id, 'customer withdrew');

    await expect(markDelivered(store, { shipmentId: shipment.id })).rejects.toMatchObject({
      details: { reason: 'FULFILLMENT_CANCELLED' }
    });
    expect((await cancelShipment(store, shipment.id, 'order cancelled')).shipment.status).toBe('cancelled');
  });

  it('only deletes fulfillments without shipments or payments', async () => {
    const store = new MemoryFulfillmentStore();
    const unused = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    const used = await createFulfillment(store, singleLineOrder('order-2'), 'branch-a');
    await collectPayment(store, used.id, { amount: 100, method: 'cash', collectingBranchId: 'branch-a' });

    await deleteFulfillment(store, unused.id);
    expect(await store.reader.getFulfillment(unused.id)).toBeNull();
    await expect(deleteFulfillment(store, used.id)).rejects.toMatchObject({
      details: { reason: 'FULFILLMENT_HAS_REFERENCES', shipments: 0, payments: 1 }
    });
  });

  it('lists newest first and filters by outstanding balance', async () => {
    const store = new MemoryFulfillmentStore();
    const paid = await createFulfillment(store, singleLineOrder('order-1', 1, 100), 'branch-a');
    await createFulfillment(store, singleLineOrder('order-2'), 'branch-b');
    await collectPayment(store, paid.id, { amount: 100, method: 'cash', collectingBranchId: 'branch-a' });

    const all = await listFulfillments(store);
    expect(all.map((row) => row.fulfillmentNumber)).toEqual(['FUL-000002', 'FUL-000001']);
    const open = await listFulfillments(store, { withBalanceOnly: true });
    expect(open.map((row) => row.orderId)).toEqual(['order-2']);
    const branchA = await listFulfillments(store, { branchId: 'branch-a' });
    expect(branchA.map((row) => row.orderId)).toEqual(['order-1']);
  });

  it('verifies a consistent fulfillment and repairs drift on recompute', async () => {
    const store = new MemoryFulfillmentStore();
    const fulfillment = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
    await collectPayment(store, fulfillment.id, { amount: 15000, method: 'cash', collectingBranchId: 'branch-a' });

    const clean = await verifyFulfillment(store, fulfillment.id);
    expect(clean.consistent).toBe(true);
    expect(clean.violations).toEqual([]);

    await store.transaction(async (tx) => {
      const current = await tx.lockFulfillment(fulfillment.id);
      if (!current) throw new Error('missing');
      await tx.writeSnapshot(fulfillment.id, { ...current.snapshot, collectedAmount: 0 }, new Date());
    });
    const drifted = await verifyFulfillment(store, fulfillment.id);
    expect(drifted.consistent).toBe(false);
    expect(drifted.violations.map((violation) => violation.code)).toEqual(['SNAPSHOT_DRIFT']);

    const repaired = await recomputeFulfillment(store, fulfillment.id);
    expect(repaired.snapshot.collectedAmount).toBe(15000);
    expect((await verifyFulfillment(store, fulfillment.id)).consistent).toBe(true);
  });

  it('reports NOT_FOUND for an unknown id', async () => {
    const store = new MemoryFulfillmentStore();
    await expect(fulfillmentStatus(store, '00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: 'NOT_FOUND'
    });
  });
});
