import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryFulfillmentStore } from '../domains/fulfillment';
import { cancelFulfillment, createFulfillment } from './fulfillment.service';
import {
  collectPayment,
  confirmPayment,
  getPayment,
  listPayments,
  markDeposited,
  outstandingPayments,
  outstandingReport,
  voidPayment
} from './payments.service';
import { commitShipment } from './shipments.service';
import { singleLineOrder } from './testOrders';

async function setup() {
  const store = new MemoryFulfillmentStore();
  const fulfillment = await createFulfillment(store, singleLineOrder('order-1'), 'branch-a');
  return { store, fulfillment };
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('collectPayment', () => {
  it('records 15000 of 50000 as 30% paid', async () => {
    const { store, fulfillment } = await setup();
    const { entry, fulfillment: updated } = await collectPayment(store, fulfillment.id, {
      amount: 15000,
      method: 'bank_transfer',
      collectingBranchId: 'branch-a',
      referenceNumber: 'TRX-1'
    });

    expect(entry).toMatchObject({
      paymentNumber: 'PAY-000001',
      status: 'completed',
      isDeposited: false,
      referenceNumber: 'TRX-1'
    });
    expect(updated.snapshot.collectedAmount).toBe(15000);
    expect(updated.snapshot.remainingBalance).toBe(35000);
    expect(updated.snapshot.paymentPercentage).toBe(30);
  });

  it('refuses to collect more than the order value', async () => {
    const { store, fulfillment } = await setup();
    await collectPayment(store, fulfillment.id, { amount: 45000, method: 'cash', collectingBranchId: 'branch-a' });
    await expect(
      collectPayment(store, fulfillment.id, { amount: 5000.01, method: 'cash', collectingBranchId: 'branch-a' })
    ).rejects.toMatchObject({
      code: 'OVER_COLLECTION',
      details: { available: 5000 }
    });
    expect(await listPayments(store, fulfillment.id)).toHaveLength(1);
  });

  it('rejects a zero amount', async () => {
    const { store, fulfillment } = await setup();
    await expect(
      collectPayment(store, fulfillment.id, { amount: 0, method: 'cash', collectingBranchId: 'branch-a' })
    ).rejects.toMatchObject({ code: 'VALIDATION_FAILED', details: { reason: 'AMOUNT_NOT_POSITIVE' } });
  });

  it('rejects a shipment that belongs to another fulfillment', async () => {
    const { store, fulfillment } = await setup();
    const other = await createFulfillment(store, singleLineOrder('order-2'), 'branch-a');
    const { shipment } = await commitShipment(store, other.id, {
      capacity: 10,
      lines: [{ orderLineId: 'L1', quantity: 10 }]
    });
    await expect(
      collectPayment(store, fulfillment.id, {
        shipmentId: shipment.id,
        amount: 10,
        method: 'cash',
        collectingBranchId: 'branch-a'
      })
    ).rejects.toMatchObject({ code: 'INVALID_ENTRY', details: { reason: 'SHIPMENT_NOT_IN_FULFILLMENT' } });
  });

  it('still accepts payments on a cancelled fulfillment', async () => {
    const { store, fulfillment } = await setup();
    await cancelFulfillment(store, fulfillment.id);
    const { fulfillment: updated } = await collectPayment(store, fulfillment.id, {
      amount: 100,
      method: 'cash',
      collectingBranchId: 'branch-a'
    });
    expect(updated.snapshot.status).toBe('CANCELLED');
    expect(updated.snapshot.collectedAmount).toBe(100);
  });
});

describe('pending payments', () => {
  it('counts a pending payment only once it is confirmed', async () => {
    const { store, fulfillment } = await setup();
    const pending = await collectPayment(store, fulfillment.id, {
      amount: 2000,
      method: 'cheque',
      collectingBranchId: 'branch-a',
      status: 'pending'
    });
    expect(pending.fulfillment.snapshot.collectedAmount).toBe(0);

    const confirmed = await confirmPayment(store, pending.entry.id);
    expect(confirmed.entry.status).toBe('completed');
    expect(confirmed.fulfillment.snapshot.collectedAmount).toBe(2000);
    await expect(confirmPayment(store, pending.entry.id)).rejects.toMatchObject({
      details: { reason: 'PAYMENT_NOT_PENDING' }
    });
  });

  it('checks the order value again at confirmation', async () => {
    const { store, fulfillment } = await setup();
    const pending = await collectPayment(store, fulfillment.id, {
      amount: 20000,
      method: 'cheque',
      collectingBranchId: 'branch-a',
      status: 'pending'
    });
    await collectPayment(store, fulfillment.id, { amount: 40000, method: 'cash', collectingBranchId: 'branch-a' });
    await expect(confirmPayment(store, pending.entry.id)).rejects.toMatchObject({ code: 'OVER_COLLECTION' });
  });
});

describe('voidPayment', () => {
  it('removes a voided payment from the collected total', async () => {
    const { store, fulfillment } = await setup();
    const { entry } = await collectPayment(store, fulfillment.id, {
      amount: 5000,
      method: 'cash',
      collectingBranchId: 'branch-a'
    });
    const voided = await voidPayment(store, entry.id, 'counterfeit notes');

    expect(voided.entry).toMatchObject({ status: 'voided', voidReason: 'counterfeit notes' });
    expect(voided.fulfillment.snapshot.collectedAmount).toBe(0);
    await expect(voidPayment(store, entry.id, 'again')).rejects.toMatchObject({
      details: { reason: 'PAYMENT_ALREADY_VOIDED' }
    });
  });

  it('logs the void as its own event', async () => {
    vi.stubEnv('LOG_DOMAIN_EVENTS', 'true');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const { store, fulfillment } = await setup();
    const { entry } = await collectPayment(store, fulfillment.id, {
      amount: 5000,
      method: 'cash',
      collectingBranchId: 'branch-a'
    });
    log.mockClear();

    await voidPayment(store, entry.id, 'entered twice');

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toMatchObject({
      event: 'FULFILLMENT_PAYMENT_VOIDED',
      fulfillmentId: fulfillment.id,
      paymentId: entry.id,
      amount: 5000,
      reason: 'entered twice'
    });
  });

  it('does not void a deposited payment', async () => {
    const { store, fulfillment } = await setup();
    const { entry } = await collectPayment(store, fulfillment.id, {
      amount: 5000,
      method: 'cash',
      collectingBranchId: 'branch-a'
    });
    await markDeposited(store, entry.id, 'branch-hq');
    await expect(voidPayment(store, entry.id, 'late')).rejects.toMatchObject({
      details: { reason: 'PAYMENT_DEPOSITED' }
    });
  });
});

describe('deposits', () => {
  it('keeps a payment outstanding until it is deposited, once', async () => {
    const { store, fulfillment } = await setup();
    const { entry } = await collectPayment(store, fulfillment.id, {
      amount: 15000,
      method: 'cash',
      collectingBranchId: 'branch-a'
    });

    expect((await outstandingPayments(store, { collectingBranchId: 'branch-a' })).map((row) => row.id)).toEqual([
      entry.id
    ]);

    const first = await markDeposited(store, entry.id, 'branch-hq');
    expect(first.outcome).toBe('deposited');
    expect(first.entry).toMatchObject({ isDeposited: true, depositBranchId: 'branch-hq' });
    expect(await outstandingPayments(store)).toEqual([]);

    const second = await markDeposited(store, entry.id, 'branch-other');
    expect(second.outcome).toBe('already_deposited');
    expect(second.entry.depositBranchId).toBe('branch-hq');
    expect((await getPayment(store, entry.id)).depositBranchId).toBe('branch-hq');
  });

  it('refuses to deposit a pending payment', async () => {
    const { store, fulfillment } = await setup();
    const { entry } = await collectPayment(store, fulfillment.id, {
      amount: 100,
      method: 'cheque',
      collectingBranchId: 'branch-a',
      status: 'pending'
    });
    await expect(markDeposited(store, entry.id, 'branch-hq')).rejects.toMatchObject({
      code: 'INVALID_ENTRY',
      details: { reason: 'PAYMENT_NOT_COMPLETED' }
    });
  });

  it('summarizes outstanding cash per collecting branch', async () => {
    const { store, fulfillment } = await setup();
    await collectPayment(store, fulfillment.id, { amount: 100.25, method: 'cash', collectingBranchId: 'branch-a' });
    await collectPayment(store, fulfillment.id, { amount: 200.5, method: 'cash', collectingBranchId: 'branch-a' });
    await collectPayment(store, fulfillment.id, { amount: 50, method: 'cash', collectingBranchId: 'branch-b' });

    const report = await outstandingReport(store, { collectingBranchId: 'branch-a' });
    expect(report.summary).toEqual({ count: 2, totalAmount: 300.75 });
  });
});
