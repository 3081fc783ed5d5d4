import { describe, expect, it } from 'vitest';
import { fixedDate, makePayment, makeShipment, twoLines as lines } from '../testFixtures';
import type { Fulfillment, FulfillmentSnapshot } from '../types';
import {
  advanceStatus,
  applyRecompute,
  checkInvariants,
  deriveStatus,
  diffSnapshots,
  emptySnapshot,
  recompute,
  type SnapshotWriter
} from './aggregator';

const shipment = makeShipment;

function payment(id: string, amount: number, status: 'pending' | 'completed' | 'voided' = 'completed') {
  return makePayment(id, amount, { status });
}

describe('deriveStatus / advanceStatus', () => {
  it('derives the stage from delivered against ordered', () => {
    expect(deriveStatus(0, 100)).toBe('PENDING');
    expect(deriveStatus(30, 100)).toBe('PARTIALLY_FULFILLED');
    expect(deriveStatus(100, 100)).toBe('FULLY_FULFILLED');
  });

  it('never moves a status backwards', () => {
    expect(advanceStatus('FULLY_FULFILLED', 'PARTIALLY_FULFILLED')).toBe('FULLY_FULFILLED');
    expect(advanceStatus('PARTIALLY_FULFILLED', 'PENDING')).toBe('PARTIALLY_FULFILLED');
    expect(advanceStatus('PENDING', 'PARTIALLY_FULFILLED')).toBe('PARTIALLY_FULFILLED');
  });

  it('keeps CANCELLED', () => {
    expect(advanceStatus('CANCELLED', 'FULLY_FULFILLED')).toBe('CANCELLED');
  });
});

describe('recompute', () => {
  it('starts empty with the full balance outstanding', () => {
    const snapshot = emptySnapshot(lines, 50000);
    expect(snapshot).toEqual({
      status: 'PENDING',
      orderedQuantity: 100,
      orderedAmount: 50000,
      deliveredQuantity: 0,
      deliveredAmount: 0,
      inFlightQuantity: 0,
      remainingQuantity: 100,
      unallocatedQuantity: 100,
      collectedAmount: 0,
      remainingBalance: 50000,
      fulfillmentPercentage: 0,
      paymentPercentage: 0
    });
  });

  it('folds delivered, in-flight and cancelled shipments and completed payments', () => {
    const { snapshot } = recompute({
      lines,
      orderTotalValue: 50000,
      previousStatus: 'PENDING',
      shipments: [
        shipment('s1', 'delivered', { L1: 30 }),
        shipment('s2', 'in_transit', { L1: 20, L2: 10 }),
        shipment('s3', 'cancelled', { L2: 30 })
      ],
      payments: [payment('p1', 15000), payment('p2', 999, 'pending'), payment('p3', 500, 'voided')]
    });

    expect(snapshot.status).toBe('PARTIALLY_FULFILLED');
    expect(snapshot.deliveredQuantity).toBe(30);
    expect(snapshot.deliveredAmount).toBe(15000);
    expect(snapshot.inFlightQuantity).toBe(30);
    expect(snapshot.remainingQuantity).toBe(70);
    expect(snapshot.unallocatedQuantity).toBe(40);
    expect(snapshot.collectedAmount).toBe(15000);
    expect(snapshot.remainingBalance).toBe(35000);
    expect(snapshot.fulfillmentPercentage).toBe(30);
    expect(snapshot.paymentPercentage).toBe(30);
  });

  it('rounds percentages to two decimals', () => {
    const { snapshot } = recompute({
      lines: [{ orderLineId: 'L1', productId: 'cement', productName: null, quantityOrdered: 3, unitPrice: 1 }],
      orderTotalValue: 3,
      previousStatus: 'PENDING',
      shipments: [shipment('s1', 'delivered', { L1: 1 })],
      payments: [payment('p1', 1)]
    });
    expect(snapshot.fulfillmentPercentage).toBe(33.33);
    expect(snapshot.paymentPercentage).toBe(33.33);
  });

  it('reports 0% for a zero-value order', () => {
    const { snapshot } = recompute({
      lines,
      orderTotalValue: 0,
      previousStatus: 'PENDING',
      shipments: [],
      payments: []
    });
    expect(snapshot.paymentPercentage).toBe(0);
    expect(snapshot.remainingBalance).toBe(0);
  });
});

describe('checkInvariants', () => {
  it('passes a consistent ledger', () => {
    const recomputation = recompute({
      lines,
      orderTotalValue: 50000,
      previousStatus: 'PENDING',
      shipments: [shipment('s1', 'delivered', { L1: 60, L2: 40 })],
      payments: [payment('p1', 50000)]
    });
    expect(checkInvariants(recomputation, recomputation.snapshot)).toEqual([]);
  });

  it('flags over-delivery, over-collection and drift', () => {
    const recomputation = recompute({
      lines,
      orderTotalValue: 100,
      previousStatus: 'PENDING',
      shipments: [shipment('s1', 'delivered', { L1: 61 })],
      payments: [payment('p1', 150)]
    });
    const stored = emptySnapshot(lines, 100);
    const codes = checkInvariants(recomputation, stored).map((violation) => violation.code);
    expect(codes).toEqual(['LINE_OVER_DELIVERED', 'LINE_OVER_COMMITTED', 'OVER_COLLECTED', 'SNAPSHOT_DRIFT']);
  });
});

describe('diffSnapshots', () => {
  it('lists the fields that differ', () => {
    const stored = emptySnapshot(lines, 50000);
    const fresh = { ...stored, collectedAmount: 100, remainingBalance: 49900 };
    expect(diffSnapshots(stored, fresh)).toEqual([
      { field: 'collectedAmount', stored: 0, recomputed: 100 },
      { field: 'remainingBalance', stored: 50000, recomputed: 49900 }
    ]);
  });
});

describe('applyRecompute', () => {
  it('reads the ledgers one query at a time and writes the snapshot', async () => {
    let active = 0;
    let maxActive = 0;
    const written: FulfillmentSnapshot[] = [];
    async function track<T>(value: T): Promise<T> {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active -= 1;
      return value;
    }
    const writer: SnapshotWriter = {
      listShipmentsForFulfillment: () => track([shipment('s1', 'delivered', { L1: 30 })]),
      listPaymentsForFulfillment: () => track([payment('p1', 15000)]),
      writeSnapshot: async (_id, snapshot) => {
        written.push(snapshot);
      }
    };
    const fulfillment: Fulfillment = {
      id: 'f-1',
      fulfillmentNumber: 'FUL-000001',
      orderId: 'order-1',
      orderNumber: null,
      destinationBranchId: 'branch-a',
      lines,
      snapshot: emptySnapshot(lines, 50000),
      notes: null,
      cancelledAt: null,
      cancelReason: null,
      recomputedAt: null,
      createdAt: fixedDate,
      updatedAt: fixedDate
    };

    const updated = await applyRecompute(writer, fulfillment, fixedDate);

    expect(maxActive).toBe(1);
    expect(written).toHaveLength(1);
    expect(updated.snapshot).toMatchObject({
      status: 'PARTIALLY_FULFILLED',
      deliveredQuantity: 30,
      collectedAmount: 15000,
      paymentPercentage: 30
    });
    expect(updated.recomputedAt).toBe(fixedDate);
  });
});
