import { describe, expect, it } from 'vitest';
import { FulfillmentError } from '../errors';
import { allocate, assertCommittable, orderForAllocation, type RemainingLine } from './allocator';

function line(orderLineId: string, remaining: number, unitPrice = 10, quantityOrdered = remaining): RemainingLine {
  return { orderLineId, productId: `prod-${orderLineId}`, quantityOrdered, unitPrice, remaining };
}

function errorOf(fn: () => unknown): FulfillmentError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FulfillmentError) return err;
    throw err;
  }
  throw new Error('expected a FulfillmentError');
}

describe('allocate', () => {
  it('fills lines in id order until the vehicle is full', () => {
    const plan = allocate([line('L2', 50), line('L1', 30)], 40);
    expect(plan.lines.map((l) => [l.orderLineId, l.quantity, l.remainingAfter])).toEqual([
      ['L1', 30, 0],
      ['L2', 10, 40]
    ]);
    expect(plan.totalQuantity).toBe(40);
    expect(plan.unusedCapacity).toBe(0);
  });

  it('splits a 100 unit order into loads of 30, 30, 30 and 10', () => {
    let remaining = 100;
    const loads: number[] = [];
    while (remaining > 0) {
      const plan = allocate([line('L1', remaining, 10, 100)], 30);
      loads.push(plan.totalQuantity);
      remaining -= plan.totalQuantity;
    }
    expect(loads).toEqual([30, 30, 30, 10]);
  });

  it('returns the same plan for the same input', () => {
    const remaining = [line('B', 7), line('A', 5), line('C', 9)];
    expect(allocate(remaining, 12)).toEqual(allocate([...remaining].reverse(), 12));
  });

  it('reports unused capacity when less remains than the vehicle holds', () => {
    const plan = allocate([line('L1', 4), line('L2', 0)], 10);
    expect(plan.lines).toHaveLength(1);
    expect(plan.totalQuantity).toBe(4);
    expect(plan.unusedCapacity).toBe(6);
  });

  it('prices each allocated line in cents', () => {
    const plan = allocate([line('L1', 3, 0.1)], 3);
    expect(plan.lines[0]?.subtotal).toBe(0.3);
  });

  it('serves lines named in lineOrder first', () => {
    const plan = allocate([line('L1', 10), line('L2', 10), line('L3', 10)], 15, { lineOrder: ['L3'] });
    expect(plan.lines.map((l) => [l.orderLineId, l.quantity])).toEqual([
      ['L3', 10],
      ['L1', 5]
    ]);
  });

  it('rejects a zero capacity as CAPACITY_EXHAUSTED', () => {
    expect(errorOf(() => allocate([line('L1', 5)], 0)).code).toBe('CAPACITY_EXHAUSTED');
  });

  it('rejects a non-integer capacity', () => {
    const err = errorOf(() => allocate([line('L1', 5)], 2.5));
    expect(err.code).toBe('VALIDATION_FAILED');
    expect(err.details).toEqual({ reason: 'CAPACITY_NOT_INTEGER', capacity: 2.5 });
  });
});

describe('orderForAllocation', () => {
  it('ignores duplicate ids in lineOrder', () => {
    const ordered = orderForAllocation([line('L1', 1), line('L2', 1)], ['L2', 'L2']);
    expect(ordered.map((l) => l.orderLineId)).toEqual(['L2', 'L1']);
  });

  it('rejects an unknown line id', () => {
    const err = errorOf(() => orderForAllocation([line('L1', 1)], ['L9']));
    expect(err.details).toEqual({ reason: 'LINE_ORDER_UNKNOWN_LINE', orderLineId: 'L9' });
  });
});

describe('assertCommittable', () => {
  it('accepts a split within remaining and capacity', () => {
    expect(() =>
      assertCommittable([{ orderLineId: 'L1', quantity: 30 }], [line('L1', 100)], 30)
    ).not.toThrow();
  });

  it('rejects 40 units against 30 remaining as OVER_ALLOCATION', () => {
    const err = errorOf(() => assertCommittable([{ orderLineId: 'L1', quantity: 40 }], [line('L1', 30)], 50));
    expect(err.code).toBe('OVER_ALLOCATION');
    expect(err.details).toEqual({
      reason: 'LINE_REMAINING_EXCEEDED',
      orderLineId: 'L1',
      requested: 40,
      remaining: 30
    });
  });

  it('rejects a load larger than the vehicle', () => {
    const err = errorOf(() =>
      assertCommittable(
        [
          { orderLineId: 'L1', quantity: 20 },
          { orderLineId: 'L2', quantity: 20 }
        ],
        [line('L1', 50), line('L2', 50)],
        30
      )
    );
    expect(err.code).toBe('OVER_ALLOCATION');
    expect(err.details).toEqual({ reason: 'CAPACITY_EXCEEDED', requested: 40, capacity: 30 });
  });

  it('rejects an empty split, a duplicate line and an unknown line', () => {
    expect(errorOf(() => assertCommittable([], [line('L1', 5)], 5)).details).toEqual({ reason: 'SHIPMENT_NO_LINES' });
    expect(
      errorOf(() =>
        assertCommittable(
          [
            { orderLineId: 'L1', quantity: 1 },
            { orderLineId: 'L1', quantity: 1 }
          ],
          [line('L1', 5)],
          5
        )
      ).details
    ).toEqual({ reason: 'SHIPMENT_DUPLICATE_LINE', orderLineId: 'L1' });
    expect(errorOf(() => assertCommittable([{ orderLineId: 'L7', quantity: 1 }], [line('L1', 5)], 5)).code).toBe(
      'NOT_FOUND'
    );
  });

  it('rejects non-positive quantities', () => {
    const err = errorOf(() => assertCommittable([{ orderLineId: 'L1', quantity: 0 }], [line('L1', 5)], 5));
    expect(err.details).toEqual({ reason: 'SHIPMENT_INVALID_QUANTITY', orderLineId: 'L1', quantity: 0 });
  });
});
