import { describe, expect, it } from 'vitest';
import { FulfillmentError } from '../errors';
import { makePayment } from '../testFixtures';
import {
  assertConfirmable,
  assertPositiveAmount,
  assertVoidable,
  assertWithinOrderValue,
  collectedMinorUnits,
  filterOutstanding,
  isDepositable,
  summarizeOutstanding
} from './paymentLedger';

function errorOf(fn: () => unknown): FulfillmentError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FulfillmentError) return err;
    throw err;
  }
  throw new Error('expected a FulfillmentError');
}

describe('collectedMinorUnits', () => {
  it('sums completed entries only, in cents', () => {
    const entries = [
      makePayment('p1', 0.1),
      makePayment('p2', 0.2),
      makePayment('p3', 10, { status: 'pending' }),
      makePayment('p4', 10, { status: 'voided' })
    ];
    expect(collectedMinorUnits(entries)).toBe(30);
  });
});

describe('assertWithinOrderValue', () => {
  it('allows collecting up to the order value exactly', () => {
    expect(() => assertWithinOrderValue([makePayment('p1', 35000)], 15000, 50000)).not.toThrow();
  });

  it('rejects a payment that would pass the order value', () => {
    const err = errorOf(() => assertWithinOrderValue([makePayment('p1', 45000)], 6000, 50000));
    expect(err.code).toBe('OVER_COLLECTION');
    expect(err.details).toEqual({ orderTotalValue: 50000, collected: 45000, requested: 6000, available: 5000 });
  });
});

describe('assertPositiveAmount', () => {
  it('rejects zero, negative and sub-cent amounts', () => {
    for (const amount of [0, -5, 0.001]) {
      expect(errorOf(() => assertPositiveAmount(amount)).details).toEqual({ reason: 'AMOUNT_NOT_POSITIVE', amount });
    }
  });
});

describe('deposit and lifecycle checks', () => {
  it('treats an already deposited entry as not depositable', () => {
    expect(isDepositable(makePayment('p1', 10))).toBe(true);
    expect(isDepositable(makePayment('p1', 10, { isDeposited: true }))).toBe(false);
  });

  it('refuses to deposit a pending entry', () => {
    const err = errorOf(() => isDepositable(makePayment('p1', 10, { status: 'pending' })));
    expect(err.code).toBe('INVALID_ENTRY');
    expect(err.details).toEqual({ reason: 'PAYMENT_NOT_COMPLETED', paymentId: 'p1', status: 'pending' });
  });

  it('only confirms pending entries', () => {
    expect(() => assertConfirmable(makePayment('p1', 10, { status: 'pending' }))).not.toThrow();
    expect(errorOf(() => assertConfirmable(makePayment('p1', 10))).details).toEqual({
      reason: 'PAYMENT_NOT_PENDING',
      paymentId: 'p1',
      status: 'completed'
    });
  });

  it('does not void deposited or voided entries', () => {
    expect(errorOf(() => assertVoidable(makePayment('p1', 10, { isDeposited: true }))).details).toEqual({
      reason: 'PAYMENT_DEPOSITED',
      paymentId: 'p1'
    });
    expect(errorOf(() => assertVoidable(makePayment('p1', 10, { status: 'voided' }))).details).toEqual({
      reason: 'PAYMENT_ALREADY_VOIDED',
      paymentId: 'p1'
    });
  });
});

describe('outstanding', () => {
  const entries = [
    makePayment('p1', 100),
    makePayment('p2', 250.5, { collectingBranchId: 'branch-b' }),
    makePayment('p3', 75, { isDeposited: true }),
    makePayment('p4', 40, { status: 'pending' })
  ];

  it('keeps completed, undeposited entries', () => {
    expect(filterOutstanding(entries).map((entry) => entry.id)).toEqual(['p1', 'p2']);
    expect(filterOutstanding(entries, { collectingBranchId: 'branch-b' }).map((entry) => entry.id)).toEqual(['p2']);
  });

  it('summarizes count and total', () => {
    expect(summarizeOutstanding(filterOutstanding(entries))).toEqual({ count: 2, totalAmount: 350.5 });
  });
});
