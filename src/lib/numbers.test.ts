import { describe, expect, it } from 'vitest';
import { percentageOf, roundMoney, sumMoney, toMinorUnits, toNumber } from './numbers';

describe('numbers', () => {
  it('reads pg numeric strings', () => {
    expect(toNumber('15000.50')).toBe(15000.5);
    expect(toNumber(null)).toBe(0);
    expect(toNumber('n/a')).toBe(0);
  });

  it('sums money without floating point drift', () => {
    expect(sumMoney([0.1, 0.2])).toBe(0.3);
    expect(toMinorUnits(19.99)).toBe(1999);
    expect(roundMoney(1.239)).toBe(1.24);
  });

  it('computes percentages to two decimals', () => {
    expect(percentageOf(15000, 50000)).toBe(30);
    expect(percentageOf(2, 3)).toBe(66.67);
    expect(percentageOf(5, 0)).toBe(0);
  });
});
