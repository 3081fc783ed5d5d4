/**
 * Reads a NUMERIC or BIGINT column, which `pg` hands back as a string. A
 * missing or unparseable value reads as 0.
 */
export function toNumber(value: string | number | null | undefined): number {
  if (value === null || value === undefined) return 0;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Money is carried as a two-decimal number at the edges and summed in integer
 * minor units (cents) everywhere else.
 */
export function toMinorUnits(amount: number): number {
  return Math.round(amount * 100);
}

export function fromMinorUnits(minor: number): number {
  return minor / 100;
}

export function roundMoney(amount: number): number {
  return fromMinorUnits(toMinorUnits(amount));
}

export function sumMoney(amounts: number[]): number {
  return fromMinorUnits(amounts.reduce((total, amount) => total + toMinorUnits(amount), 0));
}

/**
 * Share of `part` in `whole` as a percentage rounded to 2 decimals; 0 when the
 * whole is empty. Multiplies before dividing so exact ratios stay exact.
 */
export function percentageOf(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return parseFloat(((part * 100) / whole).toFixed(2));
}
