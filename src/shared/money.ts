import Decimal from 'decimal.js';

Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 30,
});

export type MoneyValue = Decimal | string | number;

export const ZERO = new Decimal(0);

export function toDecimal(value: MoneyValue): Decimal {
  if (value instanceof Decimal) return value;

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error('money value must be finite');
    return new Decimal(value);
  }

  const trimmed = value.trim();
  if (!trimmed) return new Decimal(0);
  let parsed: Decimal;
  try {
    parsed = new Decimal(trimmed);
  } catch {
    throw new Error('invalid money string');
  }
  if (!parsed.isFinite()) throw new Error('money value must be finite');
  return parsed;
}

export function compare(a: MoneyValue, b: MoneyValue): -1 | 0 | 1 {
  const c = toDecimal(a).cmp(toDecimal(b));
  if (c < 0) return -1;
  return c > 0 ? 1 : 0;
}

export function sum(values: readonly MoneyValue[]): Decimal {
  return values.reduce<Decimal>((acc, v) => acc.add(toDecimal(v)), ZERO);
}

/** `value * percent / 100`, exact. */
export function percentOf(value: MoneyValue, percent: MoneyValue): Decimal {
  return toDecimal(value).mul(toDecimal(percent)).div(100);
}

export function gt(a: MoneyValue, b: MoneyValue): boolean {
  return compare(a, b) > 0;
}

export function eq(a: MoneyValue, b: MoneyValue): boolean {
  return compare(a, b) === 0;
}

export function toString(decimal: MoneyValue): string {
  return toDecimal(decimal).toString();
}
