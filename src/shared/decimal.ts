import mongoose from 'mongoose';

import { toDecimal, type MoneyValue } from './money';

/** decimal.js value into the column type MongoDB stores balances in. */
export function decFrom(input: MoneyValue): mongoose.Types.Decimal128 {
  return mongoose.Types.Decimal128.fromString(toDecimal(input).toFixed());
}

export function decNeg(input: MoneyValue): mongoose.Types.Decimal128 {
  return decFrom(toDecimal(input).neg());
}

export function decToString(value: mongoose.Types.Decimal128 | null | undefined): string {
  if (!value) return '0';
  return value.toString();
}
