import type Decimal from 'decimal.js';

import type { Identity, Timestamp } from '../auction/types';

/** What the settlement engine needs from the outside world. */
export interface ValueLedger {
  now(): Timestamp;
  /** Pays `amount` out of the auction escrow. Rejects without effect on failure. */
  transfer(to: Identity, amount: Decimal): Promise<void>;
}

export type LedgerAccountView = {
  subjectId: string;
  currency: string;
  balance: string;
};

/** A ledger that also takes bid value in and keeps participant balances. */
export interface EscrowLedger extends ValueLedger {
  readonly escrowId: Identity;
  readonly currency: string;
  collect(from: Identity, amount: Decimal): Promise<void>;
  deposit(subjectId: Identity, amount: Decimal, txId?: string): Promise<LedgerAccountView>;
  getAccount(subjectId: Identity): Promise<LedgerAccountView | null>;
}

export class InsufficientFundsError extends Error {
  readonly name = 'InsufficientFundsError';
}

export function unixNow(): Timestamp {
  return Math.floor(Date.now() / 1000);
}
