import type Decimal from 'decimal.js';

import { ledgerOpsTotal } from '../../shared/metrics';
import { ZERO, gt, toString as moneyToString } from '../../shared/money';
import type { Identity, Timestamp } from '../auction/types';
import { InsufficientFundsError, unixNow, type EscrowLedger, type LedgerAccountView } from './types';

export type InMemoryLedgerOptions = {
  escrowId?: Identity;
  currency?: string;
  clock?: () => Timestamp;
};

type LedgerKind = 'deposit' | 'collect' | 'transfer';

/**
 * Balances held in process. Used by tests and by the server when no database
 * is configured; every movement checks the debit side before touching either
 * balance, so a rejected call has no effect.
 */
export class InMemoryLedger implements EscrowLedger {
  readonly escrowId: Identity;
  readonly currency: string;
  private readonly clock: () => Timestamp;
  private readonly balances = new Map<Identity, Decimal>();
  private readonly seenTxIds = new Set<string>();

  constructor(opts: InMemoryLedgerOptions = {}) {
    this.escrowId = opts.escrowId ?? 'escrow';
    this.currency = opts.currency ?? 'RUB';
    this.clock = opts.clock ?? unixNow;
  }

  now(): Timestamp {
    return this.clock();
  }

  balanceOf(subjectId: Identity): Decimal {
    return this.balances.get(subjectId) ?? ZERO;
  }

  async getAccount(subjectId: Identity): Promise<LedgerAccountView | null> {
    const balance = this.balances.get(subjectId);
    if (!balance) return null;
    return { subjectId, currency: this.currency, balance: moneyToString(balance) };
  }

  async deposit(subjectId: Identity, amount: Decimal, txId?: string): Promise<LedgerAccountView> {
    this.assertPositive('deposit', amount);
    if (txId !== undefined && this.seenTxIds.has(txId)) {
      ledgerOpsTotal.labels('deposit', 'ok', 'idempotent').inc();
      return { subjectId, currency: this.currency, balance: moneyToString(this.balanceOf(subjectId)) };
    }
    if (txId !== undefined) this.seenTxIds.add(txId);
    this.balances.set(subjectId, this.balanceOf(subjectId).add(amount));
    ledgerOpsTotal.labels('deposit', 'ok', 'none').inc();
    return { subjectId, currency: this.currency, balance: moneyToString(this.balanceOf(subjectId)) };
  }

  async collect(from: Identity, amount: Decimal): Promise<void> {
    this.move('collect', from, this.escrowId, amount);
  }

  async transfer(to: Identity, amount: Decimal): Promise<void> {
    this.move('transfer', this.escrowId, to, amount);
  }

  private move(kind: LedgerKind, from: Identity, to: Identity, amount: Decimal): void {
    this.assertPositive(kind, amount);
    const available = this.balanceOf(from);
    if (gt(amount, available)) {
      ledgerOpsTotal.labels(kind, 'error', 'insufficient_funds').inc();
      throw new InsufficientFundsError(`insufficient funds on ${from}: ${moneyToString(available)} < ${moneyToString(amount)}`);
    }
    this.balances.set(from, available.sub(amount));
    this.balances.set(to, this.balanceOf(to).add(amount));
    ledgerOpsTotal.labels(kind, 'ok', 'none').inc();
  }

  private assertPositive(kind: LedgerKind, amount: Decimal): void {
    if (!gt(amount, ZERO)) {
      ledgerOpsTotal.labels(kind, 'error', 'bad_amount').inc();
      throw new Error('amount must be > 0');
    }
  }
}
