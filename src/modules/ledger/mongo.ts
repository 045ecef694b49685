import { randomBytes } from 'crypto';
import type Decimal from 'decimal.js';
import mongoose from 'mongoose';

import { AccountModel, LedgerEntryModel, type LedgerKind } from '../../models';
import { startSession } from '../../shared/db';
import { decFrom, decNeg, decToString } from '../../shared/decimal';
import { ledgerOpsTotal } from '../../shared/metrics';
import { gt, ZERO } from '../../shared/money';
import { withTransactionRetries } from '../../shared/mongoTx';
import type { Identity, Timestamp } from '../auction/types';
import { InsufficientFundsError, unixNow, type EscrowLedger, type LedgerAccountView } from './types';

export type MongoLedgerOptions = {
  escrowId: Identity;
  currency: string;
  clock?: () => Timestamp;
};

type AccountLean = { subjectId: string; currency: string; balance: mongoose.Types.Decimal128 };

function toView(doc: AccountLean): LedgerAccountView {
  return { subjectId: doc.subjectId, currency: doc.currency, balance: decToString(doc.balance) };
}

function newTxId(kind: LedgerKind): string {
  return `${kind}:${Date.now()}:${randomBytes(8).toString('hex')}`;
}

/**
 * Escrow and participant balances in MongoDB. Each movement runs in its own
 * transaction: the debit is conditional on the balance covering it, the credit
 * upserts the account, and a ledger entry keyed by txId makes replays no-ops.
 */
export class MongoLedger implements EscrowLedger {
  readonly escrowId: Identity;
  readonly currency: string;
  private readonly clock: () => Timestamp;

  constructor(opts: MongoLedgerOptions) {
    this.escrowId = opts.escrowId;
    this.currency = opts.currency;
    this.clock = opts.clock ?? unixNow;
  }

  now(): Timestamp {
    return this.clock();
  }

  async getAccount(subjectId: Identity): Promise<LedgerAccountView | null> {
    const doc = await AccountModel.findOne({ subjectId, currency: this.currency }).lean();
    if (!doc) return null;
    return toView(doc);
  }

  async deposit(subjectId: Identity, amount: Decimal, txId?: string): Promise<LedgerAccountView> {
    return this.runAtomic('deposit', txId ?? newTxId('deposit'), null, subjectId, amount);
  }

  async collect(from: Identity, amount: Decimal): Promise<void> {
    await this.runAtomic('collect', newTxId('collect'), from, this.escrowId, amount);
  }

  async transfer(to: Identity, amount: Decimal): Promise<void> {
    await this.runAtomic('transfer', newTxId('transfer'), this.escrowId, to, amount);
  }

  private async runAtomic(
    kind: LedgerKind,
    txId: string,
    from: Identity | null,
    to: Identity,
    amount: Decimal
  ): Promise<LedgerAccountView> {
    if (!gt(amount, ZERO)) throw new Error('amount must be > 0');
    if (!txId.trim()) throw new Error('txId is required');
    const currency = this.currency;
    const amountDec = decFrom(amount);

    const doWork = async (session: mongoose.ClientSession): Promise<LedgerAccountView> => {
      const existing = await LedgerEntryModel.findOne({ txId }).session(session).lean();
      if (existing) {
        ledgerOpsTotal.labels(kind, 'ok', 'idempotent').inc();
        const acc = await AccountModel.findOne({ subjectId: to, currency }).session(session).lean();
        if (!acc) throw new Error('account not found');
        return toView(acc);
      }

      let debitAccountId: mongoose.Types.ObjectId | undefined;
      if (from !== null) {
        const debited = await AccountModel.findOneAndUpdate(
          { subjectId: from, currency, status: 'active', balance: { $gte: amountDec } },
          { $inc: { balance: decNeg(amount) } },
          { new: true, session }
        ).lean();
        if (!debited) throw new InsufficientFundsError(`insufficient funds on ${from}`);
        debitAccountId = debited._id;
      }

      const credited = await AccountModel.findOneAndUpdate(
        { subjectId: to, currency },
        { $setOnInsert: { subjectId: to, currency, status: 'active' }, $inc: { balance: amountDec } },
        { upsert: true, new: true, session }
      ).lean();
      if (!credited) throw new Error(`${kind} failed: account upsert failed`);

      await LedgerEntryModel.create(
        [
          {
            txId,
            kind,
            currency,
            debitAccountId,
            creditAccountId: credited._id,
            amount: amountDec,
            meta: { from, to },
          },
        ],
        { session }
      );

      ledgerOpsTotal.labels(kind, 'ok', 'none').inc();
      return toView(credited);
    };

    const session = await startSession();
    try {
      return await withTransactionRetries(session, () => doWork(session));
    } catch (e) {
      const code = e instanceof Error && 'code' in e ? e.code : undefined;
      // duplicate txId: the movement committed in an earlier attempt
      if (code === 11000) {
        ledgerOpsTotal.labels(kind, 'ok', 'idempotent').inc();
        const acc = await AccountModel.findOne({ subjectId: to, currency }).lean();
        if (!acc) throw e;
        return toView(acc);
      }
      const reason = e instanceof InsufficientFundsError ? 'insufficient_funds' : 'exception';
      ledgerOpsTotal.labels(kind, 'error', reason).inc();
      throw e;
    } finally {
      await session.endSession();
    }
  }
}
