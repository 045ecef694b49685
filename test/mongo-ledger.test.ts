import Decimal from 'decimal.js';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MongoLedger } from '../src/modules/ledger/mongo';
import { InsufficientFundsError } from '../src/modules/ledger/types';
import { startSession } from '../src/shared/db';
import { withTransactionRetries } from '../src/shared/mongoTx';

const { accounts, endSession } = vi.hoisted(() => ({
  accounts: new Map<string, string>(),
  endSession: vi.fn(async () => undefined),
}));

vi.mock('../src/shared/db', () => ({
  startSession: vi.fn(async () => ({ endSession })),
}));

vi.mock('../src/shared/mongoTx', () => ({
  withTransactionRetries: vi.fn(),
}));

vi.mock('../src/models', async () => {
  const { default: mongoose } = await import('mongoose');
  const findOne = vi.fn((filter: { subjectId: string; currency: string }) => ({
    lean: async () => {
      const balance = accounts.get(filter.subjectId);
      if (balance === undefined) return null;
      return { subjectId: filter.subjectId, currency: filter.currency, balance: mongoose.Types.Decimal128.fromString(balance) };
    },
  }));
  return { AccountModel: { findOne }, LedgerEntryModel: {} };
});

class DuplicateKeyError extends Error {
  readonly code = 11000;
}

describe('MongoLedger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    accounts.clear();
  });

  it('should treat a duplicate txId as an already applied deposit', async () => {
    accounts.set('alice', '500');
    vi.mocked(withTransactionRetries).mockRejectedValueOnce(new DuplicateKeyError('E11000 duplicate key error'));

    const ledger = new MongoLedger({ escrowId: 'escrow', currency: 'RUB' });
    const res = await ledger.deposit('alice', new Decimal('500'), 'dep:alice');

    expect(res).toEqual({ subjectId: 'alice', currency: 'RUB', balance: '500' });
    expect(endSession).toHaveBeenCalledTimes(1);
  });

  it('should rethrow a duplicate txId when the account cannot be read back', async () => {
    const dup = new DuplicateKeyError('E11000 duplicate key error');
    vi.mocked(withTransactionRetries).mockRejectedValueOnce(dup);

    const ledger = new MongoLedger({ escrowId: 'escrow', currency: 'RUB' });
    await expect(ledger.transfer('bob', new Decimal('5'))).rejects.toBe(dup);
  });

  it('should pass other failures through and close the session', async () => {
    vi.mocked(withTransactionRetries).mockRejectedValueOnce(new InsufficientFundsError('insufficient funds on alice'));

    const ledger = new MongoLedger({ escrowId: 'escrow', currency: 'RUB' });
    await expect(ledger.collect('alice', new Decimal('10'))).rejects.toBeInstanceOf(InsufficientFundsError);
    expect(endSession).toHaveBeenCalledTimes(1);
  });

  it('should refuse a non-positive amount before opening a session', async () => {
    const ledger = new MongoLedger({ escrowId: 'escrow', currency: 'RUB' });
    await expect(ledger.deposit('alice', new Decimal(0))).rejects.toThrow('amount must be > 0');
    expect(startSession).not.toHaveBeenCalled();
  });

  it('should read accounts and report unknown ones as null', async () => {
    accounts.set('alice', '12.5');
    const ledger = new MongoLedger({ escrowId: 'escrow', currency: 'RUB', clock: () => 7 });

    expect(await ledger.getAccount('alice')).toEqual({ subjectId: 'alice', currency: 'RUB', balance: '12.5' });
    expect(await ledger.getAccount('nobody')).toBeNull();
    expect(ledger.now()).toBe(7);
  });
});
