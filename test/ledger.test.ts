import Decimal from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { InMemoryLedger } from '../src/modules/ledger/memory';
import { InsufficientFundsError } from '../src/modules/ledger/types';

describe('InMemoryLedger', () => {
  it('should apply a deposit once per txId', async () => {
    const ledger = new InMemoryLedger();
    await ledger.deposit('alice', new Decimal('500'), 'dep:alice');
    const again = await ledger.deposit('alice', new Decimal('500'), 'dep:alice');

    expect(again).toEqual({ subjectId: 'alice', currency: 'RUB', balance: '500' });
    expect(await ledger.getAccount('alice')).toEqual({ subjectId: 'alice', currency: 'RUB', balance: '500' });
  });

  it('should return null for an account it has never seen', async () => {
    const ledger = new InMemoryLedger();
    expect(await ledger.getAccount('nobody')).toBeNull();
  });

  it('should move stakes into escrow and pay out of it', async () => {
    const ledger = new InMemoryLedger({ escrowId: 'vault', currency: 'EUR' });
    await ledger.deposit('alice', new Decimal('500'));
    await ledger.collect('alice', new Decimal('120.5'));
    await ledger.transfer('bob', new Decimal('20.5'));

    expect(ledger.balanceOf('alice').toString()).toBe('379.5');
    expect(ledger.balanceOf('vault').toString()).toBe('100');
    expect(await ledger.getAccount('bob')).toEqual({ subjectId: 'bob', currency: 'EUR', balance: '20.5' });
  });

  it('should reject an overdraft without touching balances', async () => {
    const ledger = new InMemoryLedger();
    await ledger.deposit('alice', new Decimal('50'));

    await expect(ledger.collect('alice', new Decimal('60'))).rejects.toThrow(
      new InsufficientFundsError('insufficient funds on alice: 50 < 60')
    );
    await expect(ledger.transfer('bob', new Decimal('1'))).rejects.toBeInstanceOf(InsufficientFundsError);
    expect(ledger.balanceOf('alice').toString()).toBe('50');
    expect(ledger.balanceOf('escrow').isZero()).toBe(true);
  });

  it('should reject non-positive amounts', async () => {
    const ledger = new InMemoryLedger();
    await expect(ledger.deposit('alice', new Decimal(0))).rejects.toThrow('amount must be > 0');
    await expect(ledger.transfer('alice', new Decimal(-1))).rejects.toThrow('amount must be > 0');
  });

  it('should read time from its clock', () => {
    const ledger = new InMemoryLedger({ clock: () => 42 });
    expect(ledger.now()).toBe(42);
  });
});
