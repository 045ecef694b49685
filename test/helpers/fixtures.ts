import Decimal from 'decimal.js';

import { SettlementAuction } from '../../src/modules/auction/auction';
import { isFailure, type AuctionConfig, type AuctionFailure, type AuctionResult, type Identity } from '../../src/modules/auction/types';
import { InMemoryLedger } from '../../src/modules/ledger/memory';
import { silentLogger } from '../../src/shared/log';

export const OWNER = 'owner';
export const FEES = 'fees';
export const SELLER = 'seller';

export class ManualClock {
  constructor(private t = 0) {}

  now = (): number => this.t;

  set(t: number): void {
    this.t = t;
  }
}

/** In-memory ledger whose payouts can be made to fail or to call back into the auction. */
export class TestLedger extends InMemoryLedger {
  failTransfers = false;
  onTransfer: ((to: Identity, amount: Decimal) => Promise<void>) | null = null;

  async transfer(to: Identity, amount: Decimal): Promise<void> {
    if (this.onTransfer) await this.onTransfer(to, amount);
    if (this.failTransfers) throw new Error('ledger unavailable');
    return super.transfer(to, amount);
  }
}

export type Fixture = {
  clock: ManualClock;
  ledger: TestLedger;
  auction: SettlementAuction;
};

export function createAuction(overrides: Partial<AuctionConfig> = {}): Fixture {
  const clock = new ManualClock(0);
  const ledger = new TestLedger({ clock: clock.now });
  const auction = SettlementAuction.create(
    {
      owner: OWNER,
      commissionRecipient: FEES,
      proceedsRecipient: SELLER,
      durationSeconds: 120,
      extensionSeconds: 30,
      startTime: 0,
      ...overrides,
    },
    ledger,
    { logger: silentLogger }
  );
  return { clock, ledger, auction };
}

/** Puts the stake into escrow (as the runtime would) and bids at time `at`. */
export async function bidAt(f: Fixture, at: number, bidder: Identity, amount: string) {
  f.clock.set(at);
  await f.ledger.deposit(f.ledger.escrowId, new Decimal(amount));
  return f.auction.placeBid(bidder, amount);
}

export function expectOk<T extends object>(res: AuctionResult<T>): T {
  if (isFailure(res)) throw new Error(`expected success, got ${res.error}: ${res.message}`);
  return res;
}

export function expectFailure<T extends object>(res: AuctionResult<T>): AuctionFailure {
  if (!isFailure(res)) throw new Error('expected a failure');
  return res;
}
