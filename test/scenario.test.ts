import { describe, expect, it } from 'vitest';

import { sum } from '../src/shared/money';
import { FEES, OWNER, SELLER, bidAt, createAuction, expectFailure, expectOk } from './helpers/fixtures';

describe('Full auction lifecycle', () => {
  it('should settle two bidders and conserve value', async () => {
    const f = createAuction();

    const first = expectOk(await bidAt(f, 0, 'A', '100'));
    expect(first).toEqual({ bidder: 'A', amount: '100', auctionEndTime: 120, extended: false });

    const second = expectOk(await bidAt(f, 100, 'B', '105'));
    expect(second).toEqual({
      bidder: 'B',
      amount: '105',
      auctionEndTime: 130,
      extended: true,
      refunded: { bidder: 'A', refund: '98', commission: '2' },
    });

    f.clock.set(200);
    expect(expectFailure(await f.auction.placeBid('C', '110.25')).error).toBe('AuctionClosed');

    expect(expectOk(await f.auction.claimCommission(OWNER))).toEqual({ recipient: FEES, amount: '4.1' });
    expect(expectOk(await f.auction.claimProceeds(OWNER))).toEqual({ recipient: SELLER, amount: '102.9' });

    expect(f.ledger.balanceOf('A').toString()).toBe('98');
    expect(f.ledger.balanceOf(FEES).toString()).toBe('4.1');
    expect(f.ledger.balanceOf(SELLER).toString()).toBe('102.9');
    expect(f.ledger.balanceOf(f.ledger.escrowId).isZero()).toBe(true);

    // every accepted bid ends up as a refund, a commission or the proceeds
    const accepted = sum(f.auction.allBids().map((b) => b.amount));
    const paidOut = sum([...f.auction.allRefunds(), ...f.auction.allCommissions(), '102.9']);
    expect(accepted.toString()).toBe('205');
    expect(paidOut.toString()).toBe('205');

    expect(f.auction.commissionHistory('B').map(String)).toEqual(['2.1']);
    expect(f.auction.snapshot()).toMatchObject({
      highestBidder: 'B',
      highestBid: '105',
      commissionTotal: '0',
      ownerProceedsPending: '0',
      finalized: true,
      bidCount: 2,
    });

    expect(f.auction.events()).toEqual([
      { type: 'NewBid', bidder: 'A', amount: '100', seq: 1, at: 0 },
      { type: 'Refunded', bidder: 'A', amount: '98', seq: 2, at: 100 },
      { type: 'NewBid', bidder: 'B', amount: '105', seq: 3, at: 100 },
      { type: 'AuctionEnded', winner: 'B', amount: '105', seq: 4, at: 200 },
      { type: 'CommissionClaimed', recipient: FEES, amount: '4.1', seq: 5, at: 200 },
      { type: 'ProceedsTransferred', recipient: SELLER, amount: '102.9', seq: 6, at: 200 },
    ]);
  });
});
