import Decimal from 'decimal.js';
import { describe, expect, it, vi } from 'vitest';

import { AuctionEvents } from '../src/modules/auction/events';
import { AuctionState } from '../src/modules/auction/state';
import { silentLogger, type Logger } from '../src/shared/log';

function newState() {
  return new AuctionState({
    owner: 'owner',
    commissionRecipient: 'fees',
    proceedsRecipient: 'seller',
    startTime: 1000,
    durationSeconds: 120,
    extensionSeconds: 30,
  });
}

describe('AuctionState', () => {
  it('should end exactly at the deadline', () => {
    const state = newState();
    expect(state.auctionEndTime).toBe(1120);
    expect(state.phase(1119)).toEqual({ ended: false, timeLeft: 1 });
    expect(state.phase(1120)).toEqual({ ended: true, timeLeft: 0 });
    expect(state.timeLeft(5000)).toBe(0);
  });

  it('should only move the deadline forward', () => {
    const state = newState();
    expect(state.pushDeadline(1100)).toBe(false);
    expect(state.auctionEndTime).toBe(1120);
    expect(state.pushDeadline(1150)).toBe(true);
    expect(state.auctionEndTime).toBe(1150);
    expect(state.initialEndTime).toBe(1120);
  });

  it('should restore a captured checkpoint', () => {
    const state = newState();
    const cp = state.capture();
    state.highestBidder = 'a';
    state.highestBid = new Decimal(100);
    state.commissionTotal = new Decimal(2);
    state.finalized = true;
    state.pushDeadline(2000);

    state.restore(cp);
    expect(state.snapshot(0)).toEqual({
      owner: 'owner',
      commissionRecipient: 'fees',
      proceedsRecipient: 'seller',
      highestBidder: null,
      highestBid: '0',
      initialEndTime: 1120,
      auctionEndTime: 1120,
      extensionTime: 30,
      commissionTotal: '0',
      ownerProceedsPending: '0',
      finalized: false,
      bidCount: 0,
    });
  });
});

describe('AuctionEvents', () => {
  it('should keep staged events invisible until published', () => {
    const events = new AuctionEvents(silentLogger);
    events.stage({ type: 'NewBid', bidder: 'a', amount: '1' }, 10);
    expect(events.list()).toEqual([]);

    events.publishStaged();
    expect(events.list()).toEqual([{ type: 'NewBid', bidder: 'a', amount: '1', seq: 1, at: 10 }]);
  });

  it('should drop staged events past a savepoint', () => {
    const events = new AuctionEvents(silentLogger);
    events.stage({ type: 'NewBid', bidder: 'a', amount: '1' }, 10);
    const sp = events.savepoint();
    events.stage({ type: 'NewBid', bidder: 'b', amount: '2' }, 11);
    events.rollbackTo(sp);
    events.publishStaged();
    expect(events.list().map((e) => e.seq)).toEqual([1]);
  });

  it('should list events after a sequence number', () => {
    const events = new AuctionEvents(silentLogger);
    events.stage({ type: 'NewBid', bidder: 'a', amount: '1' }, 10);
    events.stage({ type: 'NewBid', bidder: 'b', amount: '2' }, 11);
    events.stage({ type: 'AuctionEnded', winner: 'b', amount: '2' }, 200);
    events.publishStaged();
    expect(events.list(1).map((e) => e.type)).toEqual(['NewBid', 'AuctionEnded']);
    expect(events.list(3)).toEqual([]);
  });

  it('should deliver to subscribers and log a throwing listener', () => {
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const events = new AuctionEvents(logger);
    const seen: string[] = [];
    events.subscribe(() => {
      throw new Error('boom');
    });
    const unsubscribe = events.subscribe((e) => seen.push(e.type));

    events.stage({ type: 'NewBid', bidder: 'a', amount: '1' }, 10);
    events.publishStaged();
    unsubscribe();
    events.stage({ type: 'NewBid', bidder: 'b', amount: '2' }, 11);
    events.publishStaged();

    expect(seen).toEqual(['NewBid']);
    expect(logger.error).toHaveBeenCalledTimes(2);
    expect(events.list()).toHaveLength(2);
  });
});
