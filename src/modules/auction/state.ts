import type Decimal from 'decimal.js';

import { ZERO, toString as moneyToString } from '../../shared/money';
import type { AuctionPhase, AuctionSnapshot, Identity, Timestamp } from './types';

export type AuctionStateInit = {
  owner: Identity;
  commissionRecipient: Identity;
  proceedsRecipient: Identity;
  startTime: Timestamp;
  durationSeconds: number;
  extensionSeconds: number;
};

/** Copy of every field a call may mutate. */
export type StateCheckpoint = Readonly<{
  highestBidder: Identity | null;
  highestBid: Decimal;
  auctionEndTime: Timestamp;
  commissionTotal: Decimal;
  ownerProceedsPending: Decimal;
  finalized: boolean;
}>;

/**
 * The auction aggregate. One instance is created per auction and handed by
 * reference to the bidding and claims components; nothing else writes to it.
 */
export class AuctionState {
  readonly owner: Identity;
  readonly commissionRecipient: Identity;
  readonly proceedsRecipient: Identity;
  readonly initialEndTime: Timestamp;
  readonly extensionTime: number;

  highestBidder: Identity | null = null;
  highestBid: Decimal = ZERO;
  auctionEndTime: Timestamp;
  commissionTotal: Decimal = ZERO;
  ownerProceedsPending: Decimal = ZERO;
  finalized = false;

  constructor(init: AuctionStateInit) {
    this.owner = init.owner;
    this.commissionRecipient = init.commissionRecipient;
    this.proceedsRecipient = init.proceedsRecipient;
    this.initialEndTime = init.startTime + init.durationSeconds;
    this.auctionEndTime = this.initialEndTime;
    this.extensionTime = init.extensionSeconds;
  }

  isEnded(now: Timestamp): boolean {
    return now >= this.auctionEndTime;
  }

  timeLeft(now: Timestamp): number {
    return this.isEnded(now) ? 0 : this.auctionEndTime - now;
  }

  phase(now: Timestamp): AuctionPhase {
    return { ended: this.isEnded(now), timeLeft: this.timeLeft(now) };
  }

  /** Moves the deadline forward; never backwards. Returns whether it moved. */
  pushDeadline(to: Timestamp): boolean {
    if (to <= this.auctionEndTime) return false;
    this.auctionEndTime = to;
    return true;
  }

  capture(): StateCheckpoint {
    return {
      highestBidder: this.highestBidder,
      highestBid: this.highestBid,
      auctionEndTime: this.auctionEndTime,
      commissionTotal: this.commissionTotal,
      ownerProceedsPending: this.ownerProceedsPending,
      finalized: this.finalized,
    };
  }

  restore(cp: StateCheckpoint): void {
    this.highestBidder = cp.highestBidder;
    this.highestBid = cp.highestBid;
    this.auctionEndTime = cp.auctionEndTime;
    this.commissionTotal = cp.commissionTotal;
    this.ownerProceedsPending = cp.ownerProceedsPending;
    this.finalized = cp.finalized;
  }

  snapshot(bidCount: number): AuctionSnapshot {
    return {
      owner: this.owner,
      commissionRecipient: this.commissionRecipient,
      proceedsRecipient: this.proceedsRecipient,
      highestBidder: this.highestBidder,
      highestBid: moneyToString(this.highestBid),
      initialEndTime: this.initialEndTime,
      auctionEndTime: this.auctionEndTime,
      extensionTime: this.extensionTime,
      commissionTotal: moneyToString(this.commissionTotal),
      ownerProceedsPending: moneyToString(this.ownerProceedsPending),
      finalized: this.finalized,
      bidCount,
    };
  }
}
