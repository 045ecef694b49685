import type Decimal from 'decimal.js';

import type { Bid, Identity } from './types';

function appendTo<T>(map: Map<Identity, T[]>, id: Identity, value: T): () => void {
  let list = map.get(id);
  const created = !list;
  if (!list) {
    list = [];
    map.set(id, list);
  }
  list.push(value);
  const target = list;
  return () => {
    target.pop();
    if (created) map.delete(id);
  };
}

/**
 * Append-only logs of bids, refunds and commissions.
 *
 * Queries hand out copies. Entries are never edited; the only removal path is
 * `rollbackTo`, which the unit of work uses to discard what a failing call
 * appended before it committed.
 */
export class HistoryTracker {
  private readonly bids: Bid[] = [];
  private readonly bidsByParticipant = new Map<Identity, Bid[]>();
  private readonly refundsByParticipant = new Map<Identity, Decimal[]>();
  private readonly commissionsByParticipant = new Map<Identity, Decimal[]>();

  // undo steps for appends not yet committed, oldest first
  private journal: Array<() => void> = [];

  recordBid(bid: Bid): void {
    const frozen: Bid = Object.freeze({ bidder: bid.bidder, amount: bid.amount });
    this.bids.push(frozen);
    const undoParticipant = appendTo(this.bidsByParticipant, frozen.bidder, frozen);
    this.journal.push(() => {
      this.bids.pop();
      undoParticipant();
    });
  }

  recordRefund(id: Identity, amount: Decimal): void {
    this.journal.push(appendTo(this.refundsByParticipant, id, amount));
  }

  recordCommission(id: Identity, amount: Decimal): void {
    this.journal.push(appendTo(this.commissionsByParticipant, id, amount));
  }

  allBids(): Bid[] {
    return [...this.bids];
  }

  bidCount(): number {
    return this.bids.length;
  }

  lastBid(): Bid | null {
    return this.bids[this.bids.length - 1] ?? null;
  }

  bidsOf(id: Identity): Bid[] {
    return [...(this.bidsByParticipant.get(id) ?? [])];
  }

  refundsOf(id: Identity): Decimal[] {
    return [...(this.refundsByParticipant.get(id) ?? [])];
  }

  commissionsOf(id: Identity): Decimal[] {
    return [...(this.commissionsByParticipant.get(id) ?? [])];
  }

  allRefunds(): Decimal[] {
    return [...this.refundsByParticipant.values()].flat();
  }

  allCommissions(): Decimal[] {
    return [...this.commissionsByParticipant.values()].flat();
  }

  savepoint(): number {
    return this.journal.length;
  }

  rollbackTo(savepoint: number): void {
    while (this.journal.length > savepoint) {
      const undo = this.journal.pop();
      if (undo) undo();
    }
  }

  commit(): void {
    this.journal = [];
  }
}
