import type Decimal from 'decimal.js';

/** Opaque participant identity, compared by value. */
export type Identity = string;

/** Unix time in whole seconds. */
export type Timestamp = number;

export type Bid = Readonly<{
  bidder: Identity;
  amount: Decimal;
}>;

export type AuctionConfig = {
  owner: Identity;
  commissionRecipient: Identity;
  proceedsRecipient: Identity;
  durationSeconds: number;
  extensionSeconds: number;
  /** Defaults to the ledger clock at creation. */
  startTime?: Timestamp;
};

export type AuctionErrorCode =
  | 'InvalidAmount'
  | 'AuctionClosed'
  | 'AuctionStillOpen'
  | 'InsufficientIncrement'
  | 'Unauthorized'
  | 'TransferFailed'
  | 'NothingToClaim';

export type AuctionFailure = {
  error: AuctionErrorCode;
  message: string;
  details?: unknown;
};

export type AuctionResult<T> = T | AuctionFailure;

export function isFailure<T extends object>(res: AuctionResult<T>): res is AuctionFailure {
  return 'error' in res;
}

export type RefundOutcome = {
  bidder: Identity;
  refund: string;
  commission: string;
};

export type PlaceBidOk = {
  bidder: Identity;
  amount: string;
  auctionEndTime: Timestamp;
  extended: boolean;
  refunded?: RefundOutcome;
};

export type FinalizeOk = {
  winner: Identity | null;
  amount: string;
  /** false when an earlier call already finalized */
  finalizedNow: boolean;
};

export type ClaimOk = {
  recipient: Identity;
  amount: string;
};

export type AuctionPhase = {
  ended: boolean;
  timeLeft: number;
};

export type AuctionSnapshot = {
  owner: Identity;
  commissionRecipient: Identity;
  proceedsRecipient: Identity;
  highestBidder: Identity | null;
  highestBid: string;
  initialEndTime: Timestamp;
  auctionEndTime: Timestamp;
  extensionTime: number;
  commissionTotal: string;
  ownerProceedsPending: string;
  finalized: boolean;
  bidCount: number;
};
