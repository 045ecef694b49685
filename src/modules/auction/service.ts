import type Decimal from 'decimal.js';

import { toErrorMeta, type Logger } from '../../shared/log';
import { bidsTotal, claimsTotal } from '../../shared/metrics';
import { ZERO, gt, toDecimal, toString as moneyToString } from '../../shared/money';
import { SerialQueue } from '../../shared/serial';
import { InsufficientFundsError, type EscrowLedger, type LedgerAccountView } from '../ledger/types';
import type { SettlementAuction } from './auction';
import type { AuctionEvent } from './events';
import type { ClaimKind } from './claims';
import {
  isFailure,
  type AuctionErrorCode,
  type AuctionFailure,
  type AuctionPhase,
  type AuctionSnapshot,
  type Bid,
  type ClaimOk,
  type FinalizeOk,
  type Identity,
  type PlaceBidOk,
} from './types';

export type ApiError = {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
};

export type AuctionView = AuctionSnapshot &
  AuctionPhase & {
    currency: string;
    minimumNextBid: string;
  };

export type BidView = { bidder: Identity; amount: string };

export type ParticipantView = {
  participantId: Identity;
  bids: BidView[];
  refunds: string[];
  commissions: string[];
};

const STATUS_BY_CODE: Record<AuctionErrorCode, number> = {
  InvalidAmount: 400,
  Unauthorized: 403,
  InsufficientIncrement: 422,
  AuctionClosed: 409,
  AuctionStillOpen: 409,
  NothingToClaim: 409,
  TransferFailed: 502,
};

export function toApiError(f: AuctionFailure): ApiError {
  const out: ApiError = { statusCode: STATUS_BY_CODE[f.error], error: f.error, message: f.message };
  if (f.details !== undefined) out.details = f.details;
  return out;
}

function toBidView(bid: Bid): BidView {
  return { bidder: bid.bidder, amount: moneyToString(bid.amount) };
}

function parsePositive(amount: string | number): Decimal | null {
  try {
    const value = toDecimal(amount);
    return gt(value, ZERO) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Puts one auction behind the ledger that actually holds the money.
 *
 * Calls are serialised: the engine's atomicity covers a single call, and the
 * ledger is asynchronous, so two requests must never be in flight at once.
 */
export class AuctionService {
  private readonly queue = new SerialQueue();

  constructor(
    readonly auction: SettlementAuction,
    readonly ledger: EscrowLedger,
    private readonly logger: Logger
  ) {}

  /**
   * Moves the stake into escrow, then places the bid. A rejected bid gets its
   * stake sent back.
   */
  placeBid(participantId: Identity, amount: string | number): Promise<PlaceBidOk | ApiError> {
    return this.queue.run(async () => {
      // collecting from escrow into itself would bring no value in
      if (participantId === this.ledger.escrowId) {
        bidsTotal.labels('rejected', 'Unauthorized').inc();
        return { statusCode: 403, error: 'Unauthorized', message: 'the escrow account cannot place bids' };
      }

      const value = parsePositive(amount);
      if (!value) {
        bidsTotal.labels('rejected', 'InvalidAmount').inc();
        return { statusCode: 400, error: 'InvalidAmount', message: 'bid amount must be a positive number' };
      }

      try {
        await this.ledger.collect(participantId, value);
      } catch (e) {
        if (e instanceof InsufficientFundsError) {
          bidsTotal.labels('rejected', 'insufficient_funds').inc();
          return { statusCode: 402, error: 'PaymentRequired', message: e.message };
        }
        this.logger.error({ participantId, amount: moneyToString(value), err: toErrorMeta(e) }, '[auction.service] stake collection failed');
        bidsTotal.labels('rejected', 'TransferFailed').inc();
        return { statusCode: 502, error: 'TransferFailed', message: 'could not collect the bid amount' };
      }

      const res = await this.auction.placeBid(participantId, value);
      if (!isFailure(res)) {
        bidsTotal.labels('accepted', 'none').inc();
        return res;
      }

      bidsTotal.labels('rejected', res.error).inc();
      const apiErr = toApiError(res);
      try {
        await this.ledger.transfer(participantId, value);
      } catch (e) {
        this.logger.error(
          { participantId, amount: moneyToString(value), reason: res.error, err: toErrorMeta(e) },
          '[auction.service] returning stake of rejected bid failed'
        );
        return { ...apiErr, details: { reason: res.details, stakeReturned: false } };
      }
      return apiErr;
    });
  }

  finalize(): Promise<FinalizeOk | ApiError> {
    return this.queue.run(async () => {
      const res = await this.auction.finalize();
      return isFailure(res) ? toApiError(res) : res;
    });
  }

  /** Finalizes once the deadline has passed; a no-op otherwise. */
  finalizeIfDue(): Promise<FinalizeOk | null> {
    return this.queue.run(async () => {
      if (!this.auction.isEnded() || this.auction.snapshot().finalized) return null;
      const res = await this.auction.finalize();
      return isFailure(res) ? null : res;
    });
  }

  claim(kind: ClaimKind, caller: Identity): Promise<ClaimOk | ApiError> {
    return this.queue.run(async () => {
      const res = kind === 'commission'
        ? await this.auction.claimCommission(caller)
        : await this.auction.claimProceeds(caller);
      if (isFailure(res)) {
        claimsTotal.labels(kind, 'rejected', res.error).inc();
        return toApiError(res);
      }
      claimsTotal.labels(kind, 'paid', 'none').inc();
      return res;
    });
  }

  view(): AuctionView {
    const phase = this.auction.auctionState();
    return {
      ...this.auction.snapshot(),
      ...phase,
      currency: this.ledger.currency,
      minimumNextBid: this.auction.minimumNextBid(),
    };
  }

  bids(): BidView[] {
    return this.auction.allBids().map(toBidView);
  }

  participant(participantId: Identity): ParticipantView {
    return {
      participantId,
      bids: this.auction.bidHistory(participantId).map(toBidView),
      refunds: this.auction.refundHistory(participantId).map((d) => moneyToString(d)),
      commissions: this.auction.commissionHistory(participantId).map((d) => moneyToString(d)),
    };
  }

  events(sinceSeq?: number): AuctionEvent[] {
    return this.auction.events(sinceSeq);
  }

  getAccount(subjectId: Identity): Promise<LedgerAccountView | null> {
    return this.ledger.getAccount(subjectId);
  }

  async deposit(subjectId: Identity, amount: string | number, txId?: string): Promise<LedgerAccountView | ApiError> {
    const value = parsePositive(amount);
    if (!value) return { statusCode: 400, error: 'BadRequest', message: 'amount must be a positive number' };
    return this.ledger.deposit(subjectId, value, txId);
  }
}
