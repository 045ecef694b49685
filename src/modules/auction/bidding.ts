import type Decimal from 'decimal.js';

import { toErrorMeta, type Logger } from '../../shared/log';
import { ZERO, gt, percentOf, toDecimal, toString as moneyToString, type MoneyValue } from '../../shared/money';
import type { ValueLedger } from '../ledger/types';
import { COMMISSION_PERCENT, MIN_INCREMENT_PERCENT, SNIPING_WINDOW_SEC } from './constants';
import type { AuctionEvents } from './events';
import type { HistoryTracker } from './history';
import type { AuctionState } from './state';
import type { UnitOfWork } from './unitOfWork';
import type { AuctionResult, Identity, PlaceBidOk, RefundOutcome, Timestamp } from './types';

export type AuctionComponents = {
  state: AuctionState;
  history: HistoryTracker;
  events: AuctionEvents;
  uow: UnitOfWork;
  ledger: ValueLedger;
  logger: Logger;
};

function parseAmount(amount: MoneyValue): Decimal | null {
  try {
    return toDecimal(amount);
  } catch {
    return null;
  }
}

/** Splits an overbid stake into what goes back to the bidder and what is kept. */
export function splitCommission(amount: Decimal): { commission: Decimal; remainder: Decimal } {
  const commission = percentOf(amount, COMMISSION_PERCENT);
  return { commission, remainder: amount.sub(commission) };
}

export class BiddingEngine {
  constructor(private readonly c: AuctionComponents) {}

  /** Smallest amount the next bid may carry; zero before the first bid. */
  minimumNextBid(): Decimal {
    const { highestBid } = this.c.state;
    return highestBid.add(percentOf(highestBid, MIN_INCREMENT_PERCENT));
  }

  async placeBid(sender: Identity, amount: MoneyValue, now: Timestamp): Promise<AuctionResult<PlaceBidOk>> {
    const { state, history, events, ledger, logger } = this.c;

    const value = parseAmount(amount);
    if (!value || !gt(value, ZERO)) {
      return { error: 'InvalidAmount', message: 'bid amount must be a positive number', details: { amount: String(amount) } };
    }

    if (state.isEnded(now)) {
      return {
        error: 'AuctionClosed',
        message: 'auction has ended, bids are no longer accepted',
        details: { auctionEndTime: state.auctionEndTime, now },
      };
    }

    const minimum = this.minimumNextBid();
    if (value.lt(minimum)) {
      return {
        error: 'InsufficientIncrement',
        message: `bid must be at least ${moneyToString(minimum)} (current high: ${moneyToString(state.highestBid)} + ${MIN_INCREMENT_PERCENT}%)`,
        details: { minimum: moneyToString(minimum), highestBid: moneyToString(state.highestBid) },
      };
    }

    return this.c.uow.run<PlaceBidOk>(async () => {
      const previousBidder = state.highestBidder;
      const previousAmount = state.highestBid;

      history.recordBid({ bidder: sender, amount: value });
      state.highestBidder = sender;
      state.highestBid = value;

      const extended = state.auctionEndTime - now < SNIPING_WINDOW_SEC
        ? state.pushDeadline(now + state.extensionTime)
        : false;

      let refunded: RefundOutcome | undefined;
      if (previousBidder !== null) {
        const { commission, remainder: refund } = splitCommission(previousAmount);
        state.commissionTotal = state.commissionTotal.add(commission);
        history.recordCommission(previousBidder, commission);
        history.recordRefund(previousBidder, refund);
        events.stage({ type: 'Refunded', bidder: previousBidder, amount: moneyToString(refund) }, now);
        refunded = { bidder: previousBidder, refund: moneyToString(refund), commission: moneyToString(commission) };
      }
      events.stage({ type: 'NewBid', bidder: sender, amount: moneyToString(value) }, now);

      // the refund is the only external effect and goes last
      if (refunded) {
        try {
          await ledger.transfer(refunded.bidder, toDecimal(refunded.refund));
        } catch (e) {
          logger.warn({ bidder: sender, refundTo: refunded.bidder, amount: refunded.refund, err: toErrorMeta(e) }, '[auction.bid] refund transfer failed');
          return {
            error: 'TransferFailed',
            message: `refund to ${refunded.bidder} failed`,
            details: { recipient: refunded.bidder, amount: refunded.refund },
          };
        }
      }

      logger.info({ bidder: sender, amount: moneyToString(value), auctionEndTime: state.auctionEndTime, extended }, '[auction.bid] accepted');

      const out: PlaceBidOk = {
        bidder: sender,
        amount: moneyToString(value),
        auctionEndTime: state.auctionEndTime,
        extended,
      };
      if (refunded) out.refunded = refunded;
      return out;
    });
  }
}
