import type Decimal from 'decimal.js';

import { toErrorMeta } from '../../shared/log';
import { ZERO, toString as moneyToString } from '../../shared/money';
import { splitCommission, type AuctionComponents } from './bidding';
import { isFailure, type AuctionFailure, type AuctionResult, type ClaimOk, type FinalizeOk, type Identity, type Timestamp } from './types';

export type ClaimKind = 'commission' | 'proceeds';

export class ClaimsManager {
  constructor(private readonly c: AuctionComponents) {}

  /**
   * Books the winner's commission and the owner's proceeds. Runs once; later
   * calls report the same outcome without touching state.
   */
  async finalize(now: Timestamp): Promise<AuctionResult<FinalizeOk>> {
    const { state, history, events, logger } = this.c;

    if (!state.isEnded(now)) return this.stillOpen(now);
    if (state.finalized) {
      return { winner: state.highestBidder, amount: moneyToString(state.highestBid), finalizedNow: false };
    }

    return this.c.uow.run<FinalizeOk>(async () => {
      state.finalized = true;
      const winner = state.highestBidder;
      if (winner !== null) {
        const { commission, remainder } = splitCommission(state.highestBid);
        state.commissionTotal = state.commissionTotal.add(commission);
        history.recordCommission(winner, commission);
        state.ownerProceedsPending = remainder;
      }
      const amount = moneyToString(state.highestBid);
      events.stage({ type: 'AuctionEnded', winner, amount }, now);
      logger.info(
        {
          winner,
          amount,
          commissionTotal: moneyToString(state.commissionTotal),
          ownerProceedsPending: moneyToString(state.ownerProceedsPending),
        },
        '[auction.finalize] auction ended'
      );
      return { winner, amount, finalizedNow: true };
    });
  }

  claimCommission(caller: Identity, now: Timestamp): Promise<AuctionResult<ClaimOk>> {
    return this.claim('commission', caller, now);
  }

  claimProceeds(caller: Identity, now: Timestamp): Promise<AuctionResult<ClaimOk>> {
    return this.claim('proceeds', caller, now);
  }

  private async claim(kind: ClaimKind, caller: Identity, now: Timestamp): Promise<AuctionResult<ClaimOk>> {
    const { state, events, ledger, logger } = this.c;

    if (caller !== state.owner) {
      return { error: 'Unauthorized', message: `only the auction owner may claim ${kind}`, details: { caller } };
    }
    if (!state.isEnded(now)) return this.stillOpen(now);

    const fin = await this.finalize(now);
    if (isFailure(fin)) return fin;

    return this.c.uow.run<ClaimOk>(async () => {
      const recipient = kind === 'commission' ? state.commissionRecipient : state.proceedsRecipient;
      const amount: Decimal = kind === 'commission' ? state.commissionTotal : state.ownerProceedsPending;
      if (amount.isZero()) {
        return { error: 'NothingToClaim', message: `no ${kind} left to claim`, details: { kind } };
      }

      // zeroed before paying out, so a call re-entering from the transfer sees nothing to claim
      if (kind === 'commission') state.commissionTotal = ZERO;
      else state.ownerProceedsPending = ZERO;

      const paid = moneyToString(amount);
      events.stage(
        kind === 'commission'
          ? { type: 'CommissionClaimed', recipient, amount: paid }
          : { type: 'ProceedsTransferred', recipient, amount: paid },
        now
      );

      try {
        await ledger.transfer(recipient, amount);
      } catch (e) {
        logger.warn({ kind, recipient, amount: paid, err: toErrorMeta(e) }, '[auction.claim] payout transfer failed');
        return { error: 'TransferFailed', message: `${kind} transfer to ${recipient} failed`, details: { recipient, amount: paid } };
      }

      logger.info({ kind, recipient, amount: paid }, '[auction.claim] paid out');
      return { recipient, amount: paid };
    });
  }

  private stillOpen(now: Timestamp): AuctionFailure {
    const { state } = this.c;
    return {
      error: 'AuctionStillOpen',
      message: 'auction is still open',
      details: { auctionEndTime: state.auctionEndTime, timeLeft: state.timeLeft(now) },
    };
  }
}
