import type Decimal from 'decimal.js';

import { jsonLineLogger, type Logger } from '../../shared/log';
import { toString as moneyToString, type MoneyValue } from '../../shared/money';
import { ReentrantQueue } from '../../shared/serial';
import type { ValueLedger } from '../ledger/types';
import { BiddingEngine, type AuctionComponents } from './bidding';
import { ClaimsManager } from './claims';
import { MIN_DURATION_SEC, MIN_EXTENSION_SEC } from './constants';
import { AuctionEvents, type AuctionEvent, type AuctionEventListener } from './events';
import { HistoryTracker } from './history';
import { AuctionState } from './state';
import { UnitOfWork } from './unitOfWork';
import type {
  AuctionConfig,
  AuctionPhase,
  AuctionResult,
  AuctionSnapshot,
  Bid,
  ClaimOk,
  FinalizeOk,
  Identity,
  PlaceBidOk,
} from './types';

export class InvalidConfigurationError extends Error {
  readonly name = 'InvalidConfigurationError';

  constructor(readonly issues: string[]) {
    super(`invalid auction configuration: ${issues.join('; ')}`);
  }
}

export function validateAuctionConfig(config: AuctionConfig): string[] {
  const issues: string[] = [];
  const identities = {
    owner: config.owner,
    commissionRecipient: config.commissionRecipient,
    proceedsRecipient: config.proceedsRecipient,
  };
  for (const [field, value] of Object.entries(identities)) {
    if (typeof value !== 'string' || !value.trim()) issues.push(`${field} is required`);
  }
  if (!Number.isInteger(config.durationSeconds) || config.durationSeconds < MIN_DURATION_SEC) {
    issues.push(`durationSeconds must be an integer >= ${MIN_DURATION_SEC}`);
  }
  if (!Number.isInteger(config.extensionSeconds) || config.extensionSeconds < MIN_EXTENSION_SEC) {
    issues.push(`extensionSeconds must be an integer >= ${MIN_EXTENSION_SEC}`);
  }
  if (config.startTime !== undefined && (!Number.isInteger(config.startTime) || config.startTime < 0)) {
    issues.push('startTime must be a non-negative integer');
  }
  return issues;
}

export type SettlementAuctionOptions = {
  logger?: Logger;
};

/**
 * One auction from first bid to final payout. Time is read from the ledger on
 * every call; the deadline is evaluated lazily and nothing is scheduled here.
 *
 * Mutating calls run one at a time. A call made from inside a running one
 * (a ledger calling back during a transfer) is nested into it instead of
 * waiting, so it sees the running call's writes.
 */
export class SettlementAuction {
  private readonly state: AuctionState;
  private readonly history = new HistoryTracker();
  private readonly notifications: AuctionEvents;
  private readonly bidding: BiddingEngine;
  private readonly claims: ClaimsManager;
  private readonly calls = new ReentrantQueue();

  private constructor(
    config: AuctionConfig,
    private readonly ledger: ValueLedger,
    logger: Logger
  ) {
    this.state = new AuctionState({
      owner: config.owner,
      commissionRecipient: config.commissionRecipient,
      proceedsRecipient: config.proceedsRecipient,
      startTime: config.startTime ?? ledger.now(),
      durationSeconds: config.durationSeconds,
      extensionSeconds: config.extensionSeconds,
    });
    this.notifications = new AuctionEvents(logger);

    const components: AuctionComponents = {
      state: this.state,
      history: this.history,
      events: this.notifications,
      uow: new UnitOfWork(this.state, this.history, this.notifications),
      ledger,
      logger,
    };
    this.bidding = new BiddingEngine(components);
    this.claims = new ClaimsManager(components);
  }

  static create(config: AuctionConfig, ledger: ValueLedger, opts: SettlementAuctionOptions = {}): SettlementAuction {
    const issues = validateAuctionConfig(config);
    if (issues.length) throw new InvalidConfigurationError(issues);
    return new SettlementAuction(config, ledger, opts.logger ?? jsonLineLogger);
  }

  placeBid(sender: Identity, amount: MoneyValue): Promise<AuctionResult<PlaceBidOk>> {
    return this.calls.run(() => this.bidding.placeBid(sender, amount, this.ledger.now()));
  }

  finalize(): Promise<AuctionResult<FinalizeOk>> {
    return this.calls.run(() => this.claims.finalize(this.ledger.now()));
  }

  claimCommission(caller: Identity): Promise<AuctionResult<ClaimOk>> {
    return this.calls.run(() => this.claims.claimCommission(caller, this.ledger.now()));
  }

  claimProceeds(caller: Identity): Promise<AuctionResult<ClaimOk>> {
    return this.calls.run(() => this.claims.claimProceeds(caller, this.ledger.now()));
  }

  get owner(): Identity {
    return this.state.owner;
  }

  isEnded(): boolean {
    return this.state.isEnded(this.ledger.now());
  }

  timeLeft(): number {
    return this.state.timeLeft(this.ledger.now());
  }

  auctionState(): AuctionPhase {
    return this.state.phase(this.ledger.now());
  }

  snapshot(): AuctionSnapshot {
    return this.state.snapshot(this.history.bidCount());
  }

  minimumNextBid(): string {
    return moneyToString(this.bidding.minimumNextBid());
  }

  allBids(): Bid[] {
    return this.history.allBids();
  }

  bidHistory(id: Identity): Bid[] {
    return this.history.bidsOf(id);
  }

  refundHistory(id: Identity): Decimal[] {
    return this.history.refundsOf(id);
  }

  commissionHistory(id: Identity): Decimal[] {
    return this.history.commissionsOf(id);
  }

  allRefunds(): Decimal[] {
    return this.history.allRefunds();
  }

  allCommissions(): Decimal[] {
    return this.history.allCommissions();
  }

  events(sinceSeq?: number): AuctionEvent[] {
    return this.notifications.list(sinceSeq);
  }

  subscribe(listener: AuctionEventListener): () => void {
    return this.notifications.subscribe(listener);
  }
}
