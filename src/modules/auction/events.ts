import { toErrorMeta, type Logger } from '../../shared/log';
import type { Identity, Timestamp } from './types';

export type AuctionEventPayload =
  | { type: 'NewBid'; bidder: Identity; amount: string }
  | { type: 'Refunded'; bidder: Identity; amount: string }
  | { type: 'AuctionEnded'; winner: Identity | null; amount: string }
  | { type: 'CommissionClaimed'; recipient: Identity; amount: string }
  | { type: 'ProceedsTransferred'; recipient: Identity; amount: string };

export type AuctionEventType = AuctionEventPayload['type'];

export type AuctionEvent = AuctionEventPayload & {
  seq: number;
  at: Timestamp;
};

export type AuctionEventListener = (event: AuctionEvent) => void;

type StagedEvent = { payload: AuctionEventPayload; at: Timestamp };

/**
 * Notification log. Events are staged while a call runs and only become
 * visible (and reach subscribers) once the outermost call commits.
 */
export class AuctionEvents {
  private readonly published: AuctionEvent[] = [];
  private staged: StagedEvent[] = [];
  private readonly listeners = new Set<AuctionEventListener>();

  constructor(private readonly logger: Logger) {}

  stage(payload: AuctionEventPayload, at: Timestamp): void {
    this.staged.push({ payload, at });
  }

  savepoint(): number {
    return this.staged.length;
  }

  rollbackTo(savepoint: number): void {
    this.staged = this.staged.slice(0, savepoint);
  }

  publishStaged(): void {
    const batch = this.staged;
    this.staged = [];
    for (const { payload, at } of batch) {
      const event: AuctionEvent = { ...payload, seq: this.published.length + 1, at };
      this.published.push(event);
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (e) {
          this.logger.error({ event: event.type, seq: event.seq, err: toErrorMeta(e) }, '[auction.events] listener failed');
        }
      }
    }
  }

  /** Published events with `seq` greater than `sinceSeq`. */
  list(sinceSeq = 0): AuctionEvent[] {
    return this.published.filter((e) => e.seq > sinceSeq);
  }

  subscribe(listener: AuctionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
