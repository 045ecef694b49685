import type { AuctionEvents } from './events';
import type { HistoryTracker } from './history';
import type { AuctionState } from './state';
import { isFailure, type AuctionResult } from './types';

/**
 * Call-boundary atomicity for the in-memory aggregate.
 *
 * A call that returns a failure or throws leaves state, history and staged
 * events as they were when it started. Calls made from inside a running one
 * (e.g. a ledger that calls back during a transfer) nest: they see the outer
 * call's writes, and if the outer call later fails their writes go too.
 * Unrelated calls never overlap here: the facade queues them.
 */
export class UnitOfWork {
  private depth = 0;

  constructor(
    private readonly state: AuctionState,
    private readonly history: HistoryTracker,
    private readonly events: AuctionEvents
  ) {}

  get active(): boolean {
    return this.depth > 0;
  }

  async run<T extends object>(work: () => Promise<AuctionResult<T>>): Promise<AuctionResult<T>> {
    const checkpoint = this.state.capture();
    const historySavepoint = this.history.savepoint();
    const eventsSavepoint = this.events.savepoint();

    const undo = () => {
      this.state.restore(checkpoint);
      this.history.rollbackTo(historySavepoint);
      this.events.rollbackTo(eventsSavepoint);
    };

    this.depth++;
    let res: AuctionResult<T>;
    try {
      res = await work();
    } catch (e) {
      undo();
      throw e;
    } finally {
      this.depth--;
    }

    if (isFailure(res)) {
      undo();
      return res;
    }

    if (this.depth === 0) {
      this.history.commit();
      this.events.publishStaged();
    }
    return res;
  }
}
