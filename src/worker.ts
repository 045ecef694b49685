import { toErrorMeta, type Logger } from './shared/log';
import type { AuctionService } from './modules/auction/service';

export type FinalizeWorkerOptions = {
  intervalMs: number;
  logger: Logger;
};

export type FinalizeWorker = {
  tick: () => Promise<void>;
  stop: () => void;
};

/**
 * Polls the auction and finalizes it once the deadline has passed, so the
 * AuctionEnded notification goes out without waiting for the first claim.
 */
export function startFinalizeWorker(service: AuctionService, opts: FinalizeWorkerOptions): FinalizeWorker {
  const { logger } = opts;
  let inFlight = false;
  let done = false;

  const tick = async () => {
    if (inFlight || done) return;
    inFlight = true;
    try {
      const res = await service.finalizeIfDue();
      if (res) {
        done = true;
        logger.info({ winner: res.winner, amount: res.amount }, '[finalize-worker] auction finalized');
        stop();
      } else if (service.view().finalized) {
        done = true;
        stop();
      }
    } catch (e) {
      logger.error({ err: toErrorMeta(e) }, '[finalize-worker] tick failed');
    } finally {
      inFlight = false;
    }
  };

  const timer: NodeJS.Timeout = setInterval(() => {
    void tick();
  }, opts.intervalMs);
  timer.unref();

  function stop(): void {
    clearInterval(timer);
  }

  logger.info({ intervalMs: opts.intervalMs }, '[finalize-worker] started');
  return { tick, stop };
}
