import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Runs async jobs strictly one after another, in submission order. A failed
 * job rejects its own promise and does not stop the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(job: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(job);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }
}

type JobScope = { running: boolean };

/**
 * A SerialQueue that lets a job call back into the queue. Calls made from
 * inside a running job (same async context) run immediately; any other call,
 * including one a finished job left behind, waits its turn.
 */
export class ReentrantQueue {
  private readonly queue = new SerialQueue();
  private readonly scope = new AsyncLocalStorage<JobScope>();

  get active(): boolean {
    return this.scope.getStore()?.running === true;
  }

  run<T>(job: () => Promise<T>): Promise<T> {
    if (this.active) return job();
    return this.queue.run(async () => {
      const current: JobScope = { running: true };
      try {
        return await this.scope.run(current, job);
      } finally {
        current.running = false;
      }
    });
  }
}
