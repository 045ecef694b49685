import { describe, expect, it } from 'vitest';

import { ReentrantQueue, SerialQueue } from '../src/shared/serial';

describe('SerialQueue', () => {
  it('should run jobs in submission order and survive a failing one', async () => {
    const q = new SerialQueue();
    const order: number[] = [];
    const slow = q.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(1);
    });
    const failing = q.run(async () => {
      throw new Error('boom');
    });
    const fast = q.run(async () => {
      order.push(3);
    });

    await slow;
    await expect(failing).rejects.toThrow('boom');
    await fast;
    expect(order).toEqual([1, 3]);
    expect(q.size).toBe(0);
  });
});

describe('ReentrantQueue', () => {
  it('should run a call made from inside a job right away', async () => {
    const q = new ReentrantQueue();
    const res = await q.run(async () => q.run(async () => 'inner'));
    expect(res).toBe('inner');
  });

  it('should queue a call left behind by a finished job', async () => {
    const q = new ReentrantQueue();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    let late: Promise<void> = Promise.resolve();
    await q.run(async () => {
      late = new Promise<void>((resolve) => setTimeout(resolve, 0)).then(() =>
        q.run(async () => {
          order.push('late');
        })
      );
    });
    const second = q.run(async () => {
      await gate;
      order.push('second');
    });

    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(order).toEqual([]);

    release();
    await Promise.all([second, late]);
    expect(order).toEqual(['second', 'late']);
  });
});
