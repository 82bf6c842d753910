import { describe, it, expect } from 'vitest';
import { Mutex } from '../../src/utils/mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Mutex', () => {
  it('should grant the lock immediately when free', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();

    expect(mutex.isLocked()).toBe(true);
    release();
    expect(mutex.isLocked()).toBe(false);
  });

  it('should serve waiters in FIFO order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    const release = await mutex.acquire();
    const waiters = [1, 2, 3].map((n) =>
      mutex.runExclusive(() => {
        order.push(n);
      })
    );
    expect(mutex.getQueueLength()).toBe(3);

    release();
    await Promise.all(waiters);

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked()).toBe(false);
  });

  it('should never run two critical sections at once', async () => {
    const mutex = new Mutex();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 5 }, () =>
        mutex.runExclusive(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await delay(5);
          active--;
        })
      )
    );

    expect(maxActive).toBe(1);
  });

  it('should release the lock when the function throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked()).toBe(false);
  });

  it('should ignore a second release', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const next = mutex.acquire();

    release();
    release();
    const releaseNext = await next;

    expect(mutex.isLocked()).toBe(true);
    releaseNext();
    expect(mutex.isLocked()).toBe(false);
  });
});
