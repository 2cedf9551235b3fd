import { describe, it, expect } from 'vitest';
import { AsyncMutex, AsyncSemaphore } from './AsyncSemaphore.js';

describe('AsyncSemaphore', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new AsyncSemaphore(0)).toThrow(RangeError);
    expect(() => new AsyncSemaphore(1.5)).toThrow(RangeError);
  });

  it('never runs more tasks than its capacity', async () => {
    const semaphore = new AsyncSemaphore(2);
    let running = 0;
    let peak = 0;

    const task = async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running -= 1;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.runExclusive(task)));

    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
  });

  it('hands slots to waiters in arrival order', async () => {
    const semaphore = new AsyncSemaphore(1);
    const order: number[] = [];

    const release = await semaphore.acquire();
    const first = semaphore.acquire().then((next) => {
      order.push(1);
      next();
    });
    const second = semaphore.acquire().then((next) => {
      order.push(2);
      next();
    });

    expect(semaphore.available).toBe(0);
    release();
    await Promise.all([first, second]);

    expect(order).toEqual([1, 2]);
    expect(semaphore.available).toBe(1);
  });

  it('ignores a second call to the same release', async () => {
    const semaphore = new AsyncSemaphore(2);
    const release = await semaphore.acquire();
    await semaphore.acquire();

    release();
    release();

    expect(semaphore.available).toBe(1);
  });

  it('removes an aborted waiter from the queue', async () => {
    const semaphore = new AsyncSemaphore(1);
    const release = await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort(new Error('cancelled'));

    await expect(waiting).rejects.toThrow('cancelled');

    // The slot goes back to the pool, not to the aborted waiter
    release();
    expect(semaphore.available).toBe(1);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const semaphore = new AsyncSemaphore(1);

    await expect(semaphore.acquire(AbortSignal.abort(new Error('stop')))).rejects.toThrow('stop');
    expect(semaphore.available).toBe(1);
  });
});

describe('AsyncMutex', () => {
  it('runs exclusive tasks one at a time in arrival order', async () => {
    const mutex = new AsyncMutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([mutex.runExclusive(task('a')), mutex.runExclusive(task('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.available).toBe(1);
  });

  it('releases the lock when the task throws', async () => {
    const mutex = new AsyncMutex();

    await expect(mutex.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(mutex.available).toBe(1);
  });
});
