import { describe, it, expect } from 'vitest';
import { Mutex } from '../../src/util/mutex';

describe('Mutex', () => {
  it('should acquire immediately when free', async () => {
    const mutex = new Mutex();

    await mutex.acquire();

    expect(mutex.getStats()).toEqual({ locked: true, waiting: 0 });
    mutex.release();
    expect(mutex.getStats()).toEqual({ locked: false, waiting: 0 });
  });

  it('should hand the lock to waiters in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    await mutex.acquire();
    const first = mutex.acquire().then(() => order.push('first'));
    const second = mutex.acquire().then(() => order.push('second'));
    expect(mutex.getStats()).toEqual({ locked: true, waiting: 2 });

    mutex.release();
    await first;
    expect(order).toEqual(['first']);
    expect(mutex.getStats()).toEqual({ locked: true, waiting: 1 });

    mutex.release();
    await second;
    expect(order).toEqual(['first', 'second']);

    mutex.release();
    expect(mutex.getStats().locked).toBe(false);
  });

  it('should not interleave read-modify-write sequences', async () => {
    const mutex = new Mutex();
    let counter = 0;

    const increment = () =>
      mutex.runExclusive(async () => {
        const current = counter;
        await new Promise(resolve => setTimeout(resolve, 1));
        counter = current + 1;
      });

    await Promise.all(Array.from({ length: 10 }, increment));

    expect(counter).toBe(10);
  });

  it('should release the lock when the critical section throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(mutex.getStats()).toEqual({ locked: false, waiting: 0 });
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });
});
