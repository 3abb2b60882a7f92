import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { Mutex } from './mutex.js';

describe('Mutex', () => {
  it('never runs two sections at once', async () => {
    const mutex = new Mutex();
    let active = 0;
    let peak = 0;

    await Promise.all(
      [5, 1, 3].map((delay) =>
        mutex.runExclusive(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(delay);
          active--;
        }),
      ),
    );

    expect(peak).toBe(1);
    expect(mutex.isLocked).toBe(false);
  });

  it('serves waiters in arrival order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        mutex.runExclusive(async () => {
          await sleep(3 - n);
          order.push(n);
        }),
      ),
    );

    expect(order).toEqual([1, 2, 3]);
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
