/**
 * Async Lock Tests
 */

import { describe, it, expect } from 'vitest';
import { AsyncLock } from '../async-lock.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('AsyncLock', () => {
  describe('withLock', () => {
    it('should run critical sections one at a time in order', async () => {
      const lock = new AsyncLock();
      const order: string[] = [];

      const first = lock.withLock(async () => {
        order.push('a:start');
        await sleep(10);
        order.push('a:end');
        return 'a';
      });
      const second = lock.withLock(async () => {
        order.push('b:start');
        order.push('b:end');
        return 'b';
      });

      expect(await Promise.all([first, second])).toEqual(['a', 'b']);
      expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('should release lock even if function throws', async () => {
      const lock = new AsyncLock();

      await expect(
        lock.withLock(() => {
          throw new Error('critical section failed');
        })
      ).rejects.toThrow('critical section failed');

      expect(lock.isLocked).toBe(false);
      expect(await lock.withLock(() => 1)).toBe(1);
    });

    it('should report the holder and queued callers', async () => {
      const lock = new AsyncLock();
      let open: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });

      const held = lock.withLock(() => gate);
      const queued = lock.withLock(() => 'next');
      await sleep(0);

      expect(lock.isLocked).toBe(true);
      expect(lock.queueLength).toBe(1);

      open();
      await held;
      expect(await queued).toBe('next');
      expect(lock.isLocked).toBe(false);
      expect(lock.queueLength).toBe(0);
    });
  });
});
