import { describe, it, expect } from 'vitest';
import { AsyncLock } from './async-lock';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 1));

describe('AsyncLock', () => {
  it('should run holders one at a time in arrival order', async () => {
    const lock = new AsyncLock();
    const trace: string[] = [];

    const first = lock.runExclusive(async () => {
      trace.push('first:start');
      await tick();
      trace.push('first:end');
    });
    const second = lock.runExclusive(async () => {
      trace.push('second:start');
      await tick();
      trace.push('second:end');
    });

    await Promise.all([first, second]);

    expect(trace).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should release the lock when a holder fails', async () => {
    const lock = new AsyncLock();

    await expect(lock.runExclusive(async () => {
      throw new Error('holder failed');
    })).rejects.toThrow('holder failed');

    await expect(lock.runExclusive(() => 42)).resolves.toBe(42);
    await tick();
    expect(lock.isLocked()).toBe(false);
  });

  it('should report itself locked while work is queued', async () => {
    const lock = new AsyncLock();
    const pending = lock.runExclusive(tick);

    expect(lock.isLocked()).toBe(true);
    await pending;
    await tick();
    expect(lock.isLocked()).toBe(false);
  });
});
