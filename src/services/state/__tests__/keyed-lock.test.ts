import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../keyed-lock.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedLock', () => {
  it('runs sections for one key in arrival order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const slow = lock.run('pr#1', async () => {
      events.push('a:start');
      await tick();
      events.push('a:end');
    });
    const fast = lock.run('pr#1', async () => {
      events.push('b');
    });
    await Promise.all([slow, fast]);

    expect(events).toEqual(['a:start', 'a:end', 'b']);
  });

  it('does not serialize different keys', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const first = lock.run('pr#1', async () => {
      events.push('one:start');
      await tick();
      events.push('one:end');
    });
    const second = lock.run('pr#2', async () => {
      events.push('two');
    });
    await Promise.all([first, second]);

    expect(events).toEqual(['one:start', 'two', 'one:end']);
  });

  it('releases the key when a section throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('pr#1', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(lock.run('pr#1', async () => 'next')).resolves.toBe('next');
  });
});
