import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../concurrency/index.js';

const deferred = (): { promise: Promise<void>; resolve: () => void } => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('KeyedLock', () => {
  it('runs operations on the same key in call order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('slack', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.run('slack', async () => {
      order.push('second');
    });

    expect(lock.isLocked('slack')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run('slack', async () => {
      await gate.promise;
      order.push('slack');
    });
    await lock.run('hubspot', async () => {
      order.push('hubspot');
    });

    expect(order).toEqual(['hubspot']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['hubspot', 'slack']);
  });

  it('continues after a rejected operation', async () => {
    const lock = new KeyedLock();

    const failing = lock.run('zendesk', async () => {
      throw new Error('boom');
    });
    const next = lock.run('zendesk', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('releases the key once idle', async () => {
    const lock = new KeyedLock();

    await lock.run('calendly', async () => 1);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(lock.isLocked('calendly')).toBe(false);
  });
});
