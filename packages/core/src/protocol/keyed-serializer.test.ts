import { describe, expect, it } from 'vitest';
import { KeyedSerializer } from './keyed-serializer.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedSerializer', () => {
  it('should run tasks for one key in submission order', async () => {
    const serializer = new KeyedSerializer();
    const order: string[] = [];
    const gate = deferred();

    const first = serializer.run('a', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = serializer.run('a', async () => {
      order.push('second');
    });

    expect(serializer.depth('a')).toBe(2);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(serializer.depth('a')).toBe(0);
    expect(serializer.size).toBe(0);
  });

  it('should not hold other keys behind a slow task', async () => {
    const serializer = new KeyedSerializer();
    const order: string[] = [];
    const gate = deferred();

    const slow = serializer.run('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await serializer.run('b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await slow;
    expect(order).toEqual(['b', 'a']);
  });

  it('should keep going after a failed task', async () => {
    const serializer = new KeyedSerializer();
    const failed = serializer.run('a', async () => {
      throw new Error('boom');
    });
    const next = serializer.run('a', async () => {});

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBeUndefined();
  });

  it('should report idleness per key', async () => {
    const serializer = new KeyedSerializer();
    let done = false;
    void serializer.run('a', async () => {
      done = true;
    });

    await serializer.whenIdle('a');
    expect(done).toBe(true);
  });
});
