import { describe, it, expect } from 'vitest';
import { StreamQueue } from '../../../src/sinks/stream-queue.js';
import { createDeferred } from '../../fixtures/fake-event-store.js';

describe('StreamQueue', () => {
  it('should run tasks of one key in enqueue order', async () => {
    const queue = new StreamQueue();
    const order: string[] = [];
    const hold = createDeferred();

    const first = queue.enqueue('a', async () => {
      await hold.promise;
      order.push('first');
    });
    const second = queue.enqueue('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual([]);

    hold.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('should not block other keys', async () => {
    const queue = new StreamQueue();
    const hold = createDeferred();
    const order: string[] = [];

    const slow = queue.enqueue('a', async () => {
      await hold.promise;
      order.push('a');
    });
    await queue.enqueue('b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    hold.resolve();
    await slow;
    expect(order).toEqual(['b', 'a']);
  });

  it('should keep going after a failed task', async () => {
    const queue = new StreamQueue();

    const failed = queue.enqueue('a', async () => {
      throw new Error('boom');
    });
    const next = queue.enqueue('a', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should forget keys once their tasks settle', async () => {
    const queue = new StreamQueue();
    const hold = createDeferred();

    const task = queue.enqueue('a', () => hold.promise);
    expect(queue.activeKeys).toBe(1);

    hold.resolve();
    await task;
    await queue.drain();
    await Promise.resolve();
    expect(queue.activeKeys).toBe(0);
  });

  it('should drain every enqueued task, failed ones included', async () => {
    const queue = new StreamQueue();
    const done: string[] = [];

    const failed = queue.enqueue('a', async () => {
      throw new Error('boom');
    });
    const ok = queue.enqueue('b', async () => {
      done.push('b');
    });

    await queue.drain();
    expect(done).toEqual(['b']);
    await expect(failed).rejects.toThrow('boom');
    await ok;
  });
});
