import { describe, it, expect } from 'vitest';
import { AsyncQueue } from '../queue.js';

describe('AsyncQueue', () => {
  it('delivers values pushed before the read', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    queue.push('b');
    expect(queue.size).toBe(2);
    await expect(queue.next()).resolves.toEqual({ done: false, value: 'a' });
    await expect(queue.next()).resolves.toEqual({ done: false, value: 'b' });
  });

  it('wakes a waiting reader', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();
    queue.push(7);
    await expect(pending).resolves.toEqual({ done: false, value: 7 });
    expect(queue.size).toBe(0);
  });

  it('serves waiting readers in order', async () => {
    const queue = new AsyncQueue<number>();
    const first = queue.next();
    const second = queue.next();
    queue.push(1);
    queue.push(2);
    await expect(first).resolves.toEqual({ done: false, value: 1 });
    await expect(second).resolves.toEqual({ done: false, value: 2 });
  });

  it('drains buffered values before reporting the end', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.close();
    expect(queue.isClosed).toBe(true);
    await expect(queue.next()).resolves.toEqual({ done: false, value: 1 });
    await expect(queue.next()).resolves.toEqual({ done: true });
  });

  it('ends waiting readers on close', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();
    queue.close();
    await expect(pending).resolves.toEqual({ done: true });
  });

  it('ignores pushes after close', async () => {
    const queue = new AsyncQueue<number>();
    queue.close();
    queue.push(1);
    expect(queue.size).toBe(0);
    await expect(queue.next()).resolves.toEqual({ done: true });
  });

  it('rejects pending and later reads after a failure', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();
    const error = new Error('EIO');
    queue.fail(error);
    await expect(pending).rejects.toBe(error);
    await expect(queue.next()).rejects.toBe(error);
  });
});
