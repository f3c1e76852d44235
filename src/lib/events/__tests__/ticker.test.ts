import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { startTicker } from '../ticker.js';

describe('startTicker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ticks once per period', async () => {
    const ticker = startTicker(1000);
    const first = ticker.next();
    vi.advanceTimersByTime(1000);
    await expect(first).resolves.toBe(1);
    ticker.stop();
  });

  it('does not tick before the first period', async () => {
    const ticker = startTicker(1000);
    let fired = false;
    const first = ticker.next().then(() => {
      fired = true;
    });
    vi.advanceTimersByTime(999);
    await Promise.resolve();
    expect(fired).toBe(false);
    vi.advanceTimersByTime(1);
    await first;
    expect(fired).toBe(true);
    ticker.stop();
  });

  it('queues ticks instead of skipping them', async () => {
    const ticker = startTicker(1000);
    vi.advanceTimersByTime(3000);
    await expect(ticker.next()).resolves.toBe(1);
    await expect(ticker.next()).resolves.toBe(2);
    await expect(ticker.next()).resolves.toBe(3);
    ticker.stop();
  });

  it('stops ticking and releases a waiting reader', async () => {
    const ticker = startTicker(1000);
    vi.advanceTimersByTime(1000);
    await ticker.next();
    const pending = ticker.next();
    ticker.stop();
    vi.advanceTimersByTime(5000);
    await expect(pending).resolves.toBe(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('exposes its period', () => {
    const ticker = startTicker(250);
    expect(ticker.periodMs).toBe(250);
    ticker.stop();
  });
});
