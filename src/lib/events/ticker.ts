import { AsyncQueue } from './queue.js';
import type { Ticker } from './types.js';

/** Start a ticker on `setInterval`. Ticks queue up if the consumer falls behind. */
export function startTicker(periodMs: number): Ticker {
  const queue = new AsyncQueue<number>();
  let count = 0;
  const handle = setInterval(() => {
    count += 1;
    queue.push(count);
  }, periodMs);

  return {
    periodMs,
    async next() {
      const result = await queue.next();
      // Only reachable after stop(); report the last tick.
      return result.done ? count : result.value;
    },
    stop() {
      clearInterval(handle);
      queue.close();
    },
  };
}
