import type { InputEvent } from '../terminal/index.js';

/** Outcome of waiting on a queue: a value, or the end of the stream. */
export type QueueResult<T> = { done: false; value: T } | { done: true };

/** Fixed-period tick producer. Every period yields exactly one tick. */
export interface Ticker {
  readonly periodMs: number;
  /** Resolves with the tick's sequence number, starting at 1. */
  next(): Promise<number>;
  stop(): void;
}

/** Keyboard events from the terminal. Resolves `{ type: 'closed' }` once the stream ends. */
export interface InputSource {
  next(): Promise<InputEvent>;
  close(): void;
}

/** Raised at most once, when the process is asked to stop. */
export interface InterruptSignal {
  readonly triggered: Promise<void>;
  dispose(): void;
}
