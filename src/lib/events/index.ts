export type { InputSource, InterruptSignal, QueueResult, Ticker } from './types.js';
export { AsyncQueue } from './queue.js';
export { startTicker } from './ticker.js';
export { createKeySource } from './keyboard.js';
export { INTERRUPT_SIGNALS, createInterruptSignal } from './signals.js';
export type { SignalEmitter } from './signals.js';
