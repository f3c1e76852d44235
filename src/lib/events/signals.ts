import type { InterruptSignal } from './types.js';

/** Anything that emits process signals; `process` in production. */
export interface SignalEmitter {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Resolve once any of `signals` arrives. The listeners stay installed until
 * `dispose()`, so a repeated signal cannot fall through to Node's default
 * exit while the terminal is still being restored.
 */
export function createInterruptSignal(
  emitter: SignalEmitter,
  signals: readonly NodeJS.Signals[] = INTERRUPT_SIGNALS,
): InterruptSignal {
  let onSignal: () => void = () => undefined;
  const triggered = new Promise<void>((resolve) => {
    onSignal = () => resolve();
  });

  for (const signal of signals) emitter.on(signal, onSignal);

  return {
    triggered,
    dispose() {
      for (const signal of signals) emitter.off(signal, onSignal);
    },
  };
}
