import type { InputSource, InterruptSignal, Ticker } from '../events/index.js';
import type { TerminalControl } from '../terminal/index.js';

/** Behaviour knobs for a timer run. */
export interface TimerOptions {
  /** Period of the production ticker. */
  tickPeriodMs: number;
  /** Key codes that toggle pause. */
  pauseKeys: readonly string[];
  /** Key codes that stop the timer. Ctrl+C always does. */
  quitKeys: readonly string[];
}

/** Collaborators a run owns from start to finish and releases on every exit path. */
export interface TimerDependencies {
  terminal: TerminalControl;
  ticker: Ticker;
  /** Absent when stdin is not a terminal; then only ticks and signals drive the run. */
  input?: InputSource;
  interrupt: InterruptSignal;
}

/** How a run ended. Failures are thrown instead. */
export interface TimerOutcome {
  status: 'finished' | 'stopped';
  initialMs: number;
  remainingMs: number;
  elapsedMs: number;
  /** Printed on the primary screen once the terminal is restored. */
  message: string;
}
