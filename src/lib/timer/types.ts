/** Possible timer statuses. `finished` and `stopped` are terminal. */
export type TimerStatus = 'running' | 'paused' | 'finished' | 'stopped';

/** Countdown state for one run of the timer. Durations are milliseconds. */
export interface TimerSession {
  status: TimerStatus;
  /** Duration the timer was started with. Never changes. */
  initialMs: number;
  remainingMs: number;
  /** Whether the paused banner is currently on screen. */
  pausedMessageShown: boolean;
}

/** Events that can be dispatched to the timer state machine. */
export type TimerEvent =
  | { type: 'tick'; periodMs: number }
  | { type: 'toggle-pause' }
  | { type: 'quit' }
  | { type: 'input-closed' };

/** Screen updates a transition asks for. */
export type FrameEffect = 'draw-remaining' | 'show-paused' | 'clear-paused';

/** Result of applying one event. */
export interface Transition {
  session: TimerSession;
  effects: readonly FrameEffect[];
}
