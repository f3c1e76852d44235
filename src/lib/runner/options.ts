import type { TimerOptions } from './types.js';

export const DEFAULT_TIMER_OPTIONS: TimerOptions = {
  tickPeriodMs: 1000,
  pauseKeys: ['space', 'p'],
  quitKeys: ['q', 'escape'],
};
