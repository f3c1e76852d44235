import type { FrameEffect, TimerEvent, TimerSession, Transition } from './types.js';

export type { FrameEffect, TimerEvent, TimerSession, TimerStatus, Transition } from './types.js';

const NO_EFFECTS: readonly FrameEffect[] = [];

function unchanged(session: TimerSession): Transition {
  return { session, effects: NO_EFFECTS };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create a running session. A zero duration is finished from the start. */
export function createSession(durationMs: number): TimerSession {
  const initialMs = Math.max(0, durationMs);
  return {
    status: initialMs > 0 ? 'running' : 'finished',
    initialMs,
    remainingMs: initialMs,
    pausedMessageShown: false,
  };
}

/** What to draw when the session first appears on screen. */
export function initialEffects(session: TimerSession): readonly FrameEffect[] {
  return session.status === 'running' ? ['draw-remaining'] : NO_EFFECTS;
}

// ---------------------------------------------------------------------------
// State transitions
// ---------------------------------------------------------------------------

/**
 * Advance the countdown by one tick. Only a running session counts down; a
 * paused one re-shows its banner if it is not on screen yet.
 */
export function tick(session: TimerSession, periodMs: number): Transition {
  switch (session.status) {
    case 'running': {
      const remainingMs = Math.max(0, session.remainingMs - periodMs);
      if (remainingMs === 0) {
        return { session: { ...session, remainingMs, status: 'finished' }, effects: NO_EFFECTS };
      }
      return { session: { ...session, remainingMs }, effects: ['draw-remaining'] };
    }
    case 'paused':
      if (session.pausedMessageShown) return unchanged(session);
      return { session: { ...session, pausedMessageShown: true }, effects: ['show-paused'] };
    case 'finished':
    case 'stopped':
      return unchanged(session);
  }
}

/** Pause a running session or resume a paused one. `remainingMs` is untouched. */
export function togglePause(session: TimerSession): Transition {
  switch (session.status) {
    case 'running':
      return {
        session: { ...session, status: 'paused', pausedMessageShown: true },
        effects: ['show-paused'],
      };
    case 'paused':
      return {
        session: { ...session, status: 'running', pausedMessageShown: false },
        effects: session.pausedMessageShown ? ['clear-paused'] : NO_EFFECTS,
      };
    case 'finished':
    case 'stopped':
      return unchanged(session);
  }
}

/** Stop at the user's request. Only valid while running or paused. */
export function stopTimer(session: TimerSession): Transition {
  if (!isActive(session)) return unchanged(session);
  return { session: { ...session, status: 'stopped' }, effects: NO_EFFECTS };
}

/** The input stream ended. Treated as an ordinary finish. */
export function closeInput(session: TimerSession): Transition {
  if (!isActive(session)) return unchanged(session);
  return { session: { ...session, status: 'finished' }, effects: NO_EFFECTS };
}

/** Dispatch an event to the matching transition. */
export function applyEvent(session: TimerSession, event: TimerEvent): Transition {
  switch (event.type) {
    case 'tick':
      return tick(session, event.periodMs);
    case 'toggle-pause':
      return togglePause(session);
    case 'quit':
      return stopTimer(session);
    case 'input-closed':
      return closeInput(session);
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Whether the session still reacts to events. */
export function isActive(session: TimerSession): boolean {
  return session.status === 'running' || session.status === 'paused';
}

/** Time counted down so far. */
export function getElapsedMs(session: TimerSession): number {
  return session.initialMs - session.remainingMs;
}
