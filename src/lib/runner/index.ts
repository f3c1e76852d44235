import { systemWithCause } from '../errors/index.js';
import type { ErrorCause } from '../errors/index.js';
import { formatDuration } from '../duration/index.js';
import {
  applyEvent,
  createSession,
  getElapsedMs,
  initialEffects,
  isActive,
} from '../timer/index.js';
import type { FrameEffect, TimerEvent, TimerSession } from '../timer/index.js';
import {
  clearPausedBanner,
  drawRemaining,
  enterScreen,
  restoreScreen,
  showPausedBanner,
} from '../terminal/index.js';
import type { InputEvent, TerminalControl } from '../terminal/index.js';
import { AsyncQueue } from '../events/index.js';
import type { InputSource } from '../events/index.js';
import { DEFAULT_TIMER_OPTIONS } from './options.js';
import type { TimerDependencies, TimerOptions, TimerOutcome } from './types.js';

export { DEFAULT_TIMER_OPTIONS } from './options.js';
export type { TimerDependencies, TimerOptions, TimerOutcome } from './types.js';

const DEVELOPER_ADVICE = 'Try notifying the developer';

function toCause(err: unknown): ErrorCause {
  return err instanceof Error ? err : String(err);
}

/** An event from one of the sources, tagged with where it came from. */
type Ready =
  | { source: 'interrupt' }
  | { source: 'input'; event: InputEvent }
  | { source: 'tick' };

// ---------------------------------------------------------------------------
// Event mapping
// ---------------------------------------------------------------------------

/** Translate a terminal input event into a timer event. Unbound keys map to nothing. */
export function inputToTimerEvent(
  event: InputEvent,
  options: Pick<TimerOptions, 'pauseKeys' | 'quitKeys'> = DEFAULT_TIMER_OPTIONS,
): TimerEvent | undefined {
  switch (event.type) {
    case 'closed':
      return { type: 'input-closed' };
    case 'other':
      return undefined;
    case 'key':
      if (event.ctrl && event.code === 'c') return { type: 'quit' };
      if (event.ctrl || event.alt) return undefined;
      if (options.quitKeys.includes(event.code)) return { type: 'quit' };
      if (options.pauseKeys.includes(event.code)) return { type: 'toggle-pause' };
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function render(terminal: TerminalControl, session: TimerSession, effects: readonly FrameEffect[]) {
  for (const effect of effects) {
    switch (effect) {
      case 'draw-remaining':
        drawRemaining(terminal, session.remainingMs);
        break;
      case 'show-paused':
        showPausedBanner(terminal);
        break;
      case 'clear-paused':
        clearPausedBanner(terminal);
        break;
    }
  }
}

function guard<T>(title: string, action: () => T): T {
  try {
    return action();
  } catch (err) {
    throw systemWithCause(title, DEVELOPER_ADVICE, toCause(err));
  }
}

/** Outcome of a session that is no longer active. */
export function describeOutcome(session: TimerSession): TimerOutcome {
  const elapsedMs = getElapsedMs(session);
  const status = session.status === 'stopped' ? 'stopped' : 'finished';
  const message =
    status === 'stopped'
      ? `Timer stopped by user with ${formatDuration(session.remainingMs)} remaining ` +
        `(${formatDuration(elapsedMs)} elapsed).`
      : 'Timer finished!';
  return {
    status,
    initialMs: session.initialMs,
    remainingMs: session.remainingMs,
    elapsedMs,
    message,
  };
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

/**
 * Funnel the tick, input and interrupt sources into one queue. Each source is
 * re-armed as soon as it delivers, so nothing is dropped while the loop is
 * busy; events are handled in the order they became ready.
 */
function mergeSources(deps: TimerDependencies): AsyncQueue<Ready> {
  const { ticker, input, interrupt } = deps;
  const ready = new AsyncQueue<Ready>();

  const armTick = () => {
    if (ready.isClosed) return;
    void ticker.next().then(
      () => {
        ready.push({ source: 'tick' });
        armTick();
      },
      (err: unknown) => {
        ready.fail(
          systemWithCause('Failed to wait for the next tick', DEVELOPER_ADVICE, toCause(err)),
        );
      },
    );
  };

  const armInput = (source: InputSource) => {
    if (ready.isClosed) return;
    void source.next().then(
      (event) => {
        ready.push({ source: 'input', event });
        if (event.type !== 'closed') armInput(source);
      },
      (err: unknown) => {
        ready.fail(
          systemWithCause('Failed to read terminal events', DEVELOPER_ADVICE, toCause(err)),
        );
      },
    );
  };

  void interrupt.triggered.then(() => ready.push({ source: 'interrupt' }));
  if (input) armInput(input);
  armTick();

  return ready;
}

async function countDown(
  session: TimerSession,
  deps: TimerDependencies,
  options: TimerOptions,
): Promise<TimerSession> {
  const { terminal, ticker } = deps;

  guard('Failed to write to the terminal', () =>
    render(terminal, session, initialEffects(session)),
  );

  const ready = mergeSources(deps);
  try {
    while (isActive(session)) {
      const next = await ready.next();
      if (next.done) break;

      const { value } = next;
      let event: TimerEvent | undefined;
      switch (value.source) {
        case 'interrupt':
          event = { type: 'quit' };
          break;
        case 'input':
          event = inputToTimerEvent(value.event, options);
          break;
        case 'tick':
          event = { type: 'tick', periodMs: ticker.periodMs };
          break;
      }
      if (event === undefined) continue;

      const transition = applyEvent(session, event);
      session = transition.session;
      guard('Failed to write to the terminal', () =>
        render(terminal, session, transition.effects),
      );
    }
  } finally {
    ready.close();
  }

  return session;
}

function restoreAfterFailure(terminal: TerminalControl): void {
  try {
    restoreScreen(terminal);
  } catch (err) {
    console.warn('[runner] Failed to restore the terminal:', err);
  }
}

/**
 * Run a countdown of `durationMs` on the terminal until it finishes, the user
 * stops it, or terminal I/O fails. The terminal is restored on every path,
 * and the ticker, input and interrupt listeners are released.
 *
 * @throws {HumanError} a system error when the terminal cannot be used
 */
export async function runTimer(
  durationMs: number,
  deps: TimerDependencies,
  options: TimerOptions = DEFAULT_TIMER_OPTIONS,
): Promise<TimerOutcome> {
  const { terminal } = deps;
  try {
    let session = createSession(durationMs);
    try {
      guard('Failed to enter alternate screen', () => enterScreen(terminal));
      session = await countDown(session, deps, options);
    } catch (err) {
      restoreAfterFailure(terminal);
      throw err;
    }

    const outcome = describeOutcome(session);
    guard('Failed to restore the terminal', () => restoreScreen(terminal, outcome.message));
    return outcome;
  } finally {
    deps.ticker.stop();
    deps.input?.close();
    deps.interrupt.dispose();
  }
}
