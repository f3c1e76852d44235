import { formatDuration } from '../duration/index.js';
import type { TerminalControl } from './types.js';

export const PAUSED_STATUS = 'PAUSED';
export const PAUSED_HELP = 'Press space or p to resume, q to quit';

const STATUS_ROW = 1;
const HELP_ROW = 2;

/** The line shown at the top of the timer screen. */
export function remainingLine(remainingMs: number): string {
  return `Remaining time: ${formatDuration(remainingMs)}`;
}

/** Switch to the timer screen: alternate buffer, hidden cursor, raw input. */
export function enterScreen(terminal: TerminalControl): void {
  terminal.enterAlternateScreen();
  terminal.hideCursor();
  terminal.moveTo(0, 0);
  terminal.flush();
  terminal.enableRawMode();
}

/**
 * Undo `enterScreen`, then print `message` on the primary screen. Every step
 * is attempted even if an earlier one fails; the first failure is rethrown.
 */
export function restoreScreen(terminal: TerminalControl, message?: string): void {
  let failure: unknown;
  let failed = false;

  try {
    terminal.disableRawMode();
  } catch (err) {
    failure = err;
    failed = true;
  }

  try {
    terminal.showCursor();
    terminal.leaveAlternateScreen();
    if (message !== undefined) terminal.print(`${message}\n`);
    terminal.flush();
  } catch (err) {
    if (!failed) {
      failure = err;
      failed = true;
    }
  }

  if (failed) throw failure;
}

/** Redraw the remaining-time line as one synchronized update. */
export function drawRemaining(terminal: TerminalControl, remainingMs: number): void {
  terminal.beginSynchronizedUpdate();
  terminal.clear('all');
  terminal.moveTo(0, 0);
  terminal.print(remainingLine(remainingMs));
  terminal.endSynchronizedUpdate();
  terminal.flush();
}

export function showPausedBanner(terminal: TerminalControl): void {
  terminal.beginSynchronizedUpdate();
  terminal.moveTo(0, STATUS_ROW);
  terminal.clear('current-line');
  terminal.print(PAUSED_STATUS);
  terminal.moveTo(0, HELP_ROW);
  terminal.clear('current-line');
  terminal.print(PAUSED_HELP);
  terminal.endSynchronizedUpdate();
  terminal.flush();
}

export function clearPausedBanner(terminal: TerminalControl): void {
  terminal.beginSynchronizedUpdate();
  terminal.moveTo(0, STATUS_ROW);
  terminal.clear('current-line');
  terminal.moveTo(0, HELP_ROW);
  terminal.clear('current-line');
  terminal.endSynchronizedUpdate();
  terminal.flush();
}
