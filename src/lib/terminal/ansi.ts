import { writeSync } from 'node:fs';
import { TerminalIoError } from './errors.js';
import type { ClearTarget, TerminalControl } from './types.js';

// ---------------------------------------------------------------------------
// Escape sequences
// ---------------------------------------------------------------------------

const ESC = '\x1b';
const CSI = `${ESC}[`;

export const ANSI = {
  altOn: `${CSI}?1049h`,
  altOff: `${CSI}?1049l`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  syncBegin: `${CSI}?2026h`,
  syncEnd: `${CSI}?2026l`,
  clearAll: `${CSI}2J`,
  clearLine: `${CSI}2K`,
  // CUP is one-based
  moveTo: (column: number, row: number) => `${CSI}${row + 1};${column + 1}H`,
} as const;

// ---------------------------------------------------------------------------
// AnsiTerminal
// ---------------------------------------------------------------------------

/** The part of a TTY read stream needed to switch raw mode. */
export interface RawModeInput {
  isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
}

export interface AnsiTerminalOptions {
  /** File descriptor frames are written to. */
  fd: number;
  /** Stream whose raw mode is toggled. Without a TTY here raw mode is a no-op. */
  input?: RawModeInput;
  /** Synchronous writer; defaults to `fs.writeSync`. */
  write?: (fd: number, data: string) => void;
}

/** TerminalControl over ANSI escape sequences, written synchronously on flush. */
export class AnsiTerminal implements TerminalControl {
  private readonly fd: number;
  private readonly input: RawModeInput | undefined;
  private readonly write: (fd: number, data: string) => void;
  private queued = '';
  private rawMode = false;

  constructor(options: AnsiTerminalOptions) {
    this.fd = options.fd;
    this.input = options.input;
    this.write =
      options.write ??
      ((fd, data) => {
        writeSync(fd, data);
      });
  }

  get isRawMode(): boolean {
    return this.rawMode;
  }

  enterAlternateScreen(): void {
    this.queued += ANSI.altOn;
  }

  leaveAlternateScreen(): void {
    this.queued += ANSI.altOff;
  }

  enableRawMode(): void {
    this.setRawMode(true);
  }

  disableRawMode(): void {
    this.setRawMode(false);
  }

  hideCursor(): void {
    this.queued += ANSI.hideCursor;
  }

  showCursor(): void {
    this.queued += ANSI.showCursor;
  }

  moveTo(column: number, row: number): void {
    this.queued += ANSI.moveTo(column, row);
  }

  clear(target: ClearTarget): void {
    this.queued += target === 'all' ? ANSI.clearAll : ANSI.clearLine;
  }

  beginSynchronizedUpdate(): void {
    this.queued += ANSI.syncBegin;
  }

  endSynchronizedUpdate(): void {
    this.queued += ANSI.syncEnd;
  }

  print(text: string): void {
    this.queued += text;
  }

  flush(): void {
    if (this.queued.length === 0) return;
    const data = this.queued;
    this.queued = '';
    try {
      this.write(this.fd, data);
    } catch (err) {
      throw new TerminalIoError('write', err);
    }
  }

  private setRawMode(mode: boolean): void {
    if (this.rawMode === mode) return;
    if (!this.input?.isTTY) return;
    try {
      this.input.setRawMode(mode);
    } catch (err) {
      throw new TerminalIoError(mode ? 'enable raw mode' : 'disable raw mode', err);
    }
    this.rawMode = mode;
  }
}
