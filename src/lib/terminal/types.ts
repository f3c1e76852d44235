/** What a clear command wipes. */
export type ClearTarget = 'all' | 'current-line';

/**
 * Drawing and mode primitives the timer needs from a terminal. Commands are
 * queued and only reach the device on `flush()`; any method may throw a
 * `TerminalIoError`.
 */
export interface TerminalControl {
  enterAlternateScreen(): void;
  leaveAlternateScreen(): void;
  enableRawMode(): void;
  disableRawMode(): void;
  hideCursor(): void;
  showCursor(): void;
  /** Zero-based column and row. */
  moveTo(column: number, row: number): void;
  clear(target: ClearTarget): void;
  beginSynchronizedUpdate(): void;
  endSynchronizedUpdate(): void;
  print(text: string): void;
  flush(): void;
}

/** A key press decoded from raw terminal input. */
export interface KeyPress {
  type: 'key';
  /** Printable character, or a name such as `escape`, `enter`, `space`. */
  code: string;
  ctrl: boolean;
  alt: boolean;
}

/** Events read from the terminal's input stream. */
export type InputEvent = KeyPress | { type: 'other' } | { type: 'closed' };
