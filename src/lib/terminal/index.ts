export type { ClearTarget, InputEvent, KeyPress, TerminalControl } from './types.js';
export { TerminalIoError } from './errors.js';
export { ANSI, AnsiTerminal } from './ansi.js';
export type { AnsiTerminalOptions, RawModeInput } from './ansi.js';
export { decodeKeys } from './keys.js';
export {
  PAUSED_HELP,
  PAUSED_STATUS,
  clearPausedBanner,
  drawRemaining,
  enterScreen,
  remainingLine,
  restoreScreen,
  showPausedBanner,
} from './view.js';
