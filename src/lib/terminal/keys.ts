import type { InputEvent, KeyPress } from './types.js';

const ESC = '\x1b';

const NAMED_KEYS: Record<string, string> = {
  '\r': 'enter',
  '\n': 'enter',
  '\t': 'tab',
  ' ': 'space',
  '\x7f': 'backspace',
};

function key(code: string, modifiers: Partial<Pick<KeyPress, 'ctrl' | 'alt'>> = {}): KeyPress {
  return { type: 'key', code, ctrl: modifiers.ctrl ?? false, alt: modifiers.alt ?? false };
}

function decodeChar(ch: string, alt: boolean): InputEvent {
  const named = NAMED_KEYS[ch];
  if (named !== undefined) return key(named, { alt });

  const codePoint = ch.codePointAt(0) ?? 0;
  // Ctrl+A .. Ctrl+Z arrive as 0x01 .. 0x1a
  if (codePoint >= 0x01 && codePoint <= 0x1a) {
    return key(String.fromCharCode(codePoint + 0x60), { ctrl: true, alt });
  }
  if (codePoint < 0x20) return { type: 'other' };

  return key(ch, { alt });
}

/** Length of the escape sequence starting at `chars[start]`, or 0 if it is a lone ESC. */
function escapeSequenceLength(chars: readonly string[], start: number): number {
  const next = chars[start + 1];
  if (next === undefined) return 0;

  if (next === '[') {
    // CSI: parameters until a final byte in @..~
    for (let i = start + 2; i < chars.length; i++) {
      const c = chars[i].charCodeAt(0);
      if (c >= 0x40 && c <= 0x7e) return i - start + 1;
    }
    return chars.length - start;
  }
  if (next === 'O') {
    return Math.min(3, chars.length - start);
  }
  return 0;
}

/**
 * Decode one chunk of raw-mode input into events. Escape sequences such as
 * arrow keys come out as `other`.
 */
export function decodeKeys(data: string): InputEvent[] {
  const chars = Array.from(data);
  const events: InputEvent[] = [];

  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (ch !== ESC) {
      events.push(decodeChar(ch, false));
      i += 1;
      continue;
    }

    const sequence = escapeSequenceLength(chars, i);
    if (sequence > 0) {
      events.push({ type: 'other' });
      i += sequence;
    } else if (i + 1 < chars.length && chars[i + 1] !== ESC) {
      events.push(decodeChar(chars[i + 1], true));
      i += 2;
    } else {
      events.push(key('escape'));
      i += 1;
    }
  }

  return events;
}
