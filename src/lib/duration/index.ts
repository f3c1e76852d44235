import {
  IntegerParseError,
  invalidDurationPart,
  invalidMilliseconds,
  invalidPart,
  invalidSeconds,
  missingParts,
  overflow,
  tooManyParts,
  tooManySecondParts,
} from './errors.js';
import type { DurationParts, DurationUnit, LargerUnit } from './types.js';

export { DurationParseError, IntegerParseError } from './errors.js';
export type {
  DurationErrorCode,
  DurationParts,
  DurationUnit,
  IntegerParseReason,
} from './types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Largest duration, in milliseconds, the timer can hold exactly. */
export const MAX_DURATION_MS = Number.MAX_SAFE_INTEGER;

const MAX_MS = BigInt(MAX_DURATION_MS);

/** days:hours:minutes:seconds */
const MAX_PARTS = 4;

/** Fields to the left of the seconds, nearest first. */
const LARGER_UNITS: readonly LargerUnit[] = [
  { unit: 'minutes', ms: 60_000n },
  { unit: 'hours', ms: 3_600_000n },
  { unit: 'days', ms: 86_400_000n },
];

const MS_PER_SECOND = 1000;
const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_DAY = 86_400;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Read a non-negative decimal integer. Digit strings of any length are
 * accepted so that oversized values surface as overflow, not as a bad number.
 */
export function parseInteger(text: string): bigint {
  if (text.length === 0) throw new IntegerParseError('empty');
  if (!/^\+?[0-9]+$/.test(text)) throw new IntegerParseError('invalid-digit');
  return BigInt(text.startsWith('+') ? text.slice(1) : text);
}

function checkedMul(value: bigint, factor: bigint, unit: DurationUnit): bigint {
  const product = value * factor;
  if (product > MAX_MS) throw overflow(unit);
  return product;
}

function checkedAdd(total: bigint, value: bigint, unit: DurationUnit): bigint {
  const sum = total + value;
  if (sum > MAX_MS) throw overflow(unit);
  return sum;
}

function readInteger<E>(text: string, onError: (cause: IntegerParseError) => E): bigint {
  try {
    return parseInteger(text);
  } catch (err) {
    if (err instanceof IntegerParseError) throw onError(err);
    throw err;
  }
}

/**
 * Parse a `[[[d:]h:]m:]s[.ms]` duration string into milliseconds.
 *
 * Fields are read right to left: seconds (with an optional integer count of
 * milliseconds after a dot), then minutes, hours and days.
 *
 * @throws {DurationParseError} when the string is malformed or too large
 */
export function parseDuration(input: string): number {
  if (input.length === 0) throw missingParts();

  // One token past the limit is enough to tell "too many" apart.
  const parts = input.split(':').reverse().slice(0, MAX_PARTS + 1);
  if (parts.length > MAX_PARTS) throw tooManyParts();

  const [secondsField, ...largerFields] = parts;

  const secondsPieces = secondsField.split('.');
  if (secondsPieces.length > 2) throw tooManySecondParts();
  const [secondsText, millisText] = secondsPieces;

  const seconds = readInteger(secondsText, invalidSeconds);
  const millis = millisText === undefined ? 0n : readInteger(millisText, invalidMilliseconds);

  let total = checkedMul(seconds, BigInt(MS_PER_SECOND), 'seconds');
  total = checkedAdd(total, millis, 'milliseconds');

  largerFields.forEach((field, index) => {
    const larger = LARGER_UNITS[index];
    if (larger === undefined) throw invalidDurationPart();
    const value = readInteger(field, (cause) => invalidPart(larger.unit, cause));
    total = checkedAdd(total, checkedMul(value, larger.ms, larger.unit), larger.unit);
  });

  return Number(total);
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Split milliseconds into whole days, hours, minutes and seconds. */
export function splitDuration(ms: number): DurationParts {
  const totalSeconds = Math.floor(Math.max(0, ms) / MS_PER_SECOND);
  return {
    days: Math.floor(totalSeconds / SECONDS_PER_DAY),
    hours: Math.floor((totalSeconds % SECONDS_PER_DAY) / SECONDS_PER_HOUR),
    minutes: Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
    seconds: totalSeconds % SECONDS_PER_MINUTE,
  };
}

/**
 * Format milliseconds as `1d 2h 3m 4s`. Leading zero units are left out, but
 * once a larger unit is shown every smaller one is too. Seconds always show.
 */
export function formatDuration(ms: number): string {
  const { days, hours, minutes, seconds } = splitDuration(ms);
  const units: string[] = [];

  if (days > 0) units.push(`${days}d`);
  if (days > 0 || hours > 0) units.push(`${hours}h`);
  if (days > 0 || hours > 0 || minutes > 0) units.push(`${minutes}m`);
  units.push(`${seconds}s`);

  return units.join(' ');
}
