import { HumanError, user } from '../errors/index.js';
import type { ErrorCause } from '../errors/index.js';
import type { DurationErrorCode, DurationUnit, IntegerParseReason } from './types.js';

const FORMAT_ADVICE = 'Provide the duration in the following format: "d:h:m:s.ms"';
const RANGE_ADVICE = 'Make sure the value is within a reasonable range';

/** A duration string that could not be turned into a duration. Always a user error. */
export class DurationParseError extends HumanError {
  readonly code: DurationErrorCode;
  readonly unit: DurationUnit | undefined;

  constructor(
    code: DurationErrorCode,
    title: string,
    advice: string,
    cause?: ErrorCause,
    unit?: DurationUnit,
  ) {
    super('user', title, advice, cause);
    this.name = 'DurationParseError';
    this.code = code;
    this.unit = unit;
  }
}

/** A field that is not a plain decimal integer. */
export class IntegerParseError extends Error {
  readonly reason: IntegerParseReason;

  constructor(reason: IntegerParseReason) {
    super(
      reason === 'empty'
        ? 'cannot parse integer from empty string'
        : 'invalid digit found in string',
    );
    this.name = 'IntegerParseError';
    this.reason = reason;
  }
}

export function missingParts(): DurationParseError {
  return new DurationParseError(
    'missing-parts',
    'Failed to parse the duration',
    FORMAT_ADVICE,
    user('Missing parts', 'Make sure to provide at least the seconds part of the duration'),
  );
}

export function tooManyParts(): DurationParseError {
  return new DurationParseError(
    'too-many-parts',
    'Failed to parse the duration',
    FORMAT_ADVICE,
    user(
      'Too many parts',
      'Make sure to provide at most 4 parts for days, hours, minutes, and seconds',
    ),
  );
}

export function tooManySecondParts(): DurationParseError {
  return new DurationParseError(
    'too-many-second-parts',
    'Failed to parse the duration',
    FORMAT_ADVICE,
    user(
      'Too many parts in seconds.milliseconds',
      'Make sure to provide at most one dot in the seconds part',
    ),
  );
}

export function invalidSeconds(cause: IntegerParseError): DurationParseError {
  return new DurationParseError(
    'invalid-seconds',
    'Failed to parse the seconds part',
    'Make sure to provide a valid number for the seconds part',
    cause,
    'seconds',
  );
}

export function invalidMilliseconds(cause: IntegerParseError): DurationParseError {
  return new DurationParseError(
    'invalid-milliseconds',
    'Failed to parse the milliseconds part',
    'Make sure to provide a valid number for the milliseconds part',
    cause,
    'milliseconds',
  );
}

export function invalidPart(unit: DurationUnit, cause: IntegerParseError): DurationParseError {
  return new DurationParseError(
    'invalid-part',
    `Failed to parse the ${unit} part`,
    `Make sure to provide a valid number for the ${unit} part`,
    cause,
    unit,
  );
}

export function invalidDurationPart(): DurationParseError {
  return new DurationParseError(
    'invalid-duration-part',
    'Invalid duration part',
    'Make sure to provide a valid number for the duration part',
  );
}

export function overflow(unit: DurationUnit): DurationParseError {
  return new DurationParseError(
    'overflow',
    'Duration overflow',
    'The provided duration is too large to be represented',
    user(`Overflow in ${unit}`, RANGE_ADVICE),
    unit,
  );
}
