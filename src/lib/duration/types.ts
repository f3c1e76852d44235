/** Units a duration string can name, smallest first. */
export type DurationUnit = 'milliseconds' | 'seconds' | 'minutes' | 'hours' | 'days';

/** Machine-readable reason a duration string was rejected. */
export type DurationErrorCode =
  | 'missing-parts'
  | 'too-many-parts'
  | 'too-many-second-parts'
  | 'invalid-seconds'
  | 'invalid-milliseconds'
  | 'invalid-part'
  | 'invalid-duration-part'
  | 'overflow';

/** Why a field failed to read as a non-negative integer. */
export type IntegerParseReason = 'empty' | 'invalid-digit';

/** A positional field to the left of the seconds. */
export interface LargerUnit {
  unit: Exclude<DurationUnit, 'milliseconds' | 'seconds'>;
  ms: bigint;
}

/** A duration split into display units. Milliseconds below one second are dropped. */
export interface DurationParts {
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}
