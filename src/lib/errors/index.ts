import type { ErrorCause, ErrorKind } from './types.js';

export type { ErrorCause, ErrorKind } from './types.js';

// ---------------------------------------------------------------------------
// HumanError
// ---------------------------------------------------------------------------

/**
 * An error meant to be read by a person. Carries a short title, the advice
 * shown under "To try and fix this", and an optional cause.
 */
export class HumanError extends Error {
  readonly kind: ErrorKind;
  readonly title: string;
  readonly advice: readonly string[];

  constructor(kind: ErrorKind, title: string, advice: string | readonly string[], cause?: ErrorCause) {
    super(title, cause === undefined ? undefined : { cause });
    this.name = 'HumanError';
    this.kind = kind;
    this.title = title;
    this.advice = typeof advice === 'string' ? [advice] : [...advice];
  }

  get isUser(): boolean {
    return this.kind === 'user';
  }

  get isSystem(): boolean {
    return this.kind === 'system';
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function user(title: string, advice: string): HumanError {
  return new HumanError('user', title, advice);
}

export function userWithCause(title: string, advice: string, cause: ErrorCause): HumanError {
  return new HumanError('user', title, advice, cause);
}

export function system(title: string, advice: string): HumanError {
  return new HumanError('system', title, advice);
}

export function systemWithCause(title: string, advice: string, cause: ErrorCause): HumanError {
  return new HumanError('system', title, advice, cause);
}

// ---------------------------------------------------------------------------
// Cause chain
// ---------------------------------------------------------------------------

function causeOf(err: unknown): unknown {
  return err instanceof Error ? err.cause : undefined;
}

function describe(err: unknown): string {
  if (err instanceof HumanError) return err.title;
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Descriptions of every cause below `err`, outermost first. */
export function collectCauses(err: unknown): string[] {
  const causes: string[] = [];
  const seen = new Set<unknown>([err]);
  let current = causeOf(err);
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    causes.push(describe(current));
    current = causeOf(current);
  }
  return causes;
}

/** Advice from `err` and every HumanError in its cause chain, without repeats. */
export function collectAdvice(err: unknown): string[] {
  const advice: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    if (current instanceof HumanError) {
      for (const line of current.advice) {
        if (!advice.includes(line)) advice.push(line);
      }
    }
    current = causeOf(current);
  }
  return advice;
}

/** Promote any thrown value to a HumanError. Unknown failures are the developer's problem. */
export function toHumanError(err: unknown): HumanError {
  if (err instanceof HumanError) return err;
  const cause = err instanceof Error ? err : String(err);
  return systemWithCause('An unexpected error occurred', 'Try notifying the developer', cause);
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render an error report:
 *
 * ```text
 * Oh no! Failed to parse the duration.
 *
 * This was caused by:
 *  - Too many parts
 *
 * To try and fix this, you can:
 *  - Provide the duration in the following format: "d:h:m:s.ms"
 * ```
 */
export function formatError(err: unknown): string {
  const human = toHumanError(err);
  const headline = human.isUser
    ? `Oh no! ${human.title}.`
    : `Whoops! ${human.title} (this isn't your fault).`;

  const sections = [headline];

  const causes = collectCauses(human);
  if (causes.length > 0) {
    sections.push(['This was caused by:', ...causes.map((c) => ` - ${c}`)].join('\n'));
  }

  const advice = collectAdvice(human);
  if (advice.length > 0) {
    sections.push(['To try and fix this, you can:', ...advice.map((a) => ` - ${a}`)].join('\n'));
  }

  return sections.join('\n\n');
}
