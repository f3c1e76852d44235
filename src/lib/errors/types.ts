/** Who is expected to act on an error: the person at the keyboard, or the developer. */
export type ErrorKind = 'user' | 'system';

/** Anything that may appear in a cause chain. */
export type ErrorCause = Error | string;
