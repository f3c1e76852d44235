/** A read, write or mode change on the terminal device failed. */
export class TerminalIoError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation}: ${detail}`, { cause });
    this.name = 'TerminalIoError';
    this.operation = operation;
  }
}
