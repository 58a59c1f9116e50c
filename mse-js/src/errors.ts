/**
 * MSE Errors — the failures a read can end with.
 *
 * Recoverable problems never throw; they become reader warnings.
 */

/** Unrecoverable corruption in a document: the load should be abandoned. */
export class ParseError extends Error {
  /** Line the error was detected on, when known. */
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(message);
    this.name = 'ParseError';
    this.line = line;
  }
}

/** A byte sequence that is not valid UTF-8. */
export class DecodeError extends Error {
  constructor(message = 'Invalid UTF-8 sequence') {
    super(message);
    this.name = 'DecodeError';
  }
}

/** A caller broke the reader's contract; the parse state can no longer be trusted. */
export class InternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalError';
  }
}

/** Throw an {@link InternalError} unless `condition` holds. */
export function assertContract(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InternalError(message);
  }
}
