/**
 * Error types raised by the core. The command layer turns these into
 * user-facing messages and exit codes; nothing here exits the process.
 */

export type TodoErrorKind =
  | 'invalid-input'
  | 'index-out-of-range'
  | 'corrupt-store'
  | 'io-error'
  | 'export-error';

export abstract class TodoError extends Error {
  abstract readonly kind: TodoErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Empty title, malformed priority or index text */
export class InvalidInputError extends TodoError {
  readonly kind = 'invalid-input';
}

export class IndexOutOfRangeError extends TodoError {
  readonly kind = 'index-out-of-range';

  constructor(
    public readonly index: number,
    public readonly length: number,
  ) {
    super(length === 0
      ? `No task at index ${index}: the list is empty`
      : `No task at index ${index}: valid indices are 0 to ${length - 1}`);
  }
}

/** The backing file exists but is not a well-shaped task array */
export class CorruptStoreError extends TodoError {
  readonly kind = 'corrupt-store';

  constructor(
    public readonly path: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Store file ${path} is corrupt: ${detail}`, options);
  }
}

export class StoreIoError extends TodoError {
  readonly kind = 'io-error';

  constructor(
    public readonly path: string,
    operation: 'read' | 'write',
    cause: unknown,
  ) {
    super(`Could not ${operation} store file ${path}: ${describeCause(cause)}`, { cause });
  }
}

/** Unsupported format tag, or a failure writing the export destination */
export class ExportError extends TodoError {
  readonly kind = 'export-error';
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Node's errno code for a failed fs call, if there is one */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
