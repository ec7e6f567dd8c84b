/**
 * Error taxonomy of the tabular output.
 *
 * 1) Evaluation errors (end one evaluation cycle, surfaced as the output's
 *    error state):
 *    - `TableTypeError`: the transform received something that is not a table.
 *    - `ProducerError`: the bound producer threw.
 *
 * 2) Usage errors (thrown synchronously to the caller):
 *    - `InvalidIdError`, `DuplicateOutputError`, `UnknownOutputError`,
 *      `SessionClosedError`.
 */
export type TabularOutputErrorCode =
  | 'TYPE_MISMATCH'
  | 'PRODUCER_FAILURE'
  | 'INVALID_ID'
  | 'DUPLICATE_OUTPUT'
  | 'UNKNOWN_OUTPUT'
  | 'SESSION_CLOSED';

export class TabularOutputError extends Error {
  readonly code: TabularOutputErrorCode;

  constructor(
    code: TabularOutputErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Describes a runtime value for error messages (`null`, `array`, `number`,
 * a class name such as `Map`, ...).
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value !== 'object') return typeof value;

  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}

export class TableTypeError extends TabularOutputError {
  constructor(value: unknown) {
    super(
      'TYPE_MISMATCH',
      `Expected an Arrow Table, got ${describeValue(value)}.`
    );
  }
}

export class ProducerError extends TabularOutputError {
  readonly outputId: string;

  constructor(outputId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('PRODUCER_FAILURE', `Output "${outputId}" failed: ${reason}`, {
      cause
    });
    this.outputId = outputId;
  }
}

export class InvalidIdError extends TabularOutputError {
  constructor(id: string, reason: string) {
    super('INVALID_ID', `Invalid id "${id}": ${reason}`);
  }
}

export class DuplicateOutputError extends TabularOutputError {
  constructor(outputId: string) {
    super('DUPLICATE_OUTPUT', `Output "${outputId}" is already bound.`);
  }
}

export class UnknownOutputError extends TabularOutputError {
  constructor(outputId: string) {
    super('UNKNOWN_OUTPUT', `No output is bound as "${outputId}".`);
  }
}

export class SessionClosedError extends TabularOutputError {
  constructor() {
    super('SESSION_CLOSED', 'The output session has been closed.');
  }
}
