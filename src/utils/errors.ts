export type InputFilterErrorCode =
  | 'invalid_config'
  | 'out_of_range'
  | 'invalid_curve'
  | 'bad_match';

export class InputFilterError extends Error {
  public readonly code: InputFilterErrorCode;

  constructor(message: string, code: InputFilterErrorCode) {
    super(message);
    this.name = 'InputFilterError';
    this.code = code;
  }
}

/** Malformed drag-lock configuration string; the instance is reset to disabled. */
export class InvalidConfigError extends InputFilterError {
  constructor(message: string) {
    super(message, 'invalid_config');
    this.name = 'InvalidConfigError';
  }
}

/** Setter argument outside the accepted button range; the instance is unchanged. */
export class OutOfRangeError extends InputFilterError {
  constructor(message: string) {
    super(message, 'out_of_range');
    this.name = 'OutOfRangeError';
  }
}

export class InvalidCurveError extends InputFilterError {
  constructor(message: string) {
    super(message, 'invalid_curve');
    this.name = 'InvalidCurveError';
  }
}

export class PropertyMismatchError extends InputFilterError {
  constructor(message: string) {
    super(message, 'bad_match');
    this.name = 'PropertyMismatchError';
  }
}

export function isInputFilterError(error: unknown): error is InputFilterError {
  return error instanceof InputFilterError;
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violated: ${message}`);
  }
}

export function assertUnreachable(value: never, context: string): never {
  throw new Error(`Invariant violated: unexpected ${context} ${JSON.stringify(value)}`);
}
