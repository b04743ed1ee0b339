/** Which side of an accepted range a value fell outside of. */
export type BoundKind = 'lower' | 'upper' | 'nan';

/**
 * Thrown when a caller passes an argument outside an operation's contract.
 * This signals a programming error; callers are not expected to recover.
 */
export class PreconditionViolation extends Error {
  /** Name of the violated argument. */
  readonly argument: string;
  /** Violated bound. */
  readonly bound: BoundKind;
  /** Bound value the argument was checked against (NaN for the `nan` check). */
  readonly limit: number;
  /** Offending argument value. */
  readonly value: number;

  constructor(argument: string, bound: BoundKind, limit: number, value: number) {
    const rule =
      bound === 'lower'
        ? `must be >= ${limit}`
        : bound === 'upper'
        ? `must be <= ${limit}`
        : 'must be a number';
    super(`${argument} ${rule} (got ${value})`);
    this.name = 'PreconditionViolation';
    this.argument = argument;
    this.bound = bound;
    this.limit = limit;
    this.value = value;
  }
}

/** Thrown when plain data cannot be represented as a FlexValue. */
export class UnsupportedValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedValueError';
  }
}
