/** A locally-checkable contract violation, raised when an object is constructed. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * A `ParamGroup` source produced a value that is not a tuple of one entry per key.
 * `actual` is undefined when the value was not a tuple at all.
 */
export class ShapeMismatchError extends Error {
  readonly expected: number;
  readonly actual: number | undefined;

  constructor(expected: number, actual: number | undefined) {
    super(
      actual === undefined
        ? `Expected a tuple of ${expected} values but got a value that is not a tuple`
        : `Number of keys (${expected}) does not match the length of the tuple of values ` +
          `(${actual})`
    );
    this.name = 'ShapeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** An `InGroupValues` source met a tuple too short for its index. */
export class ProjectionIndexError extends RangeError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`Tuple index ${index} out of range for a tuple of length ${length}`);
    this.name = 'ProjectionIndexError';
    this.index = index;
    this.length = length;
  }
}

/** A value formatter was asked to render a value as a kind it is not. */
export class UnsupportedValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedValueError';
  }
}

export function assertValid(condition: boolean, msg: string | (() => string)): asserts condition {
  if (!condition) {
    throw new ValidationError(typeof msg === 'string' ? msg : msg());
  }
}
