import { ProjectionIndexError, assertValid } from './errors.js';

/**
 * The candidate values of one parameter slot (or, for a `ParamGroup`, one tuple per candidate).
 *
 * A ValueSource is restartable: every call to `[Symbol.iterator]()` starts a new traversal from
 * the first value, and iterating never changes the source.
 */
export abstract class ValueSource<T> implements Iterable<T> {
  abstract [Symbol.iterator](): Iterator<T>;
}

/** Values given directly as an array. */
export class FixedValues<T> extends ValueSource<T> {
  private readonly values: readonly T[];

  constructor(values: readonly T[]) {
    super();
    this.values = [...values];
  }

  *[Symbol.iterator](): Generator<T> {
    yield* this.values;
  }
}

/**
 * The values of one member of a `ParamGroup`: entry `index` of every tuple of the group's source.
 */
export class InGroupValues<T> extends ValueSource<T> {
  private readonly source: ValueSource<readonly T[]>;
  readonly index: number;

  constructor(source: ValueSource<readonly T[]>, index: number) {
    super();
    this.source = source;
    this.index = index;
  }

  *[Symbol.iterator](): Generator<T> {
    const index = this.index;
    for (const tuple of this.source) {
      if (index >= tuple.length) {
        throw new ProjectionIndexError(index, tuple.length);
      }
      yield tuple[index];
    }
  }
}

/** Any other iterable that hands out a fresh iterator each time it is asked (Set, Map, ...). */
export class ReusableValues<T> extends ValueSource<T> {
  private readonly iterable: Iterable<T>;

  constructor(iterable: Iterable<T>) {
    super();
    this.iterable = iterable;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.iterable[Symbol.iterator]();
  }
}

function isRestartableIterable(x: unknown): boolean {
  if (typeof x !== 'object' || x === null || !(Symbol.iterator in x)) {
    return false;
  }
  const iterFn = x[Symbol.iterator];
  if (typeof iterFn !== 'function') {
    return false;
  }
  // Generator objects and other iterators return themselves and can only be walked once.
  const iter: unknown = iterFn.call(x);
  return iter !== x;
}

/**
 * Normalizes what a user passes as the values of a `Param` or `ParamGroup`: arrays become
 * `FixedValues`, other restartable iterables become `ReusableValues`.
 */
export function toValueSource<T>(values: ValueSource<T> | Iterable<T>): ValueSource<T> {
  if (values instanceof ValueSource) {
    return values;
  }
  if (Array.isArray(values)) {
    return new FixedValues<T>(values);
  }
  assertValid(
    typeof values !== 'string',
    () => `values has to be a list of values, not a string. Was '${String(values)}'`
  );
  assertValid(isRestartableIterable(values), () => {
    const what = values === null || typeof values !== 'object' ? String(values) : 'an iterator';
    return `values has to be an iterable that can be traversed more than once. Was ${what}`;
  });
  return new ReusableValues(values);
}
