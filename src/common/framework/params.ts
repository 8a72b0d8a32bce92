import { ShapeMismatchError, assertValid } from './errors.js';
import { InGroupValues, type ValueSource, toValueSource } from './values.js';

export type ParamValue = unknown;

/** One parameter bound to one of its values. */
export type ParamValuePair = readonly [Param, ParamValue];

/**
 * Anything that can appear in a `SweepSpec`.
 *
 * Iterating a unit yields one list of (param, value) pairs per candidate. A `Param` yields
 * single-pair lists and a `ParamGroup` yields one pair per key, so both compose the same way.
 */
export interface ParamUnit extends Iterable<ParamValuePair[]> {
  /** Number of candidates the unit yields. */
  cardinality(): number;
}

function countValues(values: Iterable<unknown>): number {
  let n = 0;
  for (const _ of values) {
    n++;
  }
  return n;
}

/** A single, independently varying argument. */
export class Param<T = ParamValue> implements ParamUnit {
  /** Name used to refer to the parameter. */
  readonly key: string;
  readonly values: ValueSource<T>;
  /** Name to emit instead of the one derived from `key`. */
  readonly output: string | undefined;

  constructor(key: string, values: ValueSource<T> | Iterable<T>, output?: string) {
    assertValid(typeof key === 'string' && key.length > 0, `key cannot be empty. Was '${key}'`);
    this.key = key;
    this.values = toValueSource(values);
    this.output = output;
  }

  *[Symbol.iterator](): Generator<ParamValuePair[]> {
    for (const v of this.values) {
      yield [[this, v]];
    }
  }

  cardinality(): number {
    return countValues(this.values);
  }
}

/**
 * Parameters whose values are specified jointly, as tuples with one entry per key. Values within
 * a group are never permuted against each other.
 */
export class ParamGroup<T extends readonly ParamValue[] = readonly ParamValue[]>
  implements ParamUnit
{
  readonly keys: readonly string[];
  readonly values: ValueSource<T>;
  /** Per-key output names. An undefined entry keeps the name derived from its key. */
  readonly outputs: readonly (string | undefined)[] | undefined;

  constructor(
    keys: readonly string[],
    values: ValueSource<T> | Iterable<T>,
    outputs?: readonly (string | undefined)[]
  ) {
    assertValid(Array.isArray(keys) && keys.length > 0, `keys cannot be empty. Was ${keys}`);
    for (const key of keys) {
      assertValid(typeof key === 'string' && key.length > 0, `keys cannot contain '${key}'`);
    }
    if (outputs !== undefined) {
      assertValid(
        outputs.length === keys.length,
        `outputs must have one entry per key (${keys.length}). Had ${outputs.length}`
      );
    }
    this.keys = [...keys];
    this.values = toValueSource(values);
    this.outputs = outputs && [...outputs];
  }

  *[Symbol.iterator](): Generator<ParamValuePair[]> {
    const n = this.keys.length;
    for (const v of this.values) {
      const tuple: unknown = v;
      if (!Array.isArray(tuple)) {
        throw new ShapeMismatchError(n, undefined);
      }
      if (tuple.length !== n) {
        throw new ShapeMismatchError(n, tuple.length);
      }
      // Fresh Params per tuple, so each member reads like a plain Param downstream.
      yield this.keys.map((key, i): ParamValuePair => {
        const valuesi = new InGroupValues<ParamValue>(this.values, i);
        return [new Param(key, valuesi, this.outputs?.[i]), v[i]];
      });
    }
  }

  cardinality(): number {
    return countValues(this.values);
  }
}

export function param<T>(
  key: string,
  values: ValueSource<T> | Iterable<T>,
  output?: string
): Param<T> {
  return new Param(key, values, output);
}

export function pgroup<T extends readonly ParamValue[]>(
  keys: readonly string[],
  values: ValueSource<T> | Iterable<T>,
  outputs?: readonly (string | undefined)[]
): ParamGroup<T> {
  return new ParamGroup(keys, values, outputs);
}
