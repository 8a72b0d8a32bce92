import type { ParamUnit, ParamValue, ParamValuePair } from './params.js';

/**
 * One concrete point of a sweep: every parameter bound to one value, in unit order.
 */
export class BoundArgs implements Iterable<ParamValuePair> {
  readonly pvs: readonly ParamValuePair[];

  constructor(pvs: readonly ParamValuePair[]) {
    this.pvs = Object.freeze([...pvs]);
  }

  get length(): number {
    return this.pvs.length;
  }

  keys(): string[] {
    return this.pvs.map(([p]) => p.key);
  }

  /** Value bound to `key`. When a key appears more than once, the last one wins. */
  get(key: string): ParamValue {
    let value: ParamValue = undefined;
    for (const [p, v] of this.pvs) {
      if (p.key === key) {
        value = v;
      }
    }
    return value;
  }

  [Symbol.iterator](): Iterator<ParamValuePair> {
    return this.pvs[Symbol.iterator]();
  }
}

/** Structural check, for sweeps loaded from modules that may carry their own copy of this one. */
export function isBoundArgs(x: unknown): x is BoundArgs {
  return (
    typeof x === 'object' &&
    x !== null &&
    'pvs' in x &&
    Array.isArray(x.pvs) &&
    'get' in x &&
    typeof x.get === 'function'
  );
}

function* cartesian(units: readonly ParamUnit[], offset: number): Generator<ParamValuePair[]> {
  if (offset === units.length) {
    yield [];
    return;
  }
  for (const a of units[offset]) {
    for (const b of cartesian(units, offset + 1)) {
      yield [...a, ...b];
    }
  }
}

/**
 * An ordered list of parameter units. Iterating it yields the cartesian product of the units
 * (last unit varying fastest) as `BoundArgs`, one at a time.
 *
 * Every iteration is a new traversal, so a spec can be walked any number of times, and stopping
 * part way through one walk does not affect the next.
 */
export class SweepSpec implements Iterable<BoundArgs> {
  readonly units: readonly ParamUnit[];

  constructor(units: readonly ParamUnit[]) {
    this.units = [...units];
  }

  *[Symbol.iterator](): Generator<BoundArgs> {
    for (const pvs of cartesian(this.units, 0)) {
      yield new BoundArgs(pvs);
    }
  }

  /** Number of `BoundArgs` an iteration yields, without building them. */
  count(): number {
    return this.units.reduce((n, unit) => n * unit.cardinality(), 1);
  }
}

export function sweep(...units: ParamUnit[]): SweepSpec {
  return new SweepSpec(units);
}
