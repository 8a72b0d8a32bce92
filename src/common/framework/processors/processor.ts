import type { BoundArgs } from '../sweep.js';

/** Consumes the `BoundArgs` of a sweep and outputs them in some way. */
export interface ArgsProcessor {
  /** Returns the number of `BoundArgs` processed. */
  process(args: Iterable<BoundArgs>): number;
}
