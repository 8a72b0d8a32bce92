import type { Param } from '../params.js';
import type { BoundArgs } from '../sweep.js';

import { ArgparseValueFormatter, ValueFormatter } from './value_formatter.js';

/** Turns one `BoundArgs` (one full command line) into a string. */
export interface ArgsFormatter {
  format(args: BoundArgs): string;
}

/** The name a parameter is written as: its `output` if set, `--key` otherwise. */
export function resolveOutputName(p: Param): string {
  return p.output !== undefined ? p.output : '--' + p.key;
}

export interface ArgparseFormatterOptions {
  /** Separator between two parameter-value pairs. */
  pvSep?: string;
  /** Written before each parameter-value pair. */
  pvPrefix?: string;
  /** Written after each parameter-value pair. */
  pvSuffix?: string;
  valueFormatter?: ValueFormatter;
}

/** Renders `BoundArgs` as `--key value --key2 value2`, the way argparse takes its input. */
export class ArgparseFormatter implements ArgsFormatter {
  readonly pvSep: string;
  readonly pvPrefix: string;
  readonly pvSuffix: string;
  readonly valueFormatter: ValueFormatter;

  constructor({
    pvSep = ' ',
    pvPrefix = '',
    pvSuffix = '',
    valueFormatter = new ArgparseValueFormatter(),
  }: ArgparseFormatterOptions = {}) {
    this.pvSep = pvSep;
    this.pvPrefix = pvPrefix;
    this.pvSuffix = pvSuffix;
    this.valueFormatter = valueFormatter;
  }

  format(args: BoundArgs): string {
    const entries = args.pvs.map(([p, v]) => {
      const name = resolveOutputName(p);
      return `${this.pvPrefix}${name} ${this.valueFormatter.format(v)}${this.pvSuffix}`;
    });
    return entries.join(this.pvSep);
  }
}
