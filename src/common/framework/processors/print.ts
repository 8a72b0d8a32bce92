import { type ArgsFormatter, ArgparseFormatter } from '../format/args_formatter.js';
import type { BoundArgs } from '../sweep.js';

import type { ArgsProcessor } from './processor.js';

/** Where printed lines go. `process.stdout` by default. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface PrintProcessorOptions {
  formatter?: ArgsFormatter;
  /** Prepended to each line. */
  prefix?: string;
  /** Appended to each line. Default: newline. */
  suffix?: string;
  out?: TextSink;
}

/** Prints each command, one per line. */
export class PrintProcessor implements ArgsProcessor {
  readonly formatter: ArgsFormatter;
  readonly prefix: string;
  readonly suffix: string;
  private readonly out: TextSink;

  constructor({
    formatter = new ArgparseFormatter(),
    prefix = '',
    suffix = '\n',
    out = process.stdout,
  }: PrintProcessorOptions = {}) {
    this.formatter = formatter;
    this.prefix = prefix;
    this.suffix = suffix;
    this.out = out;
  }

  process(args: Iterable<BoundArgs>): number {
    let count = 0;
    for (const ar of args) {
      const line = this.prefix + this.formatter.format(ar) + this.suffix;
      this.out.write(line);
      count++;
    }
    return count;
  }
}
