import * as path from 'path';

import { type ArgsFormatter, ArgparseFormatter } from '../../framework/format/args_formatter.js';
import { ArgparseValueFormatter } from '../../framework/format/value_formatter.js';
import { BashFileProcessor } from '../../framework/processors/bash_file.js';
import { PrintProcessor, type TextSink } from '../../framework/processors/print.js';
import type { ArgsProcessor } from '../../framework/processors/processor.js';
import type { BoundArgs } from '../../framework/sweep.js';
import { findSweepFiles, loadSweepFile } from '../../internal/file_loader.js';
import type { Logger } from '../../internal/logging/logger.js';
import { assert } from '../../util/util.js';

import type { RunOptions } from './options.js';

export function makeFormatter(options: RunOptions): ArgparseFormatter {
  return new ArgparseFormatter({
    pvSep: options.pvSep,
    valueFormatter: new ArgparseValueFormatter({
      floatFormat: options.floatFormat,
      listOpen: options.listOpen,
      listClose: options.listClose,
      listValueSep: options.listSep,
    }),
  });
}

export function makeProcessor(
  options: RunOptions,
  formatter: ArgsFormatter,
  out: TextSink
): ArgsProcessor {
  if (options.outDir !== undefined) {
    return new BashFileProcessor(options.outDir, {
      createRunToken: options.runToken,
      formatter,
      fileBegin: options.fileBegin,
      fileEnd: options.fileEnd,
      lineBegin: options.linePrefix,
      lineEnd: options.lineSuffix ?? '',
    });
  }
  return new PrintProcessor({
    formatter,
    prefix: options.linePrefix,
    suffix: options.lineSuffix ?? '\n',
    out,
  });
}

function countArgs(sweep: Iterable<BoundArgs>): number {
  let n = 0;
  for (const _ of sweep) {
    n++;
  }
  return n;
}

export interface RunContext {
  readonly log: Logger;
  /** Where printed commands and counts go. */
  readonly out: TextSink;
  readonly cwd?: string;
}

/**
 * Loads every sweep file named by `options.paths` and hands its commands to the processor the
 * options describe. Failures are recorded per sweep in `log`; the next sweep still runs.
 *
 * Returns the names of the sweeps that were run, in order.
 */
export async function runSweeps(options: RunOptions, ctx: RunContext): Promise<string[]> {
  const cwd = ctx.cwd ?? process.cwd();
  const files = findSweepFiles(options.paths, cwd);
  assert(files.length > 0, 'found no sweep files!');

  const names: string[] = [];
  for (const file of files) {
    const name = path.relative(cwd, file);
    names.push(name);
    const [rec] = ctx.log.record(name);
    rec.start();
    try {
      const loaded = await loadSweepFile(file);
      rec.debug(`${name}: ${loaded.description}`);

      if (options.countOnly) {
        const n = countArgs(loaded.sweep);
        rec.setCount(n);
        ctx.out.write(`${n}\t${name}\n`);
      } else {
        const formatter = loaded.formatter ?? makeFormatter(options);
        const n = makeProcessor(options, formatter, ctx.out).process(loaded.sweep);
        rec.setCount(n);
        if (options.outDir !== undefined) {
          rec.info(`wrote ${n} files to ${options.outDir}`);
        }
        if (n === 0) {
          rec.warn('sweep generated no commands');
        }
      }
    } catch (ex) {
      rec.threw(ex);
    }
    rec.finish();
  }
  return names;
}
