import * as fs from 'fs';
import * as path from 'path';

import * as fg from 'fast-glob';

import type { ArgsFormatter } from '../framework/format/args_formatter.js';
import { type BoundArgs, isBoundArgs } from '../framework/sweep.js';
import { assert } from '../util/util.js';

export const kSweepSuffixes = ['.sweep.ts', '.sweep.js'];

/** What a sweep file exports. */
export interface SweepFile {
  readonly description: string;
  readonly sweep: Iterable<BoundArgs>;
  /** Overrides the formatter built from the command line. */
  readonly formatter?: ArgsFormatter;
}

interface SweepModule {
  readonly description?: unknown;
  readonly sweep?: unknown;
  readonly formatter?: unknown;
  readonly default?: SweepModule;
}

function isIterable(x: unknown): x is Iterable<unknown> {
  return typeof x === 'object' && x !== null && Symbol.iterator in x;
}

function isArgsFormatter(x: unknown): x is ArgsFormatter {
  return typeof x === 'object' && x !== null && 'format' in x && typeof x.format === 'function';
}

// Checks each element lazily, so the sweep stays restartable and nothing is materialized.
function checkedSweep(sweep: Iterable<unknown>, filename: string): Iterable<BoundArgs> {
  return {
    *[Symbol.iterator]() {
      for (const args of sweep) {
        assert(isBoundArgs(args), `Sweep in ${filename} produced something other than BoundArgs`);
        yield args;
      }
    },
  };
}

/**
 * Expands command-line paths into sweep files: directories are crawled for `*.sweep.ts` and
 * `*.sweep.js`, globs are expanded, and plain paths must exist.
 */
export function findSweepFiles(paths: readonly string[], cwd: string = process.cwd()): string[] {
  const files = new Set<string>();
  for (const p of paths) {
    const abs = path.resolve(cwd, p);
    if (fs.existsSync(abs) && fs.statSync(abs).isDirectory()) {
      const suffixes = kSweepSuffixes.map(s => '*' + s);
      for (const f of fg.sync(`**/{${suffixes.join(',')}}`, {
        cwd: abs,
        absolute: true,
        onlyFiles: true,
        ignore: ['**/node_modules/**'],
      })) {
        files.add(path.normalize(f));
      }
    } else if (fg.isDynamicPattern(p)) {
      for (const f of fg.sync(p, { cwd, absolute: true, onlyFiles: true })) {
        files.add(path.normalize(f));
      }
    } else {
      assert(fs.existsSync(abs), `Could not find ${p}`);
      files.add(abs);
    }
  }
  return Array.from(files).sort();
}

export async function loadSweepFile(filename: string): Promise<SweepFile> {
  const imported: SweepModule = await import(filename);
  // A CommonJS module imported from ESM puts its exports under `default`.
  const mod = imported.sweep === undefined && imported.default ? imported.default : imported;

  assert(
    typeof mod.description === 'string',
    'Sweep file missing description: ' + filename
  );
  assert(isIterable(mod.sweep), 'Sweep file missing an iterable `sweep` export: ' + filename);
  const formatter = mod.formatter;
  assert(
    formatter === undefined || isArgsFormatter(formatter),
    'Sweep file `formatter` export has no format(): ' + filename
  );

  return {
    description: mod.description.trim(),
    sweep: checkedSweep(mod.sweep, filename),
    formatter,
  };
}
