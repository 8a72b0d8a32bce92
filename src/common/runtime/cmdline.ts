#!/usr/bin/env node
/* eslint no-console: "off" */
/* eslint no-process-exit: "off" */

import * as process from 'process';

import { prettyPrintLog } from '../internal/logging/log_message.js';
import { Logger } from '../internal/logging/logger.js';
import type { LiveSweepResult } from '../internal/logging/result.js';
import { unreachable } from '../util/util.js';

import { type RunOptions, UsageError, parseRunOptions } from './helper/options.js';
import { runSweeps } from './helper/run_sweeps.js';

function usage(rc: number): never {
  console.error('Usage:');
  console.error('  argsweep [OPTIONS...] PATHS...');
  console.error("  argsweep src/sweeps 'experiments/**/*.sweep.ts'");
  console.error('Options:');
  console.error('  --out-dir DIR        Write one bash file per command into DIR.');
  console.error('  --run-token          Skip commands whose token file exists (with --out-dir).');
  console.error('  --file-begin STR     Text at the beginning of every written file.');
  console.error('  --file-end STR       Text at the end of every written file.');
  console.error('  --line-prefix STR    Text before every command.');
  console.error('  --line-suffix STR    Text after every command.');
  console.error("  --pv-sep STR         Separator between parameters (default ' ').");
  console.error("  --float-format TPL   Template for floats, e.g. '{:.3f}' (default '{}').");
  console.error('  --list-open STR      Text before the entries of a list value.');
  console.error('  --list-close STR     Text after the entries of a list value.');
  console.error("  --list-sep STR       Separator between list entries (default ', ').");
  console.error('  --count              Only print how many commands each sweep generates.');
  console.error('  --verbose            Print the result/log of every sweep as it finishes.');
  console.error('  --debug              Include debug messages in logging.');
  console.error('  --print-json         Print the complete result JSON at the end.');
  return process.exit(rc);
}

let options: RunOptions;
try {
  options = parseRunOptions(process.argv.slice(2));
} catch (ex) {
  if (ex instanceof UsageError) {
    console.error(ex.message);
    usage(1);
  }
  throw ex;
}

if (options.help) {
  usage(0);
}
if (options.paths.length === 0) {
  usage(1);
}

(async () => {
  Logger.globalDebugMode = options.debug;
  const log = new Logger();

  const names = await runSweeps(options, { log, out: process.stdout });

  const failed: Array<[string, LiveSweepResult]> = [];
  const warned: Array<[string, LiveSweepResult]> = [];
  let commands = 0;

  for (const name of names) {
    const res = log.results.get(name);
    if (res === undefined) {
      unreachable(`no result recorded for ${name}`);
    }
    if (options.verbose) {
      printResults([[name, res]]);
    }

    commands += res.count;
    switch (res.status) {
      case 'pass':
        break;
      case 'warn':
        warned.push([name, res]);
        break;
      case 'fail':
        failed.push([name, res]);
        break;
      default:
        unreachable('unrecognized status');
    }
  }

  if (options.printJSON) {
    console.error(log.asJSON(2));
  }

  if (warned.length) {
    console.error('');
    console.error('** Warnings **');
    printResults(warned);
  }
  if (failed.length) {
    console.error('');
    console.error('** Failures **');
    printResults(failed);
  }

  const total = names.length;
  console.error('');
  console.error(`** Summary **
Sweeps           = ${total}
Failed           = ${failed.length}
Commands         = ${commands}`);

  if (failed.length) {
    process.exit(1);
  }
})().catch(ex => {
  console.error(ex instanceof Error ? ex.stack ?? ex.message : String(ex));
  process.exit(1);
});

function printResults(results: Array<[string, LiveSweepResult]>): void {
  for (const [name, r] of results) {
    console.error(`[${r.status}] ${name} (${r.count} commands, ${r.timems}ms). Log:`);
    if (r.logs) {
      for (const l of r.logs) {
        console.error(prettyPrintLog(l));
      }
    }
  }
}
