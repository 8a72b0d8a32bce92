import { ValidationError } from '../../framework/errors.js';
import { parseNumberTemplate } from '../../framework/format/number_format.js';

/** A bad command line. The CLI prints its usage and exits with 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface RunOptions {
  /** Sweep files, globs, or directories to crawl. */
  paths: string[];
  /** Write one bash file per command here instead of printing. */
  outDir: string | undefined;
  runToken: boolean;
  fileBegin: string;
  fileEnd: string;
  linePrefix: string;
  /** Undefined means a newline when printing, nothing in written files. */
  lineSuffix: string | undefined;
  pvSep: string;
  floatFormat: string;
  listOpen: string;
  listClose: string;
  listSep: string;
  /** Only count the commands of each sweep. */
  countOnly: boolean;
  verbose: boolean;
  debug: boolean;
  printJSON: boolean;
  help: boolean;
}

export const kDefaultRunOptions: Readonly<RunOptions> = {
  paths: [],
  outDir: undefined,
  runToken: false,
  fileBegin: '',
  fileEnd: '',
  linePrefix: '',
  lineSuffix: undefined,
  pvSep: ' ',
  floatFormat: '{}',
  listOpen: '',
  listClose: '',
  listSep: ', ',
  countOnly: false,
  verbose: false,
  debug: false,
  printJSON: false,
  help: false,
};

type StringOption =
  | 'outDir'
  | 'fileBegin'
  | 'fileEnd'
  | 'linePrefix'
  | 'lineSuffix'
  | 'pvSep'
  | 'floatFormat'
  | 'listOpen'
  | 'listClose'
  | 'listSep';
type BooleanOption = 'runToken' | 'countOnly' | 'verbose' | 'debug' | 'printJSON' | 'help';

const kStringFlags: { readonly [flag: string]: StringOption } = {
  '--out-dir': 'outDir',
  '--file-begin': 'fileBegin',
  '--file-end': 'fileEnd',
  '--line-prefix': 'linePrefix',
  '--line-suffix': 'lineSuffix',
  '--pv-sep': 'pvSep',
  '--float-format': 'floatFormat',
  '--list-open': 'listOpen',
  '--list-close': 'listClose',
  '--list-sep': 'listSep',
};

const kBooleanFlags: { readonly [flag: string]: BooleanOption } = {
  '--run-token': 'runToken',
  '--count': 'countOnly',
  '--verbose': 'verbose',
  '--debug': 'debug',
  '--print-json': 'printJSON',
  '--help': 'help',
};

/**
 * Parses command-line arguments (without the node and script entries).
 * String options take their value from the next argument or after `=`.
 */
export function parseRunOptions(argv: readonly string[]): RunOptions {
  const options: RunOptions = { ...kDefaultRunOptions, paths: [] };

  for (let i = 0; i < argv.length; ++i) {
    const a = argv[i];
    if (!a.startsWith('-')) {
      options.paths.push(a);
      continue;
    }

    const eq = a.indexOf('=');
    const flag = eq === -1 ? a : a.slice(0, eq);
    const booleanOption = kBooleanFlags[flag];
    const stringOption = kStringFlags[flag];
    if (booleanOption !== undefined && eq === -1) {
      options[booleanOption] = true;
    } else if (stringOption !== undefined) {
      let value: string;
      if (eq !== -1) {
        value = a.slice(eq + 1);
      } else {
        if (i + 1 >= argv.length) {
          throw new UsageError(`${flag} needs a value`);
        }
        value = argv[++i];
      }
      options[stringOption] = value;
    } else {
      throw new UsageError(`Unknown option ${a}`);
    }
  }

  if (options.runToken && options.outDir === undefined) {
    throw new UsageError('--run-token only applies together with --out-dir');
  }
  try {
    parseNumberTemplate(options.floatFormat);
  } catch (ex) {
    if (ex instanceof ValidationError) {
      throw new UsageError(ex.message);
    }
    throw ex;
  }
  return options;
}
