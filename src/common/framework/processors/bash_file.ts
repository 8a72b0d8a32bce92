import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { simpleObjectHash } from '../../util/util.js';
import { assertValid } from '../errors.js';
import { type ArgsFormatter, ArgparseFormatter } from '../format/args_formatter.js';
import type { BoundArgs } from '../sweep.js';

import type { ArgsProcessor } from './processor.js';

export type FileNameFn = (args: BoundArgs) => string;

export interface BashFileProcessorOptions {
  /**
   * Wrap each command so it only runs while its token file (`<file>.token`) does not exist,
   * and create the token once the command exits with status 0.
   */
  createRunToken?: boolean;
  formatter?: ArgsFormatter;
  /** Written at the beginning of every file, e.g. `'#!/bin/bash'`. */
  fileBegin?: string;
  fileEnd?: string;
  /** Written before the command. */
  lineBegin?: string;
  lineEnd?: string;
  /** Names the file of each command. Default: 14 hex digits of the command's SHA-1, plus `.sh`. */
  fileName?: FileNameFn;
}

const kShellSafe = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function quoteShellArg(s: string): string {
  return kShellSafe.test(s) ? s : `'` + s.replace(/'/g, `'\\''`) + `'`;
}

export function wrapRunTokenBlock(content: string, tokenPath: string): string {
  const token = quoteShellArg(tokenPath);
  return [
    `if [ ! -f ${token} ]; then`,
    '',
    content,
    '',
    '    if [ $? -eq 0 ]; then',
    `        touch ${token}`,
    '    fi',
    'fi',
  ].join(os.EOL);
}

/**
 * Writes each command into its own bash script in `dirpath`, e.g. to build job files for a
 * computing cluster.
 */
export class BashFileProcessor implements ArgsProcessor {
  readonly dirpath: string;
  readonly createRunToken: boolean;
  readonly formatter: ArgsFormatter;
  readonly fileBegin: string;
  readonly fileEnd: string;
  readonly lineBegin: string;
  readonly lineEnd: string;
  readonly fileName: FileNameFn;

  constructor(
    dirpath: string,
    {
      createRunToken = false,
      formatter = new ArgparseFormatter(),
      fileBegin = '',
      fileEnd = '',
      lineBegin = '',
      lineEnd = '',
      fileName,
    }: BashFileProcessorOptions = {}
  ) {
    assertValid(
      !fs.existsSync(dirpath) || fs.statSync(dirpath).isDirectory(),
      `The specified dirpath is a file: ${dirpath}. Has to be a directory`
    );
    fs.mkdirSync(dirpath, { recursive: true });

    this.dirpath = dirpath;
    this.createRunToken = createRunToken;
    this.formatter = formatter;
    this.fileBegin = fileBegin;
    this.fileEnd = fileEnd;
    this.lineBegin = lineBegin;
    this.lineEnd = lineEnd;
    this.fileName =
      fileName ?? (args => simpleObjectHash(formatter.format(args)).slice(0, 14) + '.sh');
  }

  /** Full text of the script for one command. */
  fileContent(args: BoundArgs, fname: string): string {
    let line = this.lineBegin + this.formatter.format(args) + this.lineEnd;
    if (this.createRunToken) {
      const tokenPath = path.resolve(this.dirpath, fname + '.token');
      line = wrapRunTokenBlock(line, tokenPath);
    }
    return this.fileBegin + os.EOL + line + os.EOL + this.fileEnd;
  }

  process(args: Iterable<BoundArgs>): number {
    let count = 0;
    for (const ia of args) {
      const fname = this.fileName(ia);
      const content = this.fileContent(ia, fname);
      fs.writeFileSync(path.join(this.dirpath, fname), content);
      count++;
    }
    return count;
  }
}
