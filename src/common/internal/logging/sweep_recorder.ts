import { assert, now } from '../../util/util.js';

import { LogMessage } from './log_message.js';
import type { LiveSweepResult } from './result.js';

enum LogSeverity {
  Pass = 0,
  Warn = 1,
  ThrewException = 2,
}

const kMaxLogStacks = 2;

/** Holds onto a LiveSweepResult owned by the Logger, and writes the results into it. */
export class SweepRecorder {
  private result: LiveSweepResult;
  private maxLogSeverity = LogSeverity.Pass;
  private startTime = -1;
  private count = 0;
  private logs: LogMessage[] = [];
  private logLinesAtCurrentSeverity = 0;
  private debugging = false;
  private messagesByStack = new Map<string, LogMessage>();

  constructor(result: LiveSweepResult, debugging: boolean) {
    this.result = result;
    this.debugging = debugging;
  }

  start(): void {
    assert(this.startTime < 0, 'SweepRecorder cannot be reused');
    this.startTime = now();
  }

  finish(): void {
    assert(this.startTime >= 0, 'finish() before start()');

    const timeMilliseconds = now() - this.startTime;
    // Round to next microsecond to avoid storing useless .xxxx00000000000002 in results.
    this.result.timems = Math.ceil(timeMilliseconds * 1000) / 1000;
    this.result.count = this.count;

    this.result.status =
      this.maxLogSeverity === LogSeverity.Pass
        ? 'pass'
        : this.maxLogSeverity === LogSeverity.Warn
        ? 'warn'
        : 'fail';

    this.result.logs = this.logs;
  }

  setCount(count: number): void {
    this.count = count;
  }

  info(msg: string): void {
    this.logImpl(LogSeverity.Pass, new LogMessage('INFO', msg));
  }

  debug(msg: string): void {
    if (this.debugging) {
      this.logImpl(LogSeverity.Pass, new LogMessage('DEBUG', msg));
    }
  }

  warn(msg: string): void {
    this.logImpl(LogSeverity.Warn, new LogMessage('WARN', msg));
  }

  threw(ex: unknown): void {
    const logMessage =
      ex instanceof Error
        ? new LogMessage('EXCEPTION', ex.message, ex.stack)
        : new LogMessage('EXCEPTION', String(ex));
    this.logImpl(LogSeverity.ThrewException, logMessage);
  }

  private logImpl(level: LogSeverity, logMessage: LogMessage): void {
    // The same exception thrown again is counted on its first message.
    if (logMessage.stack !== undefined) {
      const seen = this.messagesByStack.get(logMessage.stack);
      if (seen) {
        seen.repeated();
        return;
      }
      this.messagesByStack.set(logMessage.stack, logMessage);
    }

    // Only the first few logs at the highest severity keep their stacks.
    if (level > this.maxLogSeverity) {
      this.logLinesAtCurrentSeverity = 0;
      this.maxLogSeverity = level;
    }
    if (level < this.maxLogSeverity || this.logLinesAtCurrentSeverity >= kMaxLogStacks) {
      if (!this.debugging) {
        logMessage.hideStack();
      }
    }
    this.logs.push(logMessage);
    this.logLinesAtCurrentSeverity++;
  }
}
