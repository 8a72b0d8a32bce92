import { extractImportantStackTrace } from '../../util/stack.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'EXCEPTION';

/** One entry of a sweep's log. Only exceptions carry a stack. */
export class LogMessage {
  readonly level: LogLevel;
  readonly message: string;
  /** Raw stack of the exception, also used to recognize repeats of it. */
  readonly stack: string | undefined;
  private showStack: boolean;
  private repeats = 0;

  constructor(level: LogLevel, message: string, stack?: string) {
    this.level = level;
    this.message = message;
    this.stack = stack;
    this.showStack = stack !== undefined;
  }

  hideStack(): void {
    this.showStack = false;
  }

  /** Counts one more exception with an identical stack. */
  repeated(): void {
    this.repeats++;
  }

  toJSON(): string {
    let m: string = this.level;
    if (this.message) m += ': ' + this.message;
    if (this.showStack && this.stack !== undefined) {
      m += '\n' + extractImportantStackTrace(this.stack);
    }
    if (this.repeats > 0) {
      m += `\n(seen ${this.repeats + 1} times with identical stack)`;
    }
    return m;
  }
}

/** Message for the console: every line after the first indented by two spaces. */
export function prettyPrintLog(log: LogMessage): string {
  return '  - ' + log.toJSON().replace(/\n/g, '\n    ');
}
