import type { LogMessage } from './log_message.js';

export type Status = 'running' | 'pass' | 'warn' | 'fail';

export interface SweepResult {
  status: Status;
  /** Number of commands generated. */
  count: number;
  timems: number;
}

export interface LiveSweepResult extends SweepResult {
  logs?: LogMessage[];
}
