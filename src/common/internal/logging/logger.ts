import type { LiveSweepResult } from './result.js';
import { SweepRecorder } from './sweep_recorder.js';

export type LogResults = Map<string, LiveSweepResult>;

/** Collects the result of every sweep run in one session, keyed by sweep name. */
export class Logger {
  static globalDebugMode: boolean = false;

  readonly debug: boolean;
  readonly results: LogResults = new Map();

  constructor(debug: boolean = Logger.globalDebugMode) {
    this.debug = debug;
  }

  record(name: string): [SweepRecorder, LiveSweepResult] {
    const result: LiveSweepResult = { status: 'running', count: 0, timems: -1 };
    this.results.set(name, result);
    return [new SweepRecorder(result, this.debug), result];
  }

  asJSON(space?: number): string {
    return JSON.stringify({ results: Array.from(this.results) }, undefined, space);
  }
}
