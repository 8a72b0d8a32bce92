import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import tape from 'tape';

export type Test = tape.Test;

/** Like tape(), but ends the test once `cb` settles, sync or async. */
export function test(name: string, cb: (t: Test) => void | Promise<void>): void {
  tape(name, async (t: Test) => {
    await cb(t);
    t.end();
  });
}

/** Runs `cb` with a fresh temporary directory and removes it afterwards. */
export async function withTempDir(cb: (dir: string) => void | Promise<void>): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'argsweep-'));
  try {
    await cb(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** A TextSink that keeps everything written to it. */
export class StringSink {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}
