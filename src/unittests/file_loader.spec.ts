import * as fs from 'fs';
import * as path from 'path';

import { findSweepFiles, loadSweepFile } from '../common/internal/file_loader.js';

import { type Test, test, withTempDir } from './harness.js';

const kFixtures = path.join(__dirname, 'fixtures');

function touch(dir: string, file: string, content = ''): string {
  const p = path.join(dir, file);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content);
  return p;
}

test('directories are crawled for sweep files', async t => {
  await withTempDir(dir => {
    const a = touch(dir, 'a.sweep.ts');
    const b = touch(dir, 'sub/b.sweep.js');
    touch(dir, 'c.ts');
    touch(dir, 'node_modules/d.sweep.ts');
    t.deepEqual(findSweepFiles([dir]), [a, b]);
    t.deepEqual(findSweepFiles(['.'], dir), [a, b]);
  });
});

test('globs are expanded relative to cwd', async t => {
  await withTempDir(dir => {
    const a = touch(dir, 'a.sweep.ts');
    touch(dir, 'sub/b.sweep.ts');
    t.deepEqual(findSweepFiles(['*.sweep.ts'], dir), [a]);
  });
});

test('plain paths must exist and are listed once', async t => {
  await withTempDir(dir => {
    const a = touch(dir, 'a.sweep.ts');
    t.deepEqual(findSweepFiles(['a.sweep.ts', dir], dir), [a]);
    t.throws(() => findSweepFiles(['missing.sweep.ts'], dir), /Could not find missing\.sweep\.ts/);
  });
});

test('loading a sweep file', async t => {
  const loaded = await loadSweepFile(path.join(kFixtures, 'two_params.sweep.ts'));
  t.equal(loaded.description, 'Two learning rates crossed with two depths.');
  t.equal(loaded.formatter, undefined);
  const keys = Array.from(loaded.sweep, args => args.keys());
  t.deepEqual(keys, [
    ['lr', 'depth'],
    ['lr', 'depth'],
    ['lr', 'depth'],
    ['lr', 'depth'],
  ]);
  t.deepEqual(
    Array.from(loaded.sweep, args => args.get('lr')),
    [0.5, 0.5, 0.25, 0.25]
  );
});

async function rejects(t: Test, p: Promise<unknown>, re: RegExp): Promise<void> {
  try {
    await p;
    t.ok(false, `expected rejection matching ${re}`);
  } catch (ex) {
    t.ok(ex instanceof Error && re.test(ex.message), String(ex));
  }
}

test('malformed sweep files are rejected', async t => {
  await withTempDir(async dir => {
    await rejects(
      t,
      loadSweepFile(touch(dir, 'no_description.sweep.js', 'exports.sweep = [];\n')),
      /^Sweep file missing description: /
    );
    await rejects(
      t,
      loadSweepFile(touch(dir, 'no_sweep.sweep.js', "exports.description = 'x';\n")),
      /^Sweep file missing an iterable `sweep` export: /
    );
    await rejects(
      t,
      loadSweepFile(
        touch(
          dir,
          'bad_formatter.sweep.js',
          "exports.description = 'x';\nexports.sweep = [];\nexports.formatter = {};\n"
        )
      ),
      /^Sweep file `formatter` export has no format\(\): /
    );
  });
});

test('sweeps that yield something else fail when iterated', async t => {
  await withTempDir(async dir => {
    const file = touch(
      dir,
      'numbers.sweep.js',
      "exports.description = 'x';\nexports.sweep = [1];\n"
    );
    const loaded = await loadSweepFile(file);
    t.throws(() => Array.from(loaded.sweep), /produced something other than BoundArgs/);
  });
});
