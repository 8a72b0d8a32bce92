import * as fs from 'fs';
import * as path from 'path';

import { Logger } from '../common/internal/logging/logger.js';
import { parseRunOptions } from '../common/runtime/helper/options.js';
import { runSweeps } from '../common/runtime/helper/run_sweeps.js';

import { StringSink, test, withTempDir } from './harness.js';

const kFixtures = path.join(__dirname, 'fixtures');

test('commands are printed one per line', async t => {
  const log = new Logger(false);
  const out = new StringSink();
  const names = await runSweeps(parseRunOptions(['two_params.sweep.ts']), {
    log,
    out,
    cwd: kFixtures,
  });
  t.deepEqual(names, ['two_params.sweep.ts']);
  t.equal(
    out.text,
    '--lr 0.5 --depth 2\n--lr 0.5 --depth 4\n--lr 0.25 --depth 2\n--lr 0.25 --depth 4\n'
  );
  const res = log.results.get('two_params.sweep.ts');
  t.equal(res?.status, 'pass');
  t.equal(res?.count, 4);
});

test('formatting options reach the formatter', async t => {
  const out = new StringSink();
  const options = parseRunOptions([
    '--float-format={:.2f}',
    '--pv-sep=,',
    '--line-prefix',
    'train ',
    '--line-suffix=;\n',
    'two_params.sweep.ts',
  ]);
  await runSweeps(options, { log: new Logger(false), out, cwd: kFixtures });
  t.equal(
    out.text,
    'train --lr 0.50,--depth 2;\n' +
      'train --lr 0.50,--depth 4;\n' +
      'train --lr 0.25,--depth 2;\n' +
      'train --lr 0.25,--depth 4;\n'
  );
});

test('--count only counts', async t => {
  const log = new Logger(false);
  const out = new StringSink();
  await runSweeps(parseRunOptions(['--count', '.']), { log, out, cwd: kFixtures });
  t.equal(out.text, '4\ttwo_params.sweep.ts\n');
  t.equal(log.results.get('two_params.sweep.ts')?.count, 4);
});

test('--out-dir writes one file per command', async t => {
  await withTempDir(async dir => {
    const log = new Logger(false);
    const out = new StringSink();
    const jobs = path.join(dir, 'jobs');
    await runSweeps(parseRunOptions(['--out-dir', jobs, '--run-token', 'two_params.sweep.ts']), {
      log,
      out,
      cwd: kFixtures,
    });
    t.equal(out.text, '');
    t.equal(fs.readdirSync(jobs).length, 4);
    const res = log.results.get('two_params.sweep.ts');
    t.equal(res?.status, 'pass');
    t.deepEqual(
      res?.logs?.map(l => l.toJSON()),
      [`INFO: wrote 4 files to ${jobs}`]
    );
  });
});

test('each sweep file gets its own result', async t => {
  await withTempDir(async dir => {
    fs.writeFileSync(path.join(dir, 'broken.sweep.js'), 'exports.sweep = [];\n');
    fs.writeFileSync(
      path.join(dir, 'empty.sweep.js'),
      "exports.description = 'nothing';\nexports.sweep = [];\n"
    );
    const log = new Logger(false);
    const names = await runSweeps(parseRunOptions(['.']), {
      log,
      out: new StringSink(),
      cwd: dir,
    });
    t.deepEqual(names, ['broken.sweep.js', 'empty.sweep.js']);

    const broken = log.results.get('broken.sweep.js');
    t.equal(broken?.status, 'fail');
    t.equal(broken?.logs?.[0].message, `Sweep file missing description: ${dir}/broken.sweep.js`);

    const empty = log.results.get('empty.sweep.js');
    t.equal(empty?.status, 'warn');
    t.equal(empty?.count, 0);
    t.deepEqual(
      empty?.logs?.map(l => l.toJSON()),
      ['WARN: sweep generated no commands']
    );
  });
});

test('finding no sweep files is an error', async t => {
  await withTempDir(async dir => {
    try {
      await runSweeps(parseRunOptions(['.']), {
        log: new Logger(false),
        out: new StringSink(),
        cwd: dir,
      });
      t.fail('expected runSweeps to throw');
    } catch (ex) {
      t.ok(ex instanceof Error && ex.message === 'found no sweep files!', String(ex));
    }
  });
});
