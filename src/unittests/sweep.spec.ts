import { ShapeMismatchError } from '../common/framework/errors.js';
import { ArgparseFormatter } from '../common/framework/format/args_formatter.js';
import { param, pgroup } from '../common/framework/params.js';
import { BoundArgs, SweepSpec, isBoundArgs, sweep } from '../common/framework/sweep.js';

import { test } from './harness.js';

function values(args: BoundArgs): unknown[] {
  return args.pvs.map(([, v]) => v);
}

test('the last unit varies fastest', t => {
  const s = sweep(param('a', [0, 1]), param('b', [0, 1, 2]));
  t.deepEqual(Array.from(s).map(values), [
    [0, 0],
    [0, 1],
    [0, 2],
    [1, 0],
    [1, 1],
    [1, 2],
  ]);
});

test('the number of BoundArgs is the product of the unit cardinalities', t => {
  const s = sweep(
    param('a', [1, 2]),
    param('b', ['x', 'y', 'z']),
    pgroup(
      ['c', 'd'],
      [
        [1, 2],
        [3, 4],
      ]
    )
  );
  t.equal(Array.from(s).length, 12);
  t.equal(s.count(), 12);
});

test('values of a group never mix across tuples', t => {
  const names = ['one', 'two', 'three'];
  const s = sweep(
    pgroup(
      ['x', 'y'],
      [
        [1, 'one'],
        [2, 'two'],
        [3, 'three'],
      ]
    ),
    param('z', [true, false])
  );
  let n = 0;
  for (const args of s) {
    const x = args.get('x');
    t.equal(typeof x, 'number');
    if (typeof x === 'number') {
      t.equal(args.get('y'), names[x - 1]);
    }
    n++;
  }
  t.equal(n, 6);
});

test('iterating twice gives the same sequence', t => {
  const s = sweep(
    param('kernel', ['gauss', 'imq']),
    pgroup(
      ['n', 'seed'],
      [
        [100, 1],
        [200, 2],
      ]
    )
  );
  const formatter = new ArgparseFormatter();
  const first = Array.from(s, a => formatter.format(a));
  const second = Array.from(s, a => formatter.format(a));
  t.deepEqual(first, second);
  t.deepEqual(first, [
    '--kernel gauss --n 100 --seed 1',
    '--kernel gauss --n 200 --seed 2',
    '--kernel imq --n 100 --seed 1',
    '--kernel imq --n 200 --seed 2',
  ]);
});

test('stopping early does not affect the next iteration', t => {
  const s = sweep(param('a', [1, 2]), param('b', [1, 2, 3]));
  const it = s[Symbol.iterator]();
  it.next();
  it.next();
  t.equal(Array.from(s).length, 6);
  t.deepEqual(values(it.next().value), [1, 3]);
});

test('pairs are flattened in unit order, then in order within a unit', t => {
  const s = sweep(
    pgroup(['kernel', 'bandwidth'], [['gauss', 0.5]]),
    param('n', [10]),
    pgroup(['lo', 'hi'], [[0, 1]])
  );
  const [args] = Array.from(s);
  t.deepEqual(args.keys(), ['kernel', 'bandwidth', 'n', 'lo', 'hi']);
  t.deepEqual(values(args), ['gauss', 0.5, 10, 0, 1]);
});

test('a spec without units yields one empty BoundArgs', t => {
  const s = new SweepSpec([]);
  const all = Array.from(s);
  t.equal(all.length, 1);
  t.equal(all[0].length, 0);
  t.equal(s.count(), 1);
});

test('a unit without values empties the product', t => {
  const s = sweep(param('a', [1, 2]), param('b', []));
  t.equal(Array.from(s).length, 0);
  t.equal(s.count(), 0);
});

test('a shape mismatch surfaces when the bad tuple is reached', t => {
  const s = sweep(param('a', [1, 2]), pgroup(['x', 'y'], [[1, 2], [3]]));
  const it = s[Symbol.iterator]();
  t.deepEqual(values(it.next().value), [1, 1, 2]);
  t.throws(() => it.next(), ShapeMismatchError);
});

test('BoundArgs.get returns the last value bound to a key', t => {
  const [args] = Array.from(sweep(param('a', [1]), param('b', ['x']), param('a', [2])));
  t.equal(args.length, 3);
  t.equal(args.get('a'), 2);
  t.equal(args.get('b'), 'x');
  t.equal(args.get('c'), undefined);
});

test('BoundArgs keeps a frozen copy of its pairs', t => {
  const p = param('a', [1]);
  const pvs: Array<readonly [typeof p, number]> = [[p, 1]];
  const args = new BoundArgs(pvs);
  pvs.push([p, 2]);
  t.equal(args.length, 1);
  t.ok(Object.isFrozen(args.pvs));
  t.deepEqual(
    Array.from(args, ([q, v]) => [q.key, v]),
    [['a', 1]]
  );
});

test('isBoundArgs checks the shape of a value', t => {
  t.ok(isBoundArgs(new BoundArgs([])));
  t.notOk(isBoundArgs({ pvs: [] }));
  t.notOk(isBoundArgs(null));
  t.notOk(isBoundArgs([]));
});
