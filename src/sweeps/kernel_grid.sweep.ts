export const description = `
Kernel two-sample test: two kernels, each with the bandwidth that suits it, crossed with the
sample sizes and the random seeds.
`;

import { SweepSpec, param, pgroup } from '../common/framework/index.js';

export const sweep = new SweepSpec([
  pgroup(
    ['kernel', 'bandwidth'],
    [
      ['gauss', 0.5],
      ['imq', 1.25],
    ],
    [undefined, '--bw']
  ),
  param('n', [200, 400, 800]),
  param('seed', [1, 2], '--random-seed'),
]);
