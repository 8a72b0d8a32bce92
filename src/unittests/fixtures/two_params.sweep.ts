export const description = `
Two learning rates crossed with two depths.
`;

import { SweepSpec, param } from '../../common/framework/index.js';

export const sweep = new SweepSpec([param('lr', [0.5, 0.25]), param('depth', [2, 4])]);
