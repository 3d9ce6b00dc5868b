import { getConfig } from '@rowspace/config';
import type { RealScalar } from './field.js';

/**
 * IEEE-754 double precision. The default tolerance follows
 * ROWSPACE_TOLERANCE (1e-10 unless overridden).
 */
export const float64: RealScalar<number> = {
  name: 'float64',
  zero: 0,
  one: 1,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  neg: (a) => -a,
  equals: (a, b) => a === b,
  fromInteger: (n) => n,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  abs: Math.abs,
  sqrt: Math.sqrt,
  get epsilon() {
    return getConfig().tolerance;
  },
  exact: false,
  toNumber: (a) => a,
};
