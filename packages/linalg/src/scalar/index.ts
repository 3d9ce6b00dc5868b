export type {
  Ring,
  Field,
  Ordered,
  Tolerant,
  Sqrt,
  Scalar,
  RealScalar,
} from './field.js';
export { isNegligible, maxOf, checkTolerance } from './field.js';
export { float64 } from './float64.js';
export {
  rational,
  rationalScalar,
  rationalToNumber,
  formatRational,
  type Rational,
} from './rational.js';
