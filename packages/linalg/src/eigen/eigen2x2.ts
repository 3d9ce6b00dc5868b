/**
 * Closed-form eigenpairs of a 2x2 matrix.
 *
 * The eigenvalues are the roots of λ² - tr·λ + det = 0. A discriminant
 * within tolerance of zero is clamped to zero (repeated real root); below
 * that the pair is complex and reported as real ± imaginary·i.
 */

import type { Eigen2x2Result, MatrixLike, Vector } from '../types.js';
import type { RealScalar } from '../scalar/field.js';
import { checkTolerance, maxOf } from '../scalar/field.js';
import { DimensionMismatchError } from '../errors.js';
import { at } from '../storage/matrix.js';
import { normalize, vectorFromArray } from '../storage/vector.js';

export function eigen2x2<T>(
  S: RealScalar<T>,
  m: MatrixLike<T>,
  options: { tolerance?: T } = {},
): Eigen2x2Result<T> {
  if (m.rows !== 2 || m.cols !== 2) {
    throw new DimensionMismatchError('eigen2x2', 'a 2x2 matrix', `${m.rows}x${m.cols}`);
  }
  const tolerance = checkTolerance(S, options.tolerance ?? S.epsilon);
  const a = at(m, 0, 0);
  const b = at(m, 0, 1);
  const c = at(m, 1, 0);
  const d = at(m, 1, 1);

  const two = S.fromInteger(2);
  const trace = S.add(a, d);
  const det = S.sub(S.mul(a, d), S.mul(b, c));
  const discriminant = S.sub(S.mul(trace, trace), S.mul(S.fromInteger(4), det));

  if (S.compare(discriminant, S.neg(tolerance)) < 0) {
    return {
      kind: 'complex',
      real: S.div(trace, two),
      imaginary: S.div(S.sqrt(S.neg(discriminant)), two),
    };
  }

  const root = S.compare(discriminant, S.zero) > 0 ? S.sqrt(discriminant) : S.zero;
  const larger = S.div(S.add(trace, root), two);
  const smaller = S.div(S.sub(trace, root), two);

  return {
    kind: 'real',
    values: [larger, smaller],
    vectors: [eigenvectorFor(S, a, b, c, d, larger, 0), eigenvectorFor(S, a, b, c, d, smaller, 1)],
  };
}

/**
 * Unit vector in the null space of A - λI. Either row of A - λI gives a
 * candidate, (b, λ - a) or (λ - d, c); the longer one is used. When both
 * vanish A = λI and every vector qualifies, so a basis vector is returned.
 */
function eigenvectorFor<T>(S: RealScalar<T>, a: T, b: T, c: T, d: T, lambda: T, fallback: 0 | 1): Vector<T> {
  const fromTop = [b, S.sub(lambda, a)];
  const fromBottom = [S.sub(lambda, d), c];
  const topLength = squaredLength(S, fromTop);
  const bottomLength = squaredLength(S, fromBottom);
  const best = S.compare(topLength, bottomLength) >= 0 ? fromTop : fromBottom;

  if (S.equals(maxOf(S, topLength, bottomLength), S.zero)) {
    return vectorFromArray(fallback === 0 ? [S.one, S.zero] : [S.zero, S.one]);
  }
  return normalize(S, vectorFromArray(best));
}

function squaredLength<T>(S: RealScalar<T>, values: readonly T[]): T {
  return values.reduce((sum, v) => S.add(sum, S.mul(v, v)), S.zero);
}
