// ---------------------------------------------------------------------------
// @rowspace/linalg: Gauss-Jordan inversion and linear solve
// ---------------------------------------------------------------------------
// [A | I] is reduced with pivots restricted to the left block. Full rank in
// that block means the right block now holds A^-1; anything less means A is
// singular, which is reported as null rather than thrown.
// ---------------------------------------------------------------------------

import type { Matrix, MatrixLike, ReductionOptions, Vector } from '../types.js';
import type { Scalar } from '../scalar/field.js';
import { DimensionMismatchError, assertSquare } from '../errors.js';
import { at, clone, generate, subMatrix } from '../storage/matrix.js';
import { vectorAt, vectorFromArray } from '../storage/vector.js';
import { rowReduceInPlace } from './row-reduce.js';

/**
 * Inverse of a square matrix, or null when it is singular under the
 * tolerance.
 *
 * @throws DimensionMismatchError for non-square input
 */
export function inverse<T>(
  S: Scalar<T>,
  m: MatrixLike<T>,
  options: Pick<ReductionOptions<T>, 'tolerance'> = {},
): Matrix<T> | null {
  assertSquare('inverse', m);
  const n = m.rows;
  const augmented = generate(n, 2 * n, (i, j) =>
    j < n ? at(m, i, j) : j - n === i ? S.one : S.zero,
  );

  const { rank } = rowReduceInPlace(S, augmented, { tolerance: options.tolerance, columnLimit: n });
  if (rank < n) {
    return null;
  }

  // Right block read through a window over the augmented buffer, then compacted.
  return clone(subMatrix(augmented, 0, n, n, n));
}

/**
 * Solves A·x = b for square A. Returns null when A is singular.
 *
 * @throws DimensionMismatchError for non-square A or a mismatched b
 */
export function solve<T>(
  S: Scalar<T>,
  a: MatrixLike<T>,
  b: Vector<T>,
  options: Pick<ReductionOptions<T>, 'tolerance'> = {},
): Vector<T> | null {
  assertSquare('solve', a);
  const n = a.rows;
  if (b.size !== n) {
    throw new DimensionMismatchError('solve', `right-hand side of size ${n}`, `${b.size}`);
  }

  const augmented = generate(n, n + 1, (i, j) => (j < n ? at(a, i, j) : vectorAt(b, i)));
  const { rank } = rowReduceInPlace(S, augmented, { tolerance: options.tolerance, columnLimit: n });
  if (rank < n) {
    return null;
  }

  const x: T[] = [];
  for (let i = 0; i < n; i++) {
    x.push(at(augmented, i, n));
  }
  return vectorFromArray(x);
}
