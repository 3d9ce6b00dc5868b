// ---------------------------------------------------------------------------
// @rowspace/linalg: Determinant and invertibility
// ---------------------------------------------------------------------------
// Elimination: forward pass of the row-reduction pivoting without
// normalization. det = (-1)^swaps * product of pivots; a negligible pivot
// means det = 0.
//
// Cofactor: Laplace expansion along the first row. Exponential in n, so
// 'auto' only picks it for exact scalars up to COFACTOR_LIMIT.
// ---------------------------------------------------------------------------

import type { DeterminantOptions, Matrix, MatrixLike } from '../types.js';
import type { Ring, Scalar } from '../scalar/field.js';
import { checkTolerance, isNegligible } from '../scalar/field.js';
import { assertSquare } from '../errors.js';
import { at, clone, generate, swapRows } from '../storage/matrix.js';
import { findPivot, subtractRowMultiple } from './pivot.js';

/** Largest order for which 'auto' uses cofactor expansion on exact scalars. */
export const COFACTOR_LIMIT = 4;

/**
 * Determinant of a square matrix. 0x0 yields `one`.
 *
 * @throws DimensionMismatchError for non-square input
 */
export function determinant<T>(
  S: Scalar<T>,
  m: MatrixLike<T>,
  options: DeterminantOptions<T> = {},
): T {
  assertSquare('determinant', m);
  const method = options.method ?? 'auto';

  if (method === 'cofactor' || (method === 'auto' && S.exact && m.rows <= COFACTOR_LIMIT)) {
    return cofactorDeterminant(S, m);
  }
  return eliminationDeterminant(S, m, checkTolerance(S, options.tolerance ?? S.epsilon));
}

function eliminationDeterminant<T>(S: Scalar<T>, m: MatrixLike<T>, tolerance: T): T {
  let det = S.one;
  const complete = forwardEliminate(S, clone(m), tolerance, (pivot, swapped) => {
    det = S.mul(swapped ? S.neg(det) : det, pivot);
  });
  return complete ? det : S.zero;
}

/**
 * Reduces `work` to upper-triangular form in place, reporting each pivot
 * and whether a row exchange preceded it. Returns false, leaving the rest
 * of the matrix unreduced, at the first column without a usable pivot.
 */
function forwardEliminate<T>(
  S: Scalar<T>,
  work: Matrix<T>,
  tolerance: T,
  onPivot: (pivot: T, swapped: boolean) => void,
): boolean {
  const n = work.rows;
  for (let c = 0; c < n; c++) {
    const { row: p, magnitude } = findPivot(S, work, c, c);
    if (isNegligible(S, magnitude, tolerance)) {
      return false;
    }
    if (p !== c) {
      swapRows(work, p, c);
    }

    const pivot = at(work, c, c);
    onPivot(pivot, p !== c);

    for (let i = c + 1; i < n; i++) {
      const entry = at(work, i, c);
      if (S.equals(entry, S.zero)) continue;
      subtractRowMultiple(S, work, i, c, S.div(entry, pivot), c);
    }
  }
  return true;
}

/** Laplace expansion along row 0. Needs only ring operations. */
export function cofactorDeterminant<T>(S: Ring<T>, m: MatrixLike<T>): T {
  assertSquare('cofactorDeterminant', m);
  const n = m.rows;
  if (n === 0) return S.one;
  if (n === 1) return at(m, 0, 0);
  if (n === 2) {
    return S.sub(S.mul(at(m, 0, 0), at(m, 1, 1)), S.mul(at(m, 0, 1), at(m, 1, 0)));
  }

  let det = S.zero;
  for (let j = 0; j < n; j++) {
    const entry = at(m, 0, j);
    if (S.equals(entry, S.zero)) continue;
    const minor = generate(n - 1, n - 1, (i, k) => at(m, i + 1, k < j ? k : k + 1));
    const term = S.mul(entry, cofactorDeterminant(S, minor));
    det = j % 2 === 0 ? S.add(det, term) : S.sub(det, term);
  }
  return det;
}

/**
 * Forward-elimination pass that stops at the first missing pivot.
 *
 * @throws DimensionMismatchError for non-square input
 */
export function isInvertible<T>(
  S: Scalar<T>,
  m: MatrixLike<T>,
  options: Pick<DeterminantOptions<T>, 'tolerance'> = {},
): boolean {
  assertSquare('isInvertible', m);
  const tolerance = checkTolerance(S, options.tolerance ?? S.epsilon);
  return forwardEliminate(S, clone(m), tolerance, () => {});
}
