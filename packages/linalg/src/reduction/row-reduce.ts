// ---------------------------------------------------------------------------
// @rowspace/linalg: Row-reduction engine
// ---------------------------------------------------------------------------
// Gauss-Jordan elimination with partial pivoting to reduced row-echelon
// form. For each column, the largest-magnitude candidate at or below the
// current pivot row is swapped up, scaled to 1 and eliminated from every
// other row. A column whose best candidate is negligible has no pivot: its
// candidates are zeroed and the pivot row stays put. Pivot count = rank.
// ---------------------------------------------------------------------------

import type { MatrixLike, ReductionOptions, RowReduction } from '../types.js';
import type { Scalar } from '../scalar/field.js';
import { checkTolerance, isNegligible } from '../scalar/field.js';
import { InvalidArgumentError } from '../errors.js';
import { at, clone, set, swapRows } from '../storage/matrix.js';
import { clearColumn, divideRow, findPivot, subtractRowMultiple } from './pivot.js';

export type ReductionSummary = Omit<RowReduction<unknown>, 'matrix'>;

/**
 * Reduces `m` to RREF in place and reports pivots, rank and swaps.
 * Non-square input is fine; a zero column is rank deficiency, not an error.
 */
export function rowReduceInPlace<T>(
  S: Scalar<T>,
  m: MatrixLike<T>,
  options: ReductionOptions<T> = {},
): ReductionSummary {
  const tolerance = checkTolerance(S, options.tolerance ?? S.epsilon);
  const limit = options.columnLimit ?? m.cols;
  if (!Number.isInteger(limit) || limit < 0 || limit > m.cols) {
    throw new InvalidArgumentError('columnLimit', `must be an integer in [0, ${m.cols}], got ${limit}`);
  }

  const pivotColumns: number[] = [];
  let swaps = 0;
  let r = 0;

  for (let c = 0; c < limit && r < m.rows; c++) {
    const { row: p, magnitude } = findPivot(S, m, c, r);

    if (isNegligible(S, magnitude, tolerance)) {
      clearColumn(S, m, c, r);
      continue;
    }

    if (p !== r) {
      swapRows(m, p, r);
      swaps++;
    }

    divideRow(S, m, r, at(m, r, c), c);
    set(m, r, c, S.one);

    for (let i = 0; i < m.rows; i++) {
      if (i === r) continue;
      const factor = at(m, i, c);
      if (S.equals(factor, S.zero)) continue;
      subtractRowMultiple(S, m, i, r, factor, c);
      set(m, i, c, S.zero);
    }

    pivotColumns.push(c);
    r++;
  }

  return { pivotColumns, rank: pivotColumns.length, swaps };
}

/** RREF of a copy of `m`; the input is left untouched. */
export function rowReduce<T>(
  S: Scalar<T>,
  m: MatrixLike<T>,
  options: ReductionOptions<T> = {},
): RowReduction<T> {
  const matrix = clone(m);
  const summary = rowReduceInPlace(S, matrix, options);
  return { matrix, ...summary };
}

/** Number of pivots found by row reduction. rank(0) = 0. */
export function rank<T>(S: Scalar<T>, m: MatrixLike<T>, options: Pick<ReductionOptions<T>, 'tolerance'> = {}): number {
  return rowReduce(S, m, options).rank;
}
