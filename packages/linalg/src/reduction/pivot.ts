// ---------------------------------------------------------------------------
// @rowspace/linalg: Elimination primitives
// ---------------------------------------------------------------------------
// Partial-pivot search and elementary row operations shared by row
// reduction, determinant, invertibility and inversion.
// ---------------------------------------------------------------------------

import type { MatrixLike } from '../types.js';
import type { Field, Ordered } from '../scalar/field.js';
import { at, set } from '../storage/matrix.js';

export interface PivotCandidate<T> {
  row: number;
  magnitude: T;
}

/**
 * Row in [fromRow, rows) with the largest |m[row][col]|. Ties keep the
 * lowest row index, so the choice is reproducible.
 */
export function findPivot<T>(
  S: Field<T> & Ordered<T>,
  m: MatrixLike<T>,
  col: number,
  fromRow: number,
): PivotCandidate<T> {
  let best = fromRow;
  let magnitude = S.abs(at(m, fromRow, col));
  for (let i = fromRow + 1; i < m.rows; i++) {
    const candidate = S.abs(at(m, i, col));
    if (S.compare(candidate, magnitude) > 0) {
      magnitude = candidate;
      best = i;
    }
  }
  return { row: best, magnitude };
}

/** row <- row / divisor over columns [fromCol, cols). */
export function divideRow<T>(S: Field<T>, m: MatrixLike<T>, row: number, divisor: T, fromCol = 0): void {
  for (let j = fromCol; j < m.cols; j++) {
    set(m, row, j, S.div(at(m, row, j), divisor));
  }
}

/** target <- target - factor * source over columns [fromCol, cols). */
export function subtractRowMultiple<T>(
  S: Field<T>,
  m: MatrixLike<T>,
  target: number,
  source: number,
  factor: T,
  fromCol = 0,
): void {
  for (let j = fromCol; j < m.cols; j++) {
    set(m, target, j, S.sub(at(m, target, j), S.mul(factor, at(m, source, j))));
  }
}

/** Writes exact zeros into column `col` for rows [fromRow, rows). */
export function clearColumn<T>(S: Field<T>, m: MatrixLike<T>, col: number, fromRow: number): void {
  for (let i = fromRow; i < m.rows; i++) {
    set(m, i, col, S.zero);
  }
}
