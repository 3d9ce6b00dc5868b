// ---------------------------------------------------------------------------
// @rowspace/linalg: Supporting arithmetic
// ---------------------------------------------------------------------------
// Element-wise combination, products and comparison. Every function here
// allocates its result and leaves the operands untouched.
// ---------------------------------------------------------------------------

import type { Matrix, MatrixLike, Vector } from '../types.js';
import type { Ring, Scalar } from '../scalar/field.js';
import { isNegligible } from '../scalar/field.js';
import { DimensionMismatchError, assertSquare } from '../errors.js';
import { at, generate, map } from '../storage/matrix.js';
import { vectorAt, vectorFromArray } from '../storage/vector.js';

function checkSameShape(operation: string, a: MatrixLike<unknown>, b: MatrixLike<unknown>): void {
  if (a.rows !== b.rows || a.cols !== b.cols) {
    throw new DimensionMismatchError(operation, `${a.rows}x${a.cols}`, `${b.rows}x${b.cols}`);
  }
}

export function add<T>(S: Ring<T>, a: MatrixLike<T>, b: MatrixLike<T>): Matrix<T> {
  checkSameShape('add', a, b);
  return map(a, (x, i, j) => S.add(x, at(b, i, j)));
}

export function subtract<T>(S: Ring<T>, a: MatrixLike<T>, b: MatrixLike<T>): Matrix<T> {
  checkSameShape('subtract', a, b);
  return map(a, (x, i, j) => S.sub(x, at(b, i, j)));
}

export function scale<T>(S: Ring<T>, m: MatrixLike<T>, factor: T): Matrix<T> {
  return map(m, (x) => S.mul(x, factor));
}

/** Matrix product; inner dimensions must agree: (r x k)(k x c) -> r x c. */
export function multiply<T>(S: Ring<T>, a: MatrixLike<T>, b: MatrixLike<T>): Matrix<T> {
  if (a.cols !== b.rows) {
    throw new DimensionMismatchError(
      'multiply',
      `left cols (${a.cols}) equal to right rows`,
      `${a.rows}x${a.cols} * ${b.rows}x${b.cols}`,
    );
  }
  return generate(a.rows, b.cols, (i, j) => {
    let sum = S.zero;
    for (let k = 0; k < a.cols; k++) {
      sum = S.add(sum, S.mul(at(a, i, k), at(b, k, j)));
    }
    return sum;
  });
}

/** A·v as a new dense vector. */
export function multiplyVector<T>(S: Ring<T>, a: MatrixLike<T>, v: Vector<T>): Vector<T> {
  if (a.cols !== v.size) {
    throw new DimensionMismatchError('multiplyVector', `vector of size ${a.cols}`, `${v.size}`);
  }
  const out: T[] = [];
  for (let i = 0; i < a.rows; i++) {
    let sum = S.zero;
    for (let k = 0; k < a.cols; k++) {
      sum = S.add(sum, S.mul(at(a, i, k), vectorAt(v, k)));
    }
    out.push(sum);
  }
  return vectorFromArray(out);
}

/** Sum of the diagonal. Square matrices only. */
export function trace<T>(S: Ring<T>, m: MatrixLike<T>): T {
  assertSquare('trace', m);
  let sum = S.zero;
  for (let i = 0; i < m.rows; i++) {
    sum = S.add(sum, at(m, i, i));
  }
  return sum;
}

/**
 * Same shape and every |a_ij - b_ij| <= tolerance. For exact scalars the
 * default tolerance makes this structural equality.
 */
export function approxEqual<T>(
  S: Scalar<T>,
  a: MatrixLike<T>,
  b: MatrixLike<T>,
  tolerance: T = S.epsilon,
): boolean {
  if (a.rows !== b.rows || a.cols !== b.cols) return false;
  for (let i = 0; i < a.rows; i++) {
    for (let j = 0; j < a.cols; j++) {
      if (!isNegligible(S, S.sub(at(a, i, j), at(b, i, j)), tolerance)) return false;
    }
  }
  return true;
}

/** Largest |a_ij| (zero for an empty matrix). */
export function maxAbs<T>(S: Scalar<T>, m: MatrixLike<T>): T {
  let best = S.zero;
  for (let i = 0; i < m.rows; i++) {
    for (let j = 0; j < m.cols; j++) {
      const v = S.abs(at(m, i, j));
      if (S.compare(v, best) > 0) best = v;
    }
  }
  return best;
}

/** Right-aligned rows in brackets, one line per row. */
export function formatMatrix<T>(m: MatrixLike<T>, formatValue: (value: T) => string = String): string {
  const cells: string[][] = [];
  let width = 0;
  for (let i = 0; i < m.rows; i++) {
    const row: string[] = [];
    for (let j = 0; j < m.cols; j++) {
      const text = formatValue(at(m, i, j));
      width = Math.max(width, text.length);
      row.push(text);
    }
    cells.push(row);
  }
  return cells.map((row) => '[ ' + row.map((c) => c.padStart(width)).join(' ') + ' ]').join('\n');
}
