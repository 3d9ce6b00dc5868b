/**
 * O(1) logical transpose.
 *
 * No data moves: a Transpose re-reads its source with (i, j) swapped, and
 * transposing a Transpose returns the original Matrix object. `materialize`
 * is the only way to get a physically transposed buffer.
 */

import type { Matrix, MatrixLike, Transpose } from '../types.js';
import { at, generate } from '../storage/matrix.js';

export function transpose<T>(m: Matrix<T>): Transpose<T>;
export function transpose<T>(m: Transpose<T>): Matrix<T>;
export function transpose<T>(m: MatrixLike<T>): MatrixLike<T>;
export function transpose<T>(m: MatrixLike<T>): MatrixLike<T> {
  if (m.kind === 'transpose') {
    return m.source;
  }
  return { kind: 'transpose', source: m, rows: m.cols, cols: m.rows };
}

/** Owned dense matrix holding the logical contents of `m`. */
export function materialize<T>(m: MatrixLike<T>): Matrix<T> {
  return generate(m.rows, m.cols, (i, j) => at(m, i, j));
}

export function isTranspose<T>(m: MatrixLike<T>): m is Transpose<T> {
  return m.kind === 'transpose';
}
