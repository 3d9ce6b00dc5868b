import type { Lens, MatrixLike } from '../types.js';
import { at, set } from '../storage/matrix.js';
import { IndexOutOfBoundsError } from '../errors.js';

/**
 * Per-row accessor closures. Works on transposes as well as matrices,
 * since it addresses through `at`/`set` rather than the buffer.
 */
export function lens<T>(m: MatrixLike<T>, row: number): Lens<T> {
  if (!Number.isInteger(row) || row < 0 || row >= m.rows) {
    throw new IndexOutOfBoundsError(`row ${row}`, `${m.rows}x${m.cols} matrix`);
  }
  const checkCol = (col: number) => {
    if (!Number.isInteger(col) || col < 0 || col >= m.cols) {
      throw new IndexOutOfBoundsError(`column ${col}`, `lens over row ${row} of length ${m.cols}`);
    }
  };
  return {
    row,
    length: m.cols,
    get(col) {
      checkCol(col);
      return at(m, row, col);
    },
    set(col, value) {
      checkCol(col);
      set(m, row, col, value);
    },
    toArray() {
      const out: T[] = [];
      for (let j = 0; j < m.cols; j++) out.push(at(m, row, j));
      return out;
    },
  };
}

/** One lens per row, in order. */
export function lenses<T>(m: MatrixLike<T>): Lens<T>[] {
  const out: Lens<T>[] = [];
  for (let i = 0; i < m.rows; i++) out.push(lens(m, i));
  return out;
}
