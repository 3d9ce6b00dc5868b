// ---------------------------------------------------------------------------
// @rowspace/linalg: Strided matrix storage
// ---------------------------------------------------------------------------
// Construction, bounds-checked element access, zero-copy windows, row and
// column exchange, and the single in-place mapping primitive that every
// value-returning transform is built on (`withCopy`).
//
// All buffer addressing goes through `offset + i * stride + j`, never
// `i * cols + j`, so windows and padded layouts behave like dense ones.
// ---------------------------------------------------------------------------

import type { Matrix, MatrixLike, ScalarBuffer } from '../types.js';
import type { Ring } from '../scalar/field.js';
import { DimensionMismatchError, IndexOutOfBoundsError } from '../errors.js';

export interface Layout {
  /** Row pitch (default: cols) */
  stride?: number;
  /** Index of element (0, 0) in the buffer (default: 0) */
  offset?: number;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function checkShape(operation: string, rows: number, cols: number): void {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 0 || cols < 0) {
    throw new DimensionMismatchError(operation, 'non-negative integer dimensions', `${rows}x${cols}`);
  }
}

/**
 * Wraps an existing buffer without copying.
 *
 * Without an explicit layout the buffer must hold exactly rows * cols
 * elements. With a stride or offset it must cover the strided extent.
 */
export function matrixFromBuffer<T>(
  rows: number,
  cols: number,
  buffer: ScalarBuffer<T>,
  layout: Layout = {},
): Matrix<T> {
  checkShape('matrixFromBuffer', rows, cols);
  const stride = layout.stride ?? cols;
  const offset = layout.offset ?? 0;

  if (layout.stride === undefined && layout.offset === undefined) {
    if (buffer.length !== rows * cols) {
      throw new DimensionMismatchError(
        'matrixFromBuffer',
        `${rows * cols} elements for ${rows}x${cols}`,
        `${buffer.length}`,
      );
    }
  } else {
    if (!Number.isInteger(stride) || stride < cols) {
      throw new DimensionMismatchError('matrixFromBuffer', `stride >= ${cols}`, `${stride}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new DimensionMismatchError('matrixFromBuffer', 'non-negative offset', `${offset}`);
    }
    const extent = rows === 0 ? offset : offset + (rows - 1) * stride + cols;
    if (buffer.length < extent) {
      throw new DimensionMismatchError(
        'matrixFromBuffer',
        `at least ${extent} elements for ${rows}x${cols} (stride ${stride}, offset ${offset})`,
        `${buffer.length}`,
      );
    }
  }

  return { kind: 'matrix', rows, cols, buffer, stride, offset };
}

/**
 * Copies nested rows into a dense matrix. An empty list yields a 0 x cols
 * matrix (cols defaults to 0).
 */
export function matrixFromRows<T>(rows: readonly (readonly T[])[], cols?: number): Matrix<T> {
  const c = rows[0]?.length ?? cols ?? 0;
  const data: T[] = [];
  rows.forEach((row, i) => {
    if (row.length !== c) {
      throw new DimensionMismatchError('matrixFromRows', `row ${i} of length ${c}`, `${row.length}`);
    }
    data.push(...row);
  });
  return matrixFromBuffer(rows.length, c, data);
}

/** Dense matrix whose (i, j) entry is `fn(i, j)`. */
export function generate<T>(rows: number, cols: number, fn: (i: number, j: number) => T): Matrix<T> {
  checkShape('generate', rows, cols);
  const data: T[] = new Array<T>(rows * cols);
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      data[i * cols + j] = fn(i, j);
    }
  }
  return matrixFromBuffer(rows, cols, data);
}

export function fill<T>(rows: number, cols: number, value: T): Matrix<T> {
  return generate(rows, cols, () => value);
}

export function zeros<T>(S: Ring<T>, rows: number, cols: number): Matrix<T> {
  return fill(rows, cols, S.zero);
}

export function identity<T>(S: Ring<T>, n: number): Matrix<T> {
  return generate(n, n, (i, j) => (i === j ? S.one : S.zero));
}

// ---------------------------------------------------------------------------
// Element access
// ---------------------------------------------------------------------------

function checkIndex(m: MatrixLike<unknown>, i: number, j: number): void {
  if (!(i >= 0 && i < m.rows && j >= 0 && j < m.cols) || !Number.isInteger(i) || !Number.isInteger(j)) {
    throw new IndexOutOfBoundsError(`(${i}, ${j})`, `${m.rows}x${m.cols} matrix`);
  }
}

/** Buffer index of (i, j) on a physical matrix. No bounds check. */
export function bufferIndex(m: Matrix<unknown>, i: number, j: number): number {
  return m.offset + i * m.stride + j;
}

export function at<T>(m: MatrixLike<T>, i: number, j: number): T {
  checkIndex(m, i, j);
  if (m.kind === 'transpose') {
    const src = m.source;
    return src.buffer[bufferIndex(src, j, i)]!;
  }
  return m.buffer[bufferIndex(m, i, j)]!;
}

export function set<T>(m: MatrixLike<T>, i: number, j: number, value: T): void {
  checkIndex(m, i, j);
  if (m.kind === 'transpose') {
    const src = m.source;
    src.buffer[bufferIndex(src, j, i)] = value;
    return;
  }
  m.buffer[bufferIndex(m, i, j)] = value;
}

// ---------------------------------------------------------------------------
// Zero-copy windows
// ---------------------------------------------------------------------------

/**
 * Window of `rows x cols` starting at (row, col), sharing the owner's
 * buffer. Writes through the window are visible in the owner.
 */
export function subMatrix<T>(
  m: Matrix<T>,
  row: number,
  col: number,
  rows: number,
  cols: number,
): Matrix<T> {
  checkShape('subMatrix', rows, cols);
  if (row < 0 || col < 0 || row + rows > m.rows || col + cols > m.cols) {
    throw new IndexOutOfBoundsError(
      `window (${row}, ${col}) of ${rows}x${cols}`,
      `${m.rows}x${m.cols} matrix`,
    );
  }
  return {
    kind: 'matrix',
    rows,
    cols,
    buffer: m.buffer,
    stride: m.stride,
    offset: m.offset + row * m.stride + col,
  };
}

// ---------------------------------------------------------------------------
// Row / column exchange
// ---------------------------------------------------------------------------

function checkRow(m: MatrixLike<unknown>, i: number): void {
  if (!Number.isInteger(i) || i < 0 || i >= m.rows) {
    throw new IndexOutOfBoundsError(`row ${i}`, `${m.rows}x${m.cols} matrix`);
  }
}

function checkColumn(m: MatrixLike<unknown>, j: number): void {
  if (!Number.isInteger(j) || j < 0 || j >= m.cols) {
    throw new IndexOutOfBoundsError(`column ${j}`, `${m.rows}x${m.cols} matrix`);
  }
}

/** Exchanges two rows in place. O(cols). */
export function swapRows<T>(m: MatrixLike<T>, a: number, b: number): void {
  checkRow(m, a);
  checkRow(m, b);
  if (a === b) return;
  if (m.kind === 'transpose') {
    exchangeColumns(m.source, a, b);
    return;
  }
  exchangeRows(m, a, b);
}

/** Exchanges two columns in place. O(rows). */
export function swapColumns<T>(m: MatrixLike<T>, a: number, b: number): void {
  checkColumn(m, a);
  checkColumn(m, b);
  if (a === b) return;
  if (m.kind === 'transpose') {
    exchangeRows(m.source, a, b);
    return;
  }
  exchangeColumns(m, a, b);
}

function exchangeRows<T>(m: Matrix<T>, a: number, b: number): void {
  const buf = m.buffer;
  let ia = bufferIndex(m, a, 0);
  let ib = bufferIndex(m, b, 0);
  for (let j = 0; j < m.cols; j++, ia++, ib++) {
    const tmp = buf[ia]!;
    buf[ia] = buf[ib]!;
    buf[ib] = tmp;
  }
}

function exchangeColumns<T>(m: Matrix<T>, a: number, b: number): void {
  const buf = m.buffer;
  for (let i = 0; i < m.rows; i++) {
    const ia = bufferIndex(m, i, a);
    const ib = bufferIndex(m, i, b);
    const tmp = buf[ia]!;
    buf[ia] = buf[ib]!;
    buf[ib] = tmp;
  }
}

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/** Overwrites every element with `fn(value, i, j)`. */
export function mapInPlace<T>(m: MatrixLike<T>, fn: (value: T, i: number, j: number) => T): void {
  for (let i = 0; i < m.rows; i++) {
    for (let j = 0; j < m.cols; j++) {
      set(m, i, j, fn(at(m, i, j), i, j));
    }
  }
}

/** Dense, owned copy with stride = cols and offset 0. */
export function clone<T>(m: MatrixLike<T>): Matrix<T> {
  return generate(m.rows, m.cols, (i, j) => at(m, i, j));
}

/**
 * Applies an in-place mutation to a fresh copy and returns the copy.
 * The input is never modified.
 */
export function withCopy<T>(m: MatrixLike<T>, mutate: (copy: Matrix<T>) => void): Matrix<T> {
  const copy = clone(m);
  mutate(copy);
  return copy;
}

export function map<T>(m: MatrixLike<T>, fn: (value: T, i: number, j: number) => T): Matrix<T> {
  return withCopy(m, (copy) => mapInPlace(copy, fn));
}

export function toRows<T>(m: MatrixLike<T>): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < m.rows; i++) {
    const row: T[] = [];
    for (let j = 0; j < m.cols; j++) {
      row.push(at(m, i, j));
    }
    out.push(row);
  }
  return out;
}
