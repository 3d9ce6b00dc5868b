// ---------------------------------------------------------------------------
// @rowspace/linalg: Parametrized views
// ---------------------------------------------------------------------------
// Row, column, diagonal and sub-range views are strided vectors over the
// owner's buffer:
//
//   row i          offset + i*stride        step 1          length cols
//   column j       offset + j               step stride     length rows
//   diagonal       offset                   step stride+1   length min(r, c)
//   sub-diagonal   offset + stride          step stride+1   length min(r, c) - 1
//   super-diagonal offset + 1               step stride+1   length min(r, c) - 1
//
// Views on a Transpose are resolved against its source with the roles of
// rows and columns (and sub/super diagonals) exchanged.
// ---------------------------------------------------------------------------

import type { Matrix, MatrixLike, MatrixView, ViewSelector } from '../types.js';
import { IndexOutOfBoundsError } from '../errors.js';

/** Zero-copy view of `m` described by `selector`. Validated against m's shape. */
export function view<T>(m: MatrixLike<T>, selector: ViewSelector): MatrixView<T> {
  validate(m, selector);
  if (m.kind === 'transpose') {
    return physicalView(m.source, transposeSelector(selector));
  }
  return physicalView(m, selector);
}

export function rowView<T>(m: MatrixLike<T>, index: number): MatrixView<T> {
  return view(m, { kind: 'row', index });
}

export function columnView<T>(m: MatrixLike<T>, index: number): MatrixView<T> {
  return view(m, { kind: 'column', index });
}

export function diagonalView<T>(m: MatrixLike<T>): MatrixView<T> {
  return view(m, { kind: 'diagonal' });
}

/** Number of elements a view of `selector` exposes on an r x c matrix. */
export function viewLength(rows: number, cols: number, selector: ViewSelector): number {
  const diag = Math.min(rows, cols);
  switch (selector.kind) {
    case 'row':
      return cols;
    case 'column':
      return rows;
    case 'diagonal':
      return diag;
    case 'subDiagonal':
    case 'superDiagonal':
      return Math.max(diag - 1, 0);
    case 'subRow':
    case 'subColumn':
      return selector.length;
  }
}

function validate(m: MatrixLike<unknown>, selector: ViewSelector): void {
  const shape = `${m.rows}x${m.cols} matrix`;
  const inRange = (value: number, limit: number) => Number.isInteger(value) && value >= 0 && value < limit;

  switch (selector.kind) {
    case 'row':
      if (!inRange(selector.index, m.rows)) throw new IndexOutOfBoundsError(`row ${selector.index}`, shape);
      return;
    case 'column':
      if (!inRange(selector.index, m.cols)) throw new IndexOutOfBoundsError(`column ${selector.index}`, shape);
      return;
    case 'diagonal':
    case 'subDiagonal':
    case 'superDiagonal':
      return;
    case 'subRow':
      if (!inRange(selector.index, m.rows)) throw new IndexOutOfBoundsError(`row ${selector.index}`, shape);
      checkRange(selector.start, selector.length, m.cols, shape);
      return;
    case 'subColumn':
      if (!inRange(selector.index, m.cols)) throw new IndexOutOfBoundsError(`column ${selector.index}`, shape);
      checkRange(selector.start, selector.length, m.rows, shape);
      return;
  }
}

function checkRange(start: number, length: number, limit: number, shape: string): void {
  if (!Number.isInteger(start) || !Number.isInteger(length) || start < 0 || length < 0 || start + length > limit) {
    throw new IndexOutOfBoundsError(`range [${start}, ${start + length})`, shape);
  }
}

function transposeSelector(selector: ViewSelector): ViewSelector {
  switch (selector.kind) {
    case 'row':
      return { kind: 'column', index: selector.index };
    case 'column':
      return { kind: 'row', index: selector.index };
    case 'diagonal':
      return selector;
    case 'subDiagonal':
      return { kind: 'superDiagonal' };
    case 'superDiagonal':
      return { kind: 'subDiagonal' };
    case 'subRow':
      return { kind: 'subColumn', index: selector.index, start: selector.start, length: selector.length };
    case 'subColumn':
      return { kind: 'subRow', index: selector.index, start: selector.start, length: selector.length };
  }
}

function physicalView<T>(m: Matrix<T>, selector: ViewSelector): MatrixView<T> {
  const size = viewLength(m.rows, m.cols, selector);
  const make = (offset: number, stride: number): MatrixView<T> => ({
    kind: 'vector',
    size,
    buffer: m.buffer,
    offset,
    stride,
    owner: m,
    selector,
  });

  switch (selector.kind) {
    case 'row':
      return make(m.offset + selector.index * m.stride, 1);
    case 'column':
      return make(m.offset + selector.index, m.stride);
    case 'diagonal':
      return make(m.offset, m.stride + 1);
    case 'subDiagonal':
      return make(m.offset + m.stride, m.stride + 1);
    case 'superDiagonal':
      return make(m.offset + 1, m.stride + 1);
    case 'subRow':
      return make(m.offset + selector.index * m.stride + selector.start, 1);
    case 'subColumn':
      return make(m.offset + selector.start * m.stride + selector.index, m.stride);
  }
}
