// ---------------------------------------------------------------------------
// @rowspace/linalg: Strided vectors
// ---------------------------------------------------------------------------
// A vector is (buffer, offset, stride, size). Sub-vectors and matrix views
// are new descriptors over the same buffer; nothing here copies unless the
// name says so.
// ---------------------------------------------------------------------------

import type { ScalarBuffer, Vector } from '../types.js';
import type { Field, RealScalar, Ring } from '../scalar/field.js';
import { DimensionMismatchError, IndexOutOfBoundsError } from '../errors.js';

export function vectorFromArray<T>(values: readonly T[]): Vector<T> {
  return { kind: 'vector', size: values.length, buffer: values.slice(), offset: 0, stride: 1 };
}

/**
 * Wraps a buffer without copying. Element k is read from
 * `offset + k * stride`; the last element must lie inside the buffer.
 */
export function vectorFromBuffer<T>(
  buffer: ScalarBuffer<T>,
  size: number = buffer.length,
  offset = 0,
  stride = 1,
): Vector<T> {
  if (!Number.isInteger(size) || size < 0 || !Number.isInteger(offset) || offset < 0 || !Number.isInteger(stride) || stride < 1) {
    throw new DimensionMismatchError(
      'vectorFromBuffer',
      'non-negative size and offset, positive stride',
      `size ${size}, offset ${offset}, stride ${stride}`,
    );
  }
  if (size > 0 && offset + (size - 1) * stride >= buffer.length) {
    throw new DimensionMismatchError(
      'vectorFromBuffer',
      `at least ${offset + (size - 1) * stride + 1} elements`,
      `${buffer.length}`,
    );
  }
  return { kind: 'vector', size, buffer, offset, stride };
}

export function filledVector<T>(size: number, value: T): Vector<T> {
  return vectorFromArray(new Array<T>(size).fill(value));
}

function checkElement(v: Vector<unknown>, k: number): void {
  if (!Number.isInteger(k) || k < 0 || k >= v.size) {
    throw new IndexOutOfBoundsError(`${k}`, `vector of size ${v.size}`);
  }
}

export function vectorAt<T>(v: Vector<T>, k: number): T {
  checkElement(v, k);
  return v.buffer[v.offset + k * v.stride]!;
}

export function vectorSet<T>(v: Vector<T>, k: number, value: T): void {
  checkElement(v, k);
  v.buffer[v.offset + k * v.stride] = value;
}

/** Elements [start, start + length) as a zero-copy vector. */
export function subVector<T>(v: Vector<T>, start: number, length: number): Vector<T> {
  if (!Number.isInteger(start) || !Number.isInteger(length) || start < 0 || length < 0 || start + length > v.size) {
    throw new IndexOutOfBoundsError(`range [${start}, ${start + length})`, `vector of size ${v.size}`);
  }
  return {
    kind: 'vector',
    size: length,
    buffer: v.buffer,
    offset: v.offset + start * v.stride,
    stride: v.stride,
  };
}

export function vectorToArray<T>(v: Vector<T>): T[] {
  const out: T[] = [];
  for (let k = 0; k < v.size; k++) {
    out.push(v.buffer[v.offset + k * v.stride]!);
  }
  return out;
}

export function vectorMapInPlace<T>(v: Vector<T>, fn: (value: T, k: number) => T): void {
  for (let k = 0; k < v.size; k++) {
    const idx = v.offset + k * v.stride;
    v.buffer[idx] = fn(v.buffer[idx]!, k);
  }
}

/** Owned dense copy (offset 0, stride 1). */
export function cloneVector<T>(v: Vector<T>): Vector<T> {
  return vectorFromArray(vectorToArray(v));
}

function checkSameSize(operation: string, a: Vector<unknown>, b: Vector<unknown>): void {
  if (a.size !== b.size) {
    throw new DimensionMismatchError(operation, `vectors of equal size (${a.size})`, `${b.size}`);
  }
}

export function dot<T>(S: Ring<T>, a: Vector<T>, b: Vector<T>): T {
  checkSameSize('dot', a, b);
  let sum = S.zero;
  for (let k = 0; k < a.size; k++) {
    sum = S.add(sum, S.mul(vectorAt(a, k), vectorAt(b, k)));
  }
  return sum;
}

/** Euclidean norm. */
export function norm<T>(S: RealScalar<T>, v: Vector<T>): T {
  return S.sqrt(dot(S, v, v));
}

/**
 * Scales `v` to unit length in place and returns its previous norm.
 * A zero vector is left untouched.
 */
export function normalizeInPlace<T>(S: RealScalar<T>, v: Vector<T>): T {
  const n = norm(S, v);
  if (S.equals(n, S.zero)) return n;
  vectorMapInPlace(v, (x) => S.div(x, n));
  return n;
}

/** Unit-length copy of `v`; a zero vector comes back as a zero copy. */
export function normalize<T>(S: RealScalar<T>, v: Vector<T>): Vector<T> {
  const copy = cloneVector(v);
  normalizeInPlace(S, copy);
  return copy;
}

/** a - b as a new vector. */
export function vectorSub<T>(S: Field<T>, a: Vector<T>, b: Vector<T>): Vector<T> {
  checkSameSize('vectorSub', a, b);
  const out: T[] = [];
  for (let k = 0; k < a.size; k++) {
    out.push(S.sub(vectorAt(a, k), vectorAt(b, k)));
  }
  return vectorFromArray(out);
}

export function vectorScale<T>(S: Ring<T>, v: Vector<T>, factor: T): Vector<T> {
  const copy = cloneVector(v);
  vectorMapInPlace(copy, (x) => S.mul(x, factor));
  return copy;
}
