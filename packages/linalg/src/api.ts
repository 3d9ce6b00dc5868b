// ---------------------------------------------------------------------------
// @rowspace/linalg: Scalar-bound API
// ---------------------------------------------------------------------------
// The free functions take their scalar dictionary as the first argument.
// `createLinalg` closes over one dictionary so call sites read
// `f64.determinant(m)`. Operations that need a square root exist only on
// the bound API of a RealScalar.
// ---------------------------------------------------------------------------

import type {
  DeterminantOptions,
  EigenDecomposition,
  Eigen2x2Result,
  EigenOptions,
  Matrix,
  MatrixLike,
  PowerIterationOptions,
  PowerIterationResult,
  QrAlgorithmOptions,
  QrDecomposition,
  QrOptions,
  ReductionOptions,
  RowReduction,
  Vector,
} from './types.js';
import type { RealScalar, Scalar } from './scalar/field.js';
import { float64 } from './scalar/float64.js';
import { rationalScalar, type Rational } from './scalar/rational.js';
import { identity, matrixFromRows, zeros } from './storage/matrix.js';
import { dot, norm, normalize, vectorFromArray } from './storage/vector.js';
import { add, approxEqual, multiply, multiplyVector, scale, subtract, trace } from './ops/arithmetic.js';
import { rank, rowReduce } from './reduction/row-reduce.js';
import { determinant, isInvertible } from './reduction/determinant.js';
import { inverse, solve } from './reduction/inverse.js';
import { qrDecompose } from './eigen/qr.js';
import { eigen2x2 } from './eigen/eigen2x2.js';
import { powerIteration } from './eigen/power-iteration.js';
import { qrAlgorithm } from './eigen/qr-algorithm.js';
import { eigen } from './eigen/eigen.js';

type Tolerance<T> = { tolerance?: T };

export interface Linalg<T> {
  readonly scalar: Scalar<T>;
  matrix(rows: readonly (readonly T[])[], cols?: number): Matrix<T>;
  vector(values: readonly T[]): Vector<T>;
  zeros(rows: number, cols: number): Matrix<T>;
  identity(n: number): Matrix<T>;
  add(a: MatrixLike<T>, b: MatrixLike<T>): Matrix<T>;
  subtract(a: MatrixLike<T>, b: MatrixLike<T>): Matrix<T>;
  scale(m: MatrixLike<T>, factor: T): Matrix<T>;
  multiply(a: MatrixLike<T>, b: MatrixLike<T>): Matrix<T>;
  multiplyVector(a: MatrixLike<T>, v: Vector<T>): Vector<T>;
  dot(a: Vector<T>, b: Vector<T>): T;
  trace(m: MatrixLike<T>): T;
  approxEqual(a: MatrixLike<T>, b: MatrixLike<T>, tolerance?: T): boolean;
  rowReduce(m: MatrixLike<T>, options?: ReductionOptions<T>): RowReduction<T>;
  rank(m: MatrixLike<T>, options?: Tolerance<T>): number;
  determinant(m: MatrixLike<T>, options?: DeterminantOptions<T>): T;
  inverse(m: MatrixLike<T>, options?: Tolerance<T>): Matrix<T> | null;
  isInvertible(m: MatrixLike<T>, options?: Tolerance<T>): boolean;
  solve(a: MatrixLike<T>, b: Vector<T>, options?: Tolerance<T>): Vector<T> | null;
}

export interface RealLinalg<T> extends Linalg<T> {
  readonly scalar: RealScalar<T>;
  norm(v: Vector<T>): T;
  normalize(v: Vector<T>): Vector<T>;
  qrDecompose(m: MatrixLike<T>, options?: QrOptions<T>): QrDecomposition<T>;
  eigen2x2(m: MatrixLike<T>, options?: Tolerance<T>): Eigen2x2Result<T>;
  powerIteration(m: MatrixLike<T>, options?: PowerIterationOptions<T>): PowerIterationResult<T>;
  qrAlgorithm(m: MatrixLike<T>, options?: QrAlgorithmOptions<T>): EigenDecomposition<T>;
  eigen(m: MatrixLike<T>, options?: EigenOptions<T>): EigenDecomposition<T>;
}

function hasSqrt<T>(S: Scalar<T>): S is RealScalar<T> {
  return 'sqrt' in S && typeof S.sqrt === 'function';
}

export function createLinalg<T>(S: RealScalar<T>): RealLinalg<T>;
export function createLinalg<T>(S: Scalar<T>): Linalg<T>;
export function createLinalg<T>(S: Scalar<T>): Linalg<T> | RealLinalg<T> {
  const base: Linalg<T> = {
    scalar: S,
    matrix: (rows, cols) => matrixFromRows(rows, cols),
    vector: (values) => vectorFromArray(values),
    zeros: (rows, cols) => zeros(S, rows, cols),
    identity: (n) => identity(S, n),
    add: (a, b) => add(S, a, b),
    subtract: (a, b) => subtract(S, a, b),
    scale: (m, factor) => scale(S, m, factor),
    multiply: (a, b) => multiply(S, a, b),
    multiplyVector: (a, v) => multiplyVector(S, a, v),
    dot: (a, b) => dot(S, a, b),
    trace: (m) => trace(S, m),
    approxEqual: (a, b, tolerance) => approxEqual(S, a, b, tolerance),
    rowReduce: (m, options) => rowReduce(S, m, options),
    rank: (m, options) => rank(S, m, options),
    determinant: (m, options) => determinant(S, m, options),
    inverse: (m, options) => inverse(S, m, options),
    isInvertible: (m, options) => isInvertible(S, m, options),
    solve: (a, b, options) => solve(S, a, b, options),
  };

  if (!hasSqrt(S)) {
    return base;
  }

  return {
    ...base,
    scalar: S,
    norm: (v) => norm(S, v),
    normalize: (v) => normalize(S, v),
    qrDecompose: (m, options) => qrDecompose(S, m, options),
    eigen2x2: (m, options) => eigen2x2(S, m, options),
    powerIteration: (m, options) => powerIteration(S, m, options),
    qrAlgorithm: (m, options) => qrAlgorithm(S, m, options),
    eigen: (m, options) => eigen(S, m, options),
  };
}

/** Bound API over float64. */
export const f64: RealLinalg<number> = createLinalg(float64);

/** Bound API over exact rationals; no square-root operations. */
export const exact: Linalg<Rational> = createLinalg(rationalScalar);
