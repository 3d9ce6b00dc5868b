// ---------------------------------------------------------------------------
// @rowspace/linalg: Shared types
// ---------------------------------------------------------------------------
// Storage descriptors, view selectors, solver options and result shapes.
// ---------------------------------------------------------------------------

import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

/**
 * Indexable backing store. Plain arrays work for any T; a Float64Array
 * works for T = number.
 */
export interface ScalarBuffer<T> {
  [index: number]: T;
  readonly length: number;
}

/**
 * Row-major strided matrix. Element (i, j) lives at
 * `offset + i * stride + j`.
 *
 * Invariants: `stride >= cols`; the buffer covers
 * `offset + (rows - 1) * stride + cols` elements when rows > 0.
 * A matrix produced by `subMatrix` or `view` shares its owner's buffer.
 */
export interface Matrix<T> {
  readonly kind: 'matrix';
  readonly rows: number;
  readonly cols: number;
  readonly buffer: ScalarBuffer<T>;
  readonly stride: number;
  readonly offset: number;
}

/**
 * Zero-copy logical transpose: (i, j) reads the source's (j, i).
 * `transpose(transpose(m))` hands back `m` itself.
 */
export interface Transpose<T> {
  readonly kind: 'transpose';
  readonly source: Matrix<T>;
  readonly rows: number;
  readonly cols: number;
}

/** Anything addressable by (row, col). Algorithms accept either form. */
export type MatrixLike<T> = Matrix<T> | Transpose<T>;

/** Strided vector; element k lives at `offset + k * stride`. */
export interface Vector<T> {
  readonly kind: 'vector';
  readonly size: number;
  readonly buffer: ScalarBuffer<T>;
  readonly offset: number;
  readonly stride: number;
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

export type ViewSelector =
  | { readonly kind: 'row'; readonly index: number }
  | { readonly kind: 'column'; readonly index: number }
  | { readonly kind: 'diagonal' }
  | { readonly kind: 'subDiagonal' }
  | { readonly kind: 'superDiagonal' }
  | { readonly kind: 'subRow'; readonly index: number; readonly start: number; readonly length: number }
  | { readonly kind: 'subColumn'; readonly index: number; readonly start: number; readonly length: number };

/** A vector aliasing part of a matrix buffer. Writes go through to `owner`. */
export interface MatrixView<T> extends Vector<T> {
  readonly owner: Matrix<T>;
  readonly selector: ViewSelector;
}

/** Bounded read/write accessor for one logical row. */
export interface Lens<T> {
  readonly row: number;
  readonly length: number;
  get(col: number): T;
  set(col: number, value: T): void;
  toArray(): T[];
}

// ---------------------------------------------------------------------------
// Row reduction, determinant, inverse
// ---------------------------------------------------------------------------

export interface ReductionOptions<T> {
  /** Pivot magnitudes at or below this count as zero (default: scalar epsilon) */
  tolerance?: T;
  /**
   * Only columns [0, columnLimit) are searched for pivots; row operations
   * still span every column. Used for augmented systems.
   */
  columnLimit?: number;
}

export interface RowReduction<T> {
  /** Reduced row-echelon form */
  matrix: Matrix<T>;
  /** Column index of each pivot, in row order */
  pivotColumns: number[];
  rank: number;
  /** Number of row exchanges performed */
  swaps: number;
}

export type DeterminantMethod = 'auto' | 'elimination' | 'cofactor';

export interface DeterminantOptions<T> {
  tolerance?: T;
  /** 'auto' uses cofactor expansion for exact scalars up to 4x4 */
  method?: DeterminantMethod;
}

// ---------------------------------------------------------------------------
// QR and eigen solvers
// ---------------------------------------------------------------------------

export type QrMethod = 'householder' | 'gramSchmidt';

export interface QrOptions<T> {
  method?: QrMethod;
  /** Column norms at or below this are treated as rank-deficient */
  tolerance?: T;
}

/**
 * A = QR. Householder yields a full m x m Q and m x n R; Gram-Schmidt
 * yields a thin m x n Q and n x n R.
 */
export interface QrDecomposition<T> {
  q: Matrix<T>;
  r: Matrix<T>;
}

export interface IterativeOptions<T> {
  /** Convergence threshold (default: scalar epsilon) */
  tolerance?: T;
  /** Iteration cap (default: ROWSPACE_MAX_ITERATIONS) */
  maxIterations?: number;
  logger?: Logger;
}

export interface PowerIterationOptions<T> extends IterativeOptions<T> {
  /** Non-zero starting vector (default: all ones) */
  initial?: Vector<T> | readonly T[];
}

export interface PowerIterationResult<T> {
  /** Rayleigh-quotient estimate of the dominant eigenvalue */
  value: T;
  /** Unit eigenvector estimate */
  vector: Vector<T>;
  iterations: number;
  converged: boolean;
}

export type Eigen2x2Result<T> =
  | {
      readonly kind: 'real';
      /** [larger, smaller] */
      readonly values: readonly [T, T];
      /** Unit eigenvectors, paired with `values` */
      readonly vectors: readonly [Vector<T>, Vector<T>];
    }
  | {
      readonly kind: 'complex';
      /** λ = real ± imaginary·i */
      readonly real: T;
      readonly imaginary: T;
    };

export interface QrAlgorithmOptions<T> extends IterativeOptions<T> {
  /** Factorization used on each step (default: householder) */
  method?: QrMethod;
}

export type EigenStrategy = 'auto' | 'analytic' | 'qr';

export interface EigenOptions<T> extends QrAlgorithmOptions<T> {
  strategy?: EigenStrategy;
}

export interface EigenDecomposition<T> {
  values: T[];
  /** Eigenvectors as columns, paired with `values` */
  vectors: Matrix<T>;
  iterations: number;
  converged: boolean;
  strategy: 'trivial' | 'analytic' | 'qr';
}
