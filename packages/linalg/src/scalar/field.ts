// ---------------------------------------------------------------------------
// @rowspace/linalg: Scalar capabilities
// ---------------------------------------------------------------------------
// Algorithms are generic over the element type T and receive its arithmetic
// as an explicit dictionary. Each algorithm asks only for what it uses:
// elimination needs a Scalar (ordered field with a tolerance), the QR and
// eigen solvers additionally need a square root.
// ---------------------------------------------------------------------------

import { InvalidArgumentError } from '../errors.js';

/**
 * Commutative ring with unity.
 *
 * Laws: add/mul associative and commutative, zero/one identities,
 * mul distributes over add, add(a, neg(a)) = zero.
 */
export interface Ring<T> {
  readonly zero: T;
  readonly one: T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  neg(a: T): T;
  equals(a: T, b: T): boolean;
  /** Embeds a small integer, e.g. the constants 2 and 4 of the quadratic formula. */
  fromInteger(n: number): T;
}

/** Ring where every non-zero element has a multiplicative inverse. */
export interface Field<T> extends Ring<T> {
  div(a: T, b: T): T;
}

/** Total order plus magnitude, used for pivot selection. */
export interface Ordered<T> {
  /** Negative, zero or positive as a < b, a = b, a > b. */
  compare(a: T, b: T): number;
  abs(a: T): T;
}

/**
 * Default precision of the type. Exact types use a zero epsilon, so
 * "negligible" collapses to "equal to zero".
 */
export interface Tolerant<T> {
  readonly epsilon: T;
  readonly exact: boolean;
  /** Lossy projection used for diagnostics and log fields. */
  toNumber(a: T): number;
}

export interface Sqrt<T> {
  sqrt(a: T): T;
}

/** What row reduction, determinant, inverse and rank require. */
export interface Scalar<T> extends Field<T>, Ordered<T>, Tolerant<T> {
  readonly name: string;
}

/** What QR decomposition and the eigen solvers require. */
export interface RealScalar<T> extends Scalar<T>, Sqrt<T> {}

// ---------------------------------------------------------------------------
// Derived operations
// ---------------------------------------------------------------------------

/** |a| <= tolerance. */
export function isNegligible<T>(S: Ordered<T>, a: T, tolerance: T): boolean {
  return S.compare(S.abs(a), tolerance) <= 0;
}

export function maxOf<T>(S: Ordered<T>, a: T, b: T): T {
  return S.compare(a, b) >= 0 ? a : b;
}

/** Rejects a negative tolerance; returns the tolerance unchanged. */
export function checkTolerance<T>(S: Scalar<T>, tolerance: T): T {
  if (S.compare(tolerance, S.zero) < 0) {
    throw new InvalidArgumentError('tolerance', `must be non-negative, got ${S.toNumber(tolerance)}`);
  }
  return tolerance;
}
