/**
 * Exact rational arithmetic on bigint numerator/denominator pairs.
 *
 * Invariants: den > 0 and gcd(|num|, den) = 1, so structural equality
 * is numeric equality.
 */

import type { Scalar } from './field.js';

export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

function normalize(num: bigint, den: bigint): Rational {
  if (den === 0n) {
    throw new RangeError('Rational: denominator cannot be zero');
  }
  if (num === 0n) {
    return { num: 0n, den: 1n };
  }
  if (den < 0n) {
    num = -num;
    den = -den;
  }
  const g = gcd(num, den);
  return { num: num / g, den: den / g };
}

/**
 * Create a rational from integer numerator and denominator.
 * Number arguments must be safe integers.
 */
export function rational(num: bigint | number, den: bigint | number = 1n): Rational {
  return normalize(toBigInt(num), toBigInt(den));
}

function toBigInt(value: bigint | number): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Rational: ${value} is not a safe integer`);
  }
  return BigInt(value);
}

export function rationalToNumber(r: Rational): number {
  return Number(r.num) / Number(r.den);
}

export function formatRational(r: Rational): string {
  return r.den === 1n ? `${r.num}` : `${r.num}/${r.den}`;
}

const ZERO = rational(0n);
const ONE = rational(1n);

export const rationalScalar: Scalar<Rational> = {
  name: 'rational',
  zero: ZERO,
  one: ONE,
  add: (a, b) => normalize(a.num * b.den + b.num * a.den, a.den * b.den),
  sub: (a, b) => normalize(a.num * b.den - b.num * a.den, a.den * b.den),
  mul: (a, b) => normalize(a.num * b.num, a.den * b.den),
  div: (a, b) => {
    if (b.num === 0n) {
      throw new RangeError('Rational: division by zero');
    }
    return normalize(a.num * b.den, a.den * b.num);
  },
  neg: (a) => ({ num: -a.num, den: a.den }),
  equals: (a, b) => a.num === b.num && a.den === b.den,
  fromInteger: (n) => rational(n),
  compare: (a, b) => {
    const lhs = a.num * b.den;
    const rhs = b.num * a.den;
    return lhs < rhs ? -1 : lhs > rhs ? 1 : 0;
  },
  abs: (a) => (a.num < 0n ? { num: -a.num, den: a.den } : a),
  epsilon: ZERO,
  exact: true,
  toNumber: rationalToNumber,
};
