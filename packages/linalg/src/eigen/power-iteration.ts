// ---------------------------------------------------------------------------
// @rowspace/linalg: Power iteration
// ---------------------------------------------------------------------------
// v <- A·v / |A·v|, with the Rayleigh quotient vᵀAv as the eigenvalue
// estimate. Converged means the estimate moved by less than the tolerance
// and the residual |A·v - λ·v| is within it too. A still quotient alone is
// not enough: a dominant pair of opposite sign or a complex-conjugate pair
// holds it at zero while v keeps turning. Those inputs reach the iteration
// cap and come back with converged = false.
// ---------------------------------------------------------------------------

import type { MatrixLike, PowerIterationOptions, PowerIterationResult, Vector } from '../types.js';
import type { RealScalar } from '../scalar/field.js';
import { isNegligible } from '../scalar/field.js';
import { DimensionMismatchError, InvalidArgumentError, assertSquare } from '../errors.js';
import { multiplyVector } from '../ops/arithmetic.js';
import {
  cloneVector,
  dot,
  filledVector,
  norm,
  vectorFromArray,
  vectorMapInPlace,
  vectorScale,
  vectorSub,
} from '../storage/vector.js';
import { resolveIteration } from './iteration.js';

export function powerIteration<T>(
  S: RealScalar<T>,
  a: MatrixLike<T>,
  options: PowerIterationOptions<T> = {},
): PowerIterationResult<T> {
  assertSquare('powerIteration', a);
  const n = a.rows;
  if (n === 0) {
    throw new DimensionMismatchError('powerIteration', 'a non-empty square matrix', '0x0');
  }
  const { tolerance, maxIterations, logger } = resolveIteration(S, options, 'powerIteration');

  const v = startVector(S, n, options.initial);
  let product = multiplyVector(S, a, v);
  let value = dot(S, v, product);
  let current = v;

  for (let k = 1; k <= maxIterations; k++) {
    const length = norm(S, product);
    if (isNegligible(S, length, tolerance)) {
      logger.debug('product vector collapsed', { iterations: k });
      return { value: S.zero, vector: current, iterations: k, converged: true };
    }

    vectorMapInPlace(product, (x) => S.div(x, length));
    current = product;
    product = multiplyVector(S, a, current);
    const estimate = dot(S, current, product);
    const change = S.abs(S.sub(estimate, value));
    value = estimate;

    const settled =
      S.compare(change, tolerance) < 0 &&
      isNegligible(S, residualNorm(S, product, value, current), tolerance);
    if (settled) {
      logger.debug('converged', { iterations: k, value: S.toNumber(value) });
      return { value, vector: current, iterations: k, converged: true };
    }
  }

  logger.warn('iteration cap reached without convergence', {
    iterations: maxIterations,
    value: S.toNumber(value),
  });
  return { value, vector: current, iterations: maxIterations, converged: false };
}

function startVector<T>(
  S: RealScalar<T>,
  n: number,
  initial: Vector<T> | readonly T[] | undefined,
): Vector<T> {
  if (initial === undefined) {
    return unit(S, filledVector(n, S.one));
  }
  const v = isVector(initial) ? cloneVector(initial) : vectorFromArray(initial);
  if (v.size !== n) {
    throw new DimensionMismatchError('powerIteration', `initial vector of size ${n}`, `${v.size}`);
  }
  if (S.equals(norm(S, v), S.zero)) {
    throw new InvalidArgumentError('initial', 'must be a non-zero vector');
  }
  return unit(S, v);
}

/** |A·v - λ·v|, given the product A·v already formed. */
function residualNorm<T>(S: RealScalar<T>, product: Vector<T>, value: T, v: Vector<T>): T {
  return norm(S, vectorSub(S, product, vectorScale(S, v, value)));
}

function isVector<T>(value: Vector<T> | readonly T[]): value is Vector<T> {
  return !Array.isArray(value);
}

function unit<T>(S: RealScalar<T>, v: Vector<T>): Vector<T> {
  const length = norm(S, v);
  vectorMapInPlace(v, (x) => S.div(x, length));
  return v;
}
