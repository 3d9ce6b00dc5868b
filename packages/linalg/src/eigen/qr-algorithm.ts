// ---------------------------------------------------------------------------
// @rowspace/linalg: QR algorithm
// ---------------------------------------------------------------------------
// Unshifted iteration A_{k+1} = R_k·Q_k, which is similar to A and tends
// to upper-triangular form with the eigenvalues on the diagonal, ordered by
// decreasing magnitude. V = Q_0·Q_1·… accumulates the similarity.
//
// Gram-Schmidt leaves a zero column in Q when the iterate is singular; that
// step is redone with Householder so V stays orthogonal.
//
// Eigenvalues of equal magnitude and opposite sign (or complex pairs) do
// not separate without shifts; those inputs exhaust the iteration cap and
// are reported with converged = false.
// ---------------------------------------------------------------------------

import type {
  EigenDecomposition,
  Matrix,
  MatrixLike,
  QrAlgorithmOptions,
  QrDecomposition,
  QrMethod,
} from '../types.js';
import type { RealScalar } from '../scalar/field.js';
import { isNegligible } from '../scalar/field.js';
import { assertSquare } from '../errors.js';
import { approxEqual, multiply } from '../ops/arithmetic.js';
import { at, clone, identity, set } from '../storage/matrix.js';
import { norm, normalizeInPlace } from '../storage/vector.js';
import { columnView } from '../views/view.js';
import { transpose } from '../views/transpose.js';
import { qrDecompose } from './qr.js';
import { resolveIteration } from './iteration.js';
import type { Logger } from '../logger.js';

export function qrAlgorithm<T>(
  S: RealScalar<T>,
  a: MatrixLike<T>,
  options: QrAlgorithmOptions<T> = {},
): EigenDecomposition<T> {
  assertSquare('qrAlgorithm', a);
  const { tolerance, maxIterations, logger } = resolveIteration(S, options, 'qrAlgorithm');
  const n = a.rows;

  let work = clone(a);
  let accumulated = identity(S, n);
  let iterations = 0;
  let converged = isLowerNegligible(S, work, tolerance);

  while (!converged && iterations < maxIterations) {
    const { q, r } = qrStep(S, work, options.method, tolerance, logger);
    work = multiply(S, r, q);
    accumulated = multiply(S, accumulated, q);
    iterations++;
    converged = isLowerNegligible(S, work, tolerance);
  }

  if (converged) {
    logger.debug('converged', { iterations, size: n });
  } else {
    logger.warn('iteration cap reached without convergence', { iterations, size: n });
  }

  const values: T[] = [];
  for (let i = 0; i < n; i++) values.push(at(work, i, i));

  const vectors = approxEqual(S, a, transpose(a), tolerance)
    ? accumulated
    : triangularEigenvectors(S, work, accumulated, tolerance);

  return { values, vectors, iterations, converged, strategy: 'qr' };
}

function qrStep<T>(
  S: RealScalar<T>,
  work: Matrix<T>,
  method: QrMethod | undefined,
  tolerance: T,
  logger: Logger,
): QrDecomposition<T> {
  const factors = qrDecompose(S, work, { method, tolerance });
  if (method !== 'gramSchmidt') return factors;
  for (let j = 0; j < factors.q.cols; j++) {
    if (isNegligible(S, norm(S, columnView(factors.q, j)), tolerance)) {
      logger.debug('rank-deficient iterate, using householder', { column: j });
      return qrDecompose(S, work, { method: 'householder', tolerance });
    }
  }
  return factors;
}

/** Every entry strictly below the diagonal is within tolerance. */
function isLowerNegligible<T>(S: RealScalar<T>, m: Matrix<T>, tolerance: T): boolean {
  for (let i = 1; i < m.rows; i++) {
    for (let j = 0; j < i; j++) {
      if (!isNegligible(S, at(m, i, j), tolerance)) return false;
    }
  }
  return true;
}

/**
 * Eigenvectors of a non-symmetric input. For each diagonal entry λ_i of the
 * triangular factor T, solves (T - λ_i·I)·y = 0 with y_i = 1 and y_j = 0
 * for j > i by back-substitution, then maps y through V and normalizes.
 * A repeated eigenvalue makes the divisor vanish; that component is set
 * to zero.
 */
function triangularEigenvectors<T>(
  S: RealScalar<T>,
  triangular: Matrix<T>,
  accumulated: Matrix<T>,
  tolerance: T,
): Matrix<T> {
  const n = triangular.rows;
  const y = identity(S, n);

  for (let col = 0; col < n; col++) {
    const lambda = at(triangular, col, col);
    for (let j = col - 1; j >= 0; j--) {
      let sum = S.zero;
      for (let k = j + 1; k <= col; k++) {
        sum = S.add(sum, S.mul(at(triangular, j, k), at(y, k, col)));
      }
      const divisor = S.sub(at(triangular, j, j), lambda);
      set(y, j, col, isNegligible(S, divisor, tolerance) ? S.zero : S.neg(S.div(sum, divisor)));
    }
  }

  const vectors = multiply(S, accumulated, y);
  for (let col = 0; col < n; col++) {
    normalizeInPlace(S, columnView(vectors, col));
  }
  return vectors;
}
