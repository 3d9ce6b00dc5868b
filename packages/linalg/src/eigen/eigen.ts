/**
 * Eigen-decomposition front door.
 *
 * 'auto' picks by shape: 0x0 and 1x1 are answered directly, a 2x2 with
 * real roots goes to the closed form, everything else to the QR
 * algorithm. 'analytic' and 'qr' force a solver.
 */

import type { EigenDecomposition, EigenOptions, MatrixLike } from '../types.js';
import type { RealScalar } from '../scalar/field.js';
import { DimensionMismatchError, InvalidArgumentError, assertSquare } from '../errors.js';
import { at, generate, identity } from '../storage/matrix.js';
import { vectorAt } from '../storage/vector.js';
import { eigen2x2 } from './eigen2x2.js';
import { qrAlgorithm } from './qr-algorithm.js';

export function eigen<T>(
  S: RealScalar<T>,
  a: MatrixLike<T>,
  options: EigenOptions<T> = {},
): EigenDecomposition<T> {
  assertSquare('eigen', a);
  const strategy = options.strategy ?? 'auto';
  const n = a.rows;

  if (strategy === 'qr') {
    return qrAlgorithm(S, a, options);
  }

  if (strategy === 'auto' && n < 2) {
    return {
      values: n === 0 ? [] : [at(a, 0, 0)],
      vectors: identity(S, n),
      iterations: 0,
      converged: true,
      strategy: 'trivial',
    };
  }

  if (n !== 2) {
    if (strategy === 'analytic') {
      throw new DimensionMismatchError('eigen', 'a 2x2 matrix for the analytic strategy', `${n}x${n}`);
    }
    return qrAlgorithm(S, a, options);
  }

  const result = eigen2x2(S, a, { tolerance: options.tolerance });
  if (result.kind === 'complex') {
    if (strategy === 'analytic') {
      throw new InvalidArgumentError(
        'matrix',
        'eigenvalues are a complex pair; use eigen2x2 to read them',
      );
    }
    return qrAlgorithm(S, a, options);
  }

  const [first, second] = result.vectors;
  return {
    values: [result.values[0], result.values[1]],
    vectors: generate(2, 2, (i, j) => vectorAt(j === 0 ? first : second, i)),
    iterations: 0,
    converged: true,
    strategy: 'analytic',
  };
}
