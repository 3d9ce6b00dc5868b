/**
 * Property-based tests for the algebraic identities the kernel promises.
 *
 * Exact identities are checked over rationals built from small integers,
 * where no tolerance is involved; float64 results are compared against
 * the exact answer.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { float64 } from '../scalar/float64.js';
import { rationalScalar, rationalToNumber } from '../scalar/rational.js';
import { at, identity, matrixFromRows } from '../storage/matrix.js';
import { materialize, transpose } from '../views/transpose.js';
import { approxEqual, multiply } from '../ops/arithmetic.js';
import { rank } from '../reduction/row-reduce.js';
import { determinant } from '../reduction/determinant.js';
import { inverse } from '../reduction/inverse.js';
import { qrDecompose } from '../eigen/qr.js';
import { eigen2x2 } from '../eigen/eigen2x2.js';
import { powerIteration } from '../eigen/power-iteration.js';
import { qrAlgorithm } from '../eigen/qr-algorithm.js';
import { eigen } from '../eigen/eigen.js';
import { norm } from '../storage/vector.js';
import { createLogger } from '../logger.js';
import type { EigenDecomposition, Matrix } from '../types.js';
import { column, q, residual } from './helpers.js';

// ─── Arbitraries ────────────────────────────────────────────────────────────

const entry = fc.integer({ min: -9, max: 9 });

const rectangular = (maxRows: number, maxCols: number) =>
  fc
    .tuple(fc.integer({ min: 1, max: maxRows }), fc.integer({ min: 1, max: maxCols }))
    .chain(([rows, cols]) =>
      fc.array(fc.array(entry, { minLength: cols, maxLength: cols }), { minLength: rows, maxLength: rows }),
    );

const square = (maxOrder: number) =>
  fc
    .integer({ min: 1, max: maxOrder })
    .chain((n) => fc.array(fc.array(entry, { minLength: n, maxLength: n }), { minLength: n, maxLength: n }));

const symmetricSquare = (maxOrder: number) =>
  square(maxOrder).map((rows) => rows.map((row, i) => row.map((value, j) => (j < i ? rows[j]![i]! : value))));

const R = rationalScalar;
const quiet = createLogger({ scope: 'test', level: 'silent' });

// ─── Determinant ────────────────────────────────────────────────────────────

describe('determinant properties', () => {
  it('det(A) = det(Aᵀ)', () => {
    fc.assert(
      fc.property(square(4), (rows) => {
        const a = q(rows);
        expect(R.equals(determinant(R, a), determinant(R, transpose(a)))).toBe(true);
      }),
    );
  });

  it('elimination agrees with cofactor expansion exactly', () => {
    fc.assert(
      fc.property(square(4), (rows) => {
        const a = q(rows);
        const byElimination = determinant(R, a, { method: 'elimination' });
        expect(R.equals(byElimination, determinant(R, a, { method: 'cofactor' }))).toBe(true);
      }),
    );
  });

  it('float64 elimination tracks the exact value', () => {
    fc.assert(
      fc.property(square(4), (rows) => {
        const exactValue = rationalToNumber(determinant(R, q(rows)));
        const approx = determinant(float64, matrixFromRows(rows));
        expect(Math.abs(approx - exactValue)).toBeLessThanOrEqual(1e-6 * Math.max(1, Math.abs(exactValue)));
      }),
    );
  });
});

// ─── Inverse ────────────────────────────────────────────────────────────────

describe('inverse properties', () => {
  it('exists exactly when det ≠ 0 and multiplies back to I', () => {
    fc.assert(
      fc.property(square(4), (rows) => {
        const a = q(rows);
        const inv = inverse(R, a);
        const singular = R.equals(determinant(R, a), R.zero);
        expect(inv === null).toBe(singular);
        if (inv === null) return;
        expect(approxEqual(R, multiply(R, a, inv), identity(R, a.rows))).toBe(true);
        expect(approxEqual(R, multiply(R, inv, a), identity(R, a.rows))).toBe(true);
      }),
    );
  });

  it('inverse(inverse(A)) = A', () => {
    fc.assert(
      fc.property(square(3), (rows) => {
        const a = q(rows);
        const inv = inverse(R, a);
        if (inv === null) return;
        const back = inverse(R, inv);
        expect(back !== null && approxEqual(R, back, a)).toBe(true);
      }),
    );
  });
});

// ─── Rank and transpose ─────────────────────────────────────────────────────

describe('rank and transpose properties', () => {
  it('rank(A) <= min(rows, cols) and rank(A) = rank(Aᵀ)', () => {
    fc.assert(
      fc.property(rectangular(4, 5), (rows) => {
        const a = q(rows);
        const r = rank(R, a);
        expect(r).toBeLessThanOrEqual(Math.min(a.rows, a.cols));
        expect(rank(R, transpose(a))).toBe(r);
      }),
    );
  });

  it('transpose is a zero-copy involution', () => {
    fc.assert(
      fc.property(rectangular(4, 4), (rows) => {
        const a = matrixFromRows(rows);
        expect(transpose(transpose(a))).toBe(a);
        const dense = materialize(transpose(a));
        expect([dense.rows, dense.cols]).toEqual([a.cols, a.rows]);
        for (let i = 0; i < a.rows; i++) {
          for (let j = 0; j < a.cols; j++) {
            expect(at(dense, j, i)).toBe(at(a, i, j));
          }
        }
      }),
    );
  });
});

// ─── QR and eigen ───────────────────────────────────────────────────────────

describe('QR and eigen properties', () => {
  it('Q·R reconstructs A for both factorizations', () => {
    fc.assert(
      fc.property(rectangular(4, 3), (rows) => {
        const a = matrixFromRows(rows);
        for (const method of ['householder', 'gramSchmidt'] as const) {
          const { q: factor, r } = qrDecompose(float64, a, { method });
          expect(approxEqual(float64, multiply(float64, factor, r), a, 1e-8)).toBe(true);
        }
      }),
    );
  });

  it('symmetric 2x2 eigenpairs satisfy A·v = λ·v', () => {
    fc.assert(
      fc.property(entry, entry, entry, (x, y, z) => {
        const a = matrixFromRows([
          [x, y],
          [y, z],
        ]);
        const result = eigen2x2(float64, a);
        expect(result.kind).toBe('real');
        if (result.kind !== 'real') return;
        expect(result.values[0] + result.values[1]).toBeCloseTo(x + z, 9);
        expect(residual(a, result.values[0], result.vectors[0])).toBeLessThan(1e-9);
        expect(residual(a, result.values[1], result.vectors[1])).toBeLessThan(1e-9);
      }),
    );
  });
});

// ─── Iterative eigen solvers ────────────────────────────────────────────────

function expectEigenpairs(a: Matrix<number>, result: EigenDecomposition<number>): void {
  result.values.forEach((value, k) => {
    const v = column(result.vectors, k);
    expect(norm(float64, v)).toBeCloseTo(1, 6);
    expect(residual(a, value, v)).toBeLessThan(1e-6);
  });
}

describe('iterative eigen properties', () => {
  it('converged QR-algorithm pairs are unit eigenvectors under either factorization', () => {
    fc.assert(
      fc.property(
        symmetricSquare(4),
        fc.constantFrom('householder' as const, 'gramSchmidt' as const),
        (rows, method) => {
          const a = matrixFromRows(rows);
          const result = qrAlgorithm(float64, a, { method, logger: quiet });
          if (result.converged) expectEigenpairs(a, result);
        },
      ),
    );
  });

  it('converged dispatcher results are unit eigenvectors', () => {
    fc.assert(
      fc.property(symmetricSquare(4), (rows) => {
        const a = matrixFromRows(rows);
        const result = eigen(float64, a, { logger: quiet });
        if (result.converged) expectEigenpairs(a, result);
      }),
    );
  });

  it('power iteration only reports convergence with a small residual', () => {
    fc.assert(
      fc.property(square(4), (rows) => {
        const a = matrixFromRows(rows);
        const result = powerIteration(float64, a, { logger: quiet });
        if (result.converged) {
          expect(norm(float64, result.vector)).toBeCloseTo(1, 6);
          expect(residual(a, result.value, result.vector)).toBeLessThan(1e-8);
        }
      }),
    );
  });
});
