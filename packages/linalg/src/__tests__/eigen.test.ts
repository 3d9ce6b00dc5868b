import { describe, it, expect } from 'vitest';
import { float64 } from '../scalar/float64.js';
import { at, identity, matrixFromRows, toRows, zeros } from '../storage/matrix.js';
import { norm, vectorFromArray, vectorToArray } from '../storage/vector.js';
import { transpose } from '../views/transpose.js';
import { approxEqual, multiply } from '../ops/arithmetic.js';
import { qrDecompose } from '../eigen/qr.js';
import { eigen2x2 } from '../eigen/eigen2x2.js';
import { powerIteration } from '../eigen/power-iteration.js';
import { qrAlgorithm } from '../eigen/qr-algorithm.js';
import { eigen } from '../eigen/eigen.js';
import { DimensionMismatchError, InvalidArgumentError } from '../errors.js';
import { column, recordingLogger, residual } from './helpers.js';

const symmetric = () =>
  matrixFromRows([
    [6, -2],
    [-2, 9],
  ]);

const tridiagonal = () =>
  matrixFromRows([
    [2, -1, 0],
    [-1, 2, -1],
    [0, -1, 2],
  ]);

const ascending = (values: number[]) => [...values].sort((x, y) => x - y);

// ---------------------------------------------------------------------------
// Analytic 2x2
// ---------------------------------------------------------------------------

describe('eigen2x2', () => {
  it('solves a symmetric matrix exactly', () => {
    const a = symmetric();
    const result = eigen2x2(float64, a);
    expect(result.kind).toBe('real');
    if (result.kind !== 'real') return;
    expect(result.values).toEqual([10, 5]);
    expect(residual(a, 10, result.vectors[0])).toBeLessThan(1e-12);
    expect(residual(a, 5, result.vectors[1])).toBeLessThan(1e-12);
  });

  it('reports a rotation as a complex pair', () => {
    const rotation = matrixFromRows([
      [0, -1],
      [1, 0],
    ]);
    expect(eigen2x2(float64, rotation)).toEqual({ kind: 'complex', real: 0, imaginary: 1 });
  });

  it('handles a repeated root of a defective matrix', () => {
    const result = eigen2x2(
      float64,
      matrixFromRows([
        [2, 1],
        [0, 2],
      ]),
    );
    expect(result.kind).toBe('real');
    if (result.kind !== 'real') return;
    expect(result.values).toEqual([2, 2]);
    expect(vectorToArray(result.vectors[0])).toEqual([1, 0]);
  });

  it('falls back to the standard basis for a scalar matrix', () => {
    const result = eigen2x2(
      float64,
      matrixFromRows([
        [3, 0],
        [0, 3],
      ]),
    );
    expect(result.kind).toBe('real');
    if (result.kind !== 'real') return;
    expect(vectorToArray(result.vectors[0])).toEqual([1, 0]);
    expect(vectorToArray(result.vectors[1])).toEqual([0, 1]);
  });

  it('only accepts 2x2 input', () => {
    expect(() => eigen2x2(float64, identity(float64, 3))).toThrow('eigen2x2: expected a 2x2 matrix, got 3x3');
  });
});

// ---------------------------------------------------------------------------
// Power iteration
// ---------------------------------------------------------------------------

describe('powerIteration', () => {
  it('finds the dominant eigenpair', () => {
    const a = symmetric();
    const result = powerIteration(float64, a);
    expect(result.converged).toBe(true);
    expect(result.value).toBeCloseTo(10, 8);
    expect(residual(a, result.value, result.vector)).toBeLessThan(1e-4);
  });

  it('accepts a starting vector as an array or a vector', () => {
    const a = symmetric();
    const fromArray = powerIteration(float64, a, { initial: [1, 0] });
    const fromVector = powerIteration(float64, a, { initial: vectorFromArray([1, 0]) });
    expect(fromArray.value).toBeCloseTo(10, 8);
    expect(fromVector.value).toBe(fromArray.value);
  });

  it('works on a transpose', () => {
    const result = powerIteration(float64, transpose(symmetric()));
    expect(result.value).toBeCloseTo(10, 8);
  });

  it('yields eigenvalue zero when the product collapses', () => {
    const result = powerIteration(float64, zeros(float64, 2, 2));
    expect(result.value).toBe(0);
    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(1);
  });

  it('rejects a zero or mis-sized starting vector', () => {
    const a = symmetric();
    expect(() => powerIteration(float64, a, { initial: [0, 0] })).toThrow(
      'Invalid initial: must be a non-zero vector',
    );
    expect(() => powerIteration(float64, a, { initial: [1, 1, 1] })).toThrow(DimensionMismatchError);
  });

  it('validates the iteration cap', () => {
    const a = symmetric();
    expect(() => powerIteration(float64, a, { maxIterations: 0 })).toThrow(InvalidArgumentError);
    expect(() => powerIteration(float64, a, { maxIterations: 2.5 })).toThrow(InvalidArgumentError);
  });

  it('reports non-convergence for a complex dominant pair and logs a warning', () => {
    const { logger, lines } = recordingLogger();
    const result = powerIteration(
      float64,
      matrixFromRows([
        [1, -4],
        [1, 1],
      ]),
      { maxIterations: 25, logger },
    );
    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(25);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'warn',
      scope: 'test',
      msg: 'iteration cap reached without convergence',
      iterations: 25,
    });
  });

  it('does not settle on a zero quotient when the dominant pair cancels', () => {
    const rotation = matrixFromRows([
      [0, -1],
      [1, 0],
    ]);
    const reflection = matrixFromRows([
      [1, 0],
      [0, -1],
    ]);
    for (const a of [rotation, reflection]) {
      const result = powerIteration(float64, a, { maxIterations: 50, logger: recordingLogger().logger });
      expect(result.converged).toBe(false);
      expect(result.iterations).toBe(50);
      expect(result.value).toBe(0);
      expect(residual(a, result.value, result.vector)).toBeCloseTo(1, 12);
    }
  });

  it('only reports convergence once the residual is within tolerance', () => {
    const a = symmetric();
    const result = powerIteration(float64, a, { tolerance: 1e-10 });
    expect(result.converged).toBe(true);
    expect(residual(a, result.value, result.vector)).toBeLessThan(1e-9);
  });

  it('logs convergence at debug level', () => {
    const { logger, lines } = recordingLogger();
    const result = powerIteration(float64, symmetric(), { logger });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'debug', msg: 'converged', iterations: result.iterations });
  });
});

// ---------------------------------------------------------------------------
// QR decomposition
// ---------------------------------------------------------------------------

describe('qrDecompose', () => {
  const a = () =>
    matrixFromRows([
      [1, 2, 0],
      [2, 1, 3],
      [0, 4, 1],
      [1, 0, 2],
    ]);

  it('householder gives an orthogonal Q and upper-triangular R', () => {
    const { q, r } = qrDecompose(float64, a());
    expect([q.rows, q.cols, r.rows, r.cols]).toEqual([4, 4, 4, 3]);
    expect(approxEqual(float64, multiply(float64, transpose(q), q), identity(float64, 4), 1e-12)).toBe(true);
    expect(approxEqual(float64, multiply(float64, q, r), a(), 1e-12)).toBe(true);
    for (let i = 1; i < 4; i++) {
      for (let j = 0; j < Math.min(i, 3); j++) {
        expect(at(r, i, j)).toBe(0);
      }
    }
  });

  it('gram-schmidt gives a thin Q with orthonormal columns', () => {
    const { q, r } = qrDecompose(float64, a(), { method: 'gramSchmidt' });
    expect([q.rows, q.cols, r.rows, r.cols]).toEqual([4, 3, 3, 3]);
    expect(approxEqual(float64, multiply(float64, transpose(q), q), identity(float64, 3), 1e-12)).toBe(true);
    expect(approxEqual(float64, multiply(float64, q, r), a(), 1e-12)).toBe(true);
    expect(at(r, 1, 0)).toBe(0);
    expect(at(r, 2, 1)).toBe(0);
  });

  it('gram-schmidt replaces a dependent column with zeros', () => {
    const dependent = matrixFromRows([
      [1, 2],
      [2, 4],
      [3, 6],
    ]);
    const { q, r } = qrDecompose(float64, dependent, { method: 'gramSchmidt' });
    expect(at(r, 1, 1)).toBe(0);
    expect(vectorToArray(column(q, 1))).toEqual([0, 0, 0]);
    expect(approxEqual(float64, multiply(float64, q, r), dependent, 1e-9)).toBe(true);
  });

  it('never produces NaN for a zero matrix', () => {
    for (const method of ['householder', 'gramSchmidt'] as const) {
      const { q, r } = qrDecompose(float64, zeros(float64, 2, 2), { method });
      expect(toRows(r)).toEqual([
        [0, 0],
        [0, 0],
      ]);
      expect(toRows(q).flat().some(Number.isNaN)).toBe(false);
    }
    expect(toRows(qrDecompose(float64, zeros(float64, 2, 2)).q)).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });
});

// ---------------------------------------------------------------------------
// QR algorithm
// ---------------------------------------------------------------------------

describe('qrAlgorithm', () => {
  it('finds both eigenvalues of a symmetric matrix', () => {
    const a = symmetric();
    const result = qrAlgorithm(float64, a);
    expect(result.converged).toBe(true);
    expect(result.strategy).toBe('qr');
    const [low, high] = ascending(result.values);
    expect(low).toBeCloseTo(5, 8);
    expect(high).toBeCloseTo(10, 8);
    result.values.forEach((value, k) => {
      expect(residual(a, value, column(result.vectors, k))).toBeLessThan(1e-6);
    });
  });

  it('solves a symmetric 3x3 with either factorization', () => {
    const a = tridiagonal();
    for (const method of ['householder', 'gramSchmidt'] as const) {
      const result = qrAlgorithm(float64, a, { method });
      expect(result.converged).toBe(true);
      const values = ascending(result.values);
      expect(values[0]).toBeCloseTo(2 - Math.SQRT2, 8);
      expect(values[1]).toBeCloseTo(2, 8);
      expect(values[2]).toBeCloseTo(2 + Math.SQRT2, 8);
      result.values.forEach((value, k) => {
        expect(residual(a, value, column(result.vectors, k))).toBeLessThan(1e-6);
      });
    }
  });

  it('back-substitutes eigenvectors of a non-symmetric matrix', () => {
    const a = matrixFromRows([
      [4, 1],
      [2, 3],
    ]);
    const result = qrAlgorithm(float64, a);
    expect(result.converged).toBe(true);
    const [low, high] = ascending(result.values);
    expect(low).toBeCloseTo(2, 8);
    expect(high).toBeCloseTo(5, 8);
    result.values.forEach((value, k) => {
      expect(residual(a, value, column(result.vectors, k))).toBeLessThan(1e-6);
    });
  });

  it('reads an upper-triangular input without iterating', () => {
    const a = matrixFromRows([
      [2, 1, 0],
      [0, 3, 1],
      [0, 0, 5],
    ]);
    const result = qrAlgorithm(float64, a);
    expect(result.iterations).toBe(0);
    expect(result.values).toEqual([2, 3, 5]);
    expect(vectorToArray(column(result.vectors, 0))).toEqual([1, 0, 0]);
    result.values.forEach((value, k) => {
      expect(residual(a, value, column(result.vectors, k))).toBeLessThan(1e-12);
    });
  });

  it('keeps unit eigenvectors for a singular input under gram-schmidt', () => {
    const { logger, lines } = recordingLogger();
    const a = matrixFromRows([
      [1, 1],
      [1, 1],
    ]);
    const result = qrAlgorithm(float64, a, { method: 'gramSchmidt', logger });
    expect(result.converged).toBe(true);
    const [low, high] = ascending(result.values);
    expect(low).toBeCloseTo(0, 10);
    expect(high).toBeCloseTo(2, 10);
    result.values.forEach((value, k) => {
      const v = column(result.vectors, k);
      expect(norm(float64, v)).toBeCloseTo(1, 12);
      expect(residual(a, value, v)).toBeLessThan(1e-10);
    });
    expect(lines[0]).toMatchObject({ level: 'debug', msg: 'rank-deficient iterate, using householder', column: 1 });
  });

  it('stops at the cap when eigenvalues share a magnitude', () => {
    const { logger, lines } = recordingLogger();
    const swap = matrixFromRows([
      [0, 1],
      [1, 0],
    ]);
    const result = qrAlgorithm(float64, swap, { maxIterations: 10, logger });
    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(10);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'warn', iterations: 10, size: 2 });
  });

  it('requires a square matrix', () => {
    expect(() => qrAlgorithm(float64, matrixFromRows([[1, 2]]))).toThrow(DimensionMismatchError);
  });
});

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

describe('eigen', () => {
  it('answers 0x0 and 1x1 directly', () => {
    const empty = eigen(float64, matrixFromRows<number>([]));
    expect(empty.values).toEqual([]);
    expect(empty.strategy).toBe('trivial');

    const single = eigen(float64, matrixFromRows([[7]]));
    expect(single.values).toEqual([7]);
    expect(toRows(single.vectors)).toEqual([[1]]);
    expect(single.strategy).toBe('trivial');
  });

  it('uses the closed form for a real 2x2', () => {
    const a = symmetric();
    const result = eigen(float64, a);
    expect(result.strategy).toBe('analytic');
    expect(result.values).toEqual([10, 5]);
    expect(result.iterations).toBe(0);
    expect(residual(a, 10, column(result.vectors, 0))).toBeLessThan(1e-12);
    expect(residual(a, 5, column(result.vectors, 1))).toBeLessThan(1e-12);
  });

  it('uses the QR algorithm for larger matrices', () => {
    expect(eigen(float64, tridiagonal()).strategy).toBe('qr');
  });

  it('falls through to the QR algorithm for a complex 2x2', () => {
    const { logger } = recordingLogger();
    const rotation = matrixFromRows([
      [0, -1],
      [1, 0],
    ]);
    const result = eigen(float64, rotation, { maxIterations: 5, logger });
    expect(result.strategy).toBe('qr');
    expect(result.converged).toBe(false);
  });

  it('honours a forced strategy', () => {
    const forced = eigen(float64, symmetric(), { strategy: 'qr' });
    expect(forced.strategy).toBe('qr');
    expect(ascending(forced.values)[1]).toBeCloseTo(10, 8);

    expect(() => eigen(float64, tridiagonal(), { strategy: 'analytic' })).toThrow(DimensionMismatchError);
    expect(() =>
      eigen(
        float64,
        matrixFromRows([
          [0, -1],
          [1, 0],
        ]),
        { strategy: 'analytic' },
      ),
    ).toThrow(InvalidArgumentError);
  });
});
