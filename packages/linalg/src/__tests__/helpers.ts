import type { Matrix, MatrixLike, Vector } from '../types.js';
import { float64 } from '../scalar/float64.js';
import { rational, formatRational, type Rational } from '../scalar/rational.js';
import { at, matrixFromRows, toRows } from '../storage/matrix.js';
import { norm, vectorAt, vectorFromArray } from '../storage/vector.js';
import { multiplyVector } from '../ops/arithmetic.js';
import { createLogger, type Logger } from '../logger.js';

/** Dense rational matrix from integer rows. */
export function q(rows: readonly (readonly number[])[]): Matrix<Rational> {
  return matrixFromRows(rows.map((row) => row.map((value) => rational(value))));
}

/** Rational matrix rendered as "n" / "n/d" strings. */
export function qRows(m: MatrixLike<Rational>): string[][] {
  return toRows(m).map((row) => row.map(formatRational));
}

/** ‖A·v − λ·v‖ over float64. */
export function residual(a: MatrixLike<number>, lambda: number, v: Vector<number>): number {
  const av = multiplyVector(float64, a, v);
  const diff: number[] = [];
  for (let k = 0; k < v.size; k++) {
    diff.push(vectorAt(av, k) - lambda * vectorAt(v, k));
  }
  return norm(float64, vectorFromArray(diff));
}

/** Column j of a float matrix as a vector. */
export function column(m: MatrixLike<number>, j: number): Vector<number> {
  const out: number[] = [];
  for (let i = 0; i < m.rows; i++) out.push(at(m, i, j));
  return vectorFromArray(out);
}

/** Logger that records parsed lines instead of writing to stdout. */
export function recordingLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    scope: 'test',
    level: 'debug',
    sink: (line) => {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}
