// ---------------------------------------------------------------------------
// @rowspace/linalg: QR decomposition
// ---------------------------------------------------------------------------
// Householder: one reflection per column, H = I - 2vvᵀ/(vᵀv), with the sign
// of the reflected diagonal chosen opposite to the leading entry so that
// v never cancels. Q accumulates the reflections (full, m x m).
//
// Modified Gram-Schmidt: columns are orthonormalized left to right and each
// new q is projected out of the remaining columns immediately. Q is thin
// (m x n), R is n x n.
//
// A column whose remaining norm is within tolerance contributes no
// reflection (Householder) or a zero q with R[j][j] = 0 (Gram-Schmidt).
// Neither path divides by a negligible norm.
// ---------------------------------------------------------------------------

import type { Matrix, MatrixLike, QrDecomposition, QrOptions } from '../types.js';
import type { RealScalar } from '../scalar/field.js';
import { checkTolerance, isNegligible } from '../scalar/field.js';
import { at, clone, identity, set, zeros } from '../storage/matrix.js';
import { dot, norm, vectorMapInPlace, vectorSet } from '../storage/vector.js';
import { columnView } from '../views/view.js';

/** Factors `a` (m x n) as Q·R. Default method: householder. */
export function qrDecompose<T>(
  S: RealScalar<T>,
  a: MatrixLike<T>,
  options: QrOptions<T> = {},
): QrDecomposition<T> {
  const tolerance = checkTolerance(S, options.tolerance ?? S.epsilon);
  return options.method === 'gramSchmidt'
    ? gramSchmidt(S, a, tolerance)
    : householder(S, a, tolerance);
}

function householder<T>(S: RealScalar<T>, a: MatrixLike<T>, tolerance: T): QrDecomposition<T> {
  const m = a.rows;
  const n = a.cols;
  const r = clone(a);
  const q = identity(S, m);
  const two = S.fromInteger(2);
  const steps = Math.min(m - 1, n);

  for (let k = 0; k < steps; k++) {
    const x = columnView(r, k);
    let alpha = S.zero;
    for (let i = k; i < m; i++) {
      const value = at(r, i, k);
      alpha = S.add(alpha, S.mul(value, value));
    }
    alpha = S.sqrt(alpha);

    if (isNegligible(S, alpha, tolerance)) {
      for (let i = k + 1; i < m; i++) vectorSet(x, i, S.zero);
      continue;
    }

    // Reflect x onto s·e_k, s = -sign(x_k)·alpha.
    const lead = at(r, k, k);
    const s = S.compare(lead, S.zero) >= 0 ? S.neg(alpha) : alpha;
    const v: T[] = [];
    for (let i = k; i < m; i++) v.push(at(r, i, k));
    v[0] = S.sub(lead, s);

    let vtv = S.zero;
    for (const vi of v) vtv = S.add(vtv, S.mul(vi, vi));

    // R <- H·R over rows k.. and columns k+1..
    for (let j = k + 1; j < n; j++) {
      let proj = S.zero;
      for (let i = 0; i < v.length; i++) proj = S.add(proj, S.mul(v[i]!, at(r, k + i, j)));
      const f = S.div(S.mul(two, proj), vtv);
      for (let i = 0; i < v.length; i++) set(r, k + i, j, S.sub(at(r, k + i, j), S.mul(f, v[i]!)));
    }
    set(r, k, k, s);
    for (let i = k + 1; i < m; i++) set(r, i, k, S.zero);

    // Q <- Q·H
    for (let row = 0; row < m; row++) {
      let proj = S.zero;
      for (let i = 0; i < v.length; i++) proj = S.add(proj, S.mul(at(q, row, k + i), v[i]!));
      const f = S.div(S.mul(two, proj), vtv);
      for (let i = 0; i < v.length; i++) set(q, row, k + i, S.sub(at(q, row, k + i), S.mul(f, v[i]!)));
    }
  }

  return { q, r };
}

function gramSchmidt<T>(S: RealScalar<T>, a: MatrixLike<T>, tolerance: T): QrDecomposition<T> {
  const n = a.cols;
  const q: Matrix<T> = clone(a);
  const r = zeros(S, n, n);

  for (let j = 0; j < n; j++) {
    const qj = columnView(q, j);
    const length = norm(S, qj);
    if (isNegligible(S, length, tolerance)) {
      vectorMapInPlace(qj, () => S.zero);
      continue;
    }
    set(r, j, j, length);
    vectorMapInPlace(qj, (value) => S.div(value, length));

    for (let k = j + 1; k < n; k++) {
      const vk = columnView(q, k);
      const coefficient = dot(S, qj, vk);
      set(r, j, k, coefficient);
      vectorMapInPlace(vk, (value, i) => S.sub(value, S.mul(coefficient, at(q, i, j))));
    }
  }

  return { q, r };
}
