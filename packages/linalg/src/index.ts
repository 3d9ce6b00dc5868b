// ---------------------------------------------------------------------------
// @rowspace/linalg
// ---------------------------------------------------------------------------
// Dense linear algebra over pluggable scalar types: strided storage with
// zero-copy views, row reduction, determinant, inverse, QR and eigen
// solvers.
// ---------------------------------------------------------------------------

export * from './types.js';

export * from './errors.js';
export * from './logger.js';
export * from './scalar/index.js';
export * from './storage/index.js';
export * from './views/index.js';
export * from './ops/index.js';
export * from './reduction/index.js';
export * from './eigen/index.js';
export { createLinalg, f64, exact, type Linalg, type RealLinalg } from './api.js';
