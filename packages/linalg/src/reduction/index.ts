export { findPivot, divideRow, subtractRowMultiple, clearColumn, type PivotCandidate } from './pivot.js';
export { rowReduceInPlace, rowReduce, rank, type ReductionSummary } from './row-reduce.js';
export { determinant, cofactorDeterminant, isInvertible, COFACTOR_LIMIT } from './determinant.js';
export { inverse, solve } from './inverse.js';
