export {
  matrixFromBuffer,
  matrixFromRows,
  generate,
  fill,
  zeros,
  identity,
  bufferIndex,
  at,
  set,
  subMatrix,
  swapRows,
  swapColumns,
  mapInPlace,
  clone,
  withCopy,
  map,
  toRows,
  type Layout,
} from './matrix.js';

export {
  vectorFromArray,
  vectorFromBuffer,
  filledVector,
  vectorAt,
  vectorSet,
  subVector,
  vectorToArray,
  vectorMapInPlace,
  cloneVector,
  dot,
  norm,
  normalizeInPlace,
  normalize,
  vectorSub,
  vectorScale,
} from './vector.js';
