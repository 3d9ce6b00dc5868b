export { qrDecompose } from './qr.js';
export { eigen2x2 } from './eigen2x2.js';
export { powerIteration } from './power-iteration.js';
export { qrAlgorithm } from './qr-algorithm.js';
export { eigen } from './eigen.js';
