export {
  add,
  subtract,
  scale,
  multiply,
  multiplyVector,
  trace,
  approxEqual,
  maxAbs,
  formatMatrix,
} from './arithmetic.js';
