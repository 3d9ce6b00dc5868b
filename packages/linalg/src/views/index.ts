export { transpose, materialize, isTranspose } from './transpose.js';
export { view, rowView, columnView, diagonalView, viewLength } from './view.js';
export { lens, lenses } from './lens.js';
