// ---------------------------------------------------------------------------
// @rowspace/linalg: Error taxonomy
// ---------------------------------------------------------------------------
// Shape and bounds violations are precondition failures and throw.
// Singularity (inverse/solve) and non-convergence (iterative solvers) are
// returned as data instead.
// ---------------------------------------------------------------------------

/** Base class for every error raised by the kernel. */
export class LinalgError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LinalgError';
  }
}

/**
 * Operand shapes are incompatible with the operation, e.g. a non-square
 * input to `determinant` or a buffer whose length disagrees with the
 * declared dimensions.
 */
export class DimensionMismatchError extends LinalgError {
  constructor(
    public readonly operation: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`${operation}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

/** Element, view, lens or window access outside the declared dimensions. */
export class IndexOutOfBoundsError extends LinalgError {
  constructor(
    public readonly index: string,
    public readonly bounds: string,
  ) {
    super(`Index ${index} out of bounds for ${bounds}`);
    this.name = 'IndexOutOfBoundsError';
  }
}

/** An argument has the right shape but an unusable value. */
export class InvalidArgumentError extends LinalgError {
  constructor(
    public readonly argument: string,
    reason: string,
  ) {
    super(`Invalid ${argument}: ${reason}`);
    this.name = 'InvalidArgumentError';
  }
}

/** Throws DimensionMismatchError unless the matrix is square. */
export function assertSquare(
  operation: string,
  shape: { readonly rows: number; readonly cols: number },
): void {
  if (shape.rows !== shape.cols) {
    throw new DimensionMismatchError(
      operation,
      'a square matrix',
      `${shape.rows}x${shape.cols}`,
    );
  }
}
