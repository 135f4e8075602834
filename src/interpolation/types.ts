/**
 * Types for Lagrange interpolation over GF(256)
 */

import type { GF } from '../gf256/index.js';

/**
 * One sample point of one or more polynomials sharing the same x-coordinate.
 *
 * `ys[j]` is the value at `x` of the j-th polynomial. Shares interpolated
 * together must have distinct `x` and the same number of `ys`.
 */
export interface Share {
  /** The evaluation point */
  readonly x: GF;
  /** One value per polynomial slot */
  readonly ys: readonly GF[];
}

/**
 * Error codes raised when interpolation preconditions are violated
 */
export enum InterpolationErrorCode {
  TOO_FEW_SHARES = 'TOO_FEW_SHARES',
  MISMATCHED_LENGTHS = 'MISMATCHED_LENGTHS',
  DUPLICATE_X = 'DUPLICATE_X',
}

export class InterpolationError extends Error {
  constructor(
    message: string,
    public readonly code: InterpolationErrorCode
  ) {
    super(message);
    this.name = 'InterpolationError';
  }
}
