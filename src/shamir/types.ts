/**
 * Types for Shamir Secret Sharing over GF(256)
 */

import type { Share } from '../interpolation/types.js';
import type { Logger } from '../logger.js';

/**
 * Source of uniformly random bytes
 */
export type RandomSource = (length: number) => Uint8Array;

/**
 * Configuration for a single split
 */
export interface ShamirConfig {
  /** Minimum number of shares required for reconstruction (threshold) */
  threshold: number;
  /** x-coordinates of the shares to produce, non-zero and distinct */
  xs: readonly number[];
  /** Random source for polynomial coefficients (default: crypto RNG) */
  random?: RandomSource;
}

/**
 * Result of splitting a secret
 */
export interface SplitResult {
  /** One share per requested x-coordinate, in the same order */
  shares: Share[];
  /** The threshold required for reconstruction */
  threshold: number;
}

/**
 * Options for the {@link ShamirSecretSharing} class
 */
export interface ShamirOptions {
  /** Threshold used by every split */
  threshold: number;
  /** Random source (default: crypto RNG) */
  random?: RandomSource;
  /** Logger (default: createLogger()) */
  logger?: Logger;
}

export enum ShamirErrorCode {
  INVALID_THRESHOLD = 'INVALID_THRESHOLD',
  INVALID_DEGREE = 'INVALID_DEGREE',
  EMPTY_POLYNOMIAL = 'EMPTY_POLYNOMIAL',
  EMPTY_SECRET = 'EMPTY_SECRET',
  NOT_ENOUGH_COORDINATES = 'NOT_ENOUGH_COORDINATES',
  INVALID_COORDINATE = 'INVALID_COORDINATE',
  DUPLICATE_COORDINATE = 'DUPLICATE_COORDINATE',
  RANDOM_SOURCE_FAILURE = 'RANDOM_SOURCE_FAILURE',
}

/**
 * Error thrown when a split is requested with invalid parameters
 */
export class ShamirError extends Error {
  constructor(
    message: string,
    public readonly code: ShamirErrorCode
  ) {
    super(message);
    this.name = 'ShamirError';
  }
}
