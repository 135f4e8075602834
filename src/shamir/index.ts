/**
 * Shamir Secret Sharing over GF(256)
 *
 * Implements (t, n) threshold sharing of byte strings where:
 * - Every secret byte is the constant term of its own random polynomial
 *   of degree t - 1
 * - Share i holds the value of every polynomial at the caller's x_i
 * - Any t shares reconstruct the secret by interpolating at x = 0
 *
 * The x-coordinates are chosen by the caller. They must be non-zero, since
 * the share at x = 0 is the secret itself.
 */

import { randomBytes } from '@noble/hashes/utils';
import { GF } from '../gf256/index.js';
import { interpolate } from '../interpolation/index.js';
import type { Share } from '../interpolation/types.js';
import { createLogger, type Logger } from '../logger.js';
import { ShamirError, ShamirErrorCode } from './types.js';
import type { RandomSource, ShamirConfig, ShamirOptions, SplitResult } from './types.js';

const MIN_THRESHOLD = 2;

/** Redraws allowed for a zero leading coefficient before giving up on the random source */
const MAX_REDRAWS = 255;

/**
 * Generate a random polynomial of specified degree with the secret as the
 * constant term.
 *
 * The polynomial is: f(x) = a_0 + a_1*x + ... + a_d*x^d where a_0 = secret.
 * The leading coefficient a_d is never zero, so the degree is exact.
 *
 * @throws ShamirError if the random source keeps returning zero for a_d
 * @param secret - The constant term a_0
 * @param degree - The degree of the polynomial (threshold - 1)
 * @param random - Source of the random coefficients
 * @returns Coefficients [a_0, a_1, ..., a_d]
 */
export function generatePolynomial(
  secret: GF,
  degree: number,
  random: RandomSource = randomBytes
): GF[] {
  if (!Number.isInteger(degree) || degree < 0) {
    throw new ShamirError('Polynomial degree must be a non-negative integer', ShamirErrorCode.INVALID_DEGREE);
  }

  const coefficients: GF[] = [secret];
  if (degree === 0) return coefficients;

  coefficients.push(...GF.fromBytes(random(degree)));

  let leading = coefficients[degree];
  for (let redraws = 0; leading.isZero(); redraws++) {
    if (redraws === MAX_REDRAWS) {
      throw new ShamirError(
        `Random source returned zero ${MAX_REDRAWS + 1} times for the leading coefficient`,
        ShamirErrorCode.RANDOM_SOURCE_FAILURE
      );
    }
    leading = GF.fromBytes(random(1))[0];
  }
  coefficients[degree] = leading;

  return coefficients;
}

/**
 * Evaluate a polynomial at point x using Horner's method.
 *
 * @param coefficients - Polynomial coefficients [a_0, a_1, ..., a_n]
 * @param x - The point at which to evaluate
 */
export function evaluatePolynomial(coefficients: readonly GF[], x: GF): GF {
  if (coefficients.length === 0) {
    throw new ShamirError('Coefficients array cannot be empty', ShamirErrorCode.EMPTY_POLYNOMIAL);
  }

  let result = coefficients[coefficients.length - 1];
  for (let i = coefficients.length - 2; i >= 0; i--) {
    result = result.mul(x).add(coefficients[i]);
  }

  return result;
}

function validateThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < MIN_THRESHOLD || threshold > GF.MAX) {
    throw new ShamirError(
      `Threshold must be an integer in [${MIN_THRESHOLD}, ${GF.MAX}], got ${threshold}`,
      ShamirErrorCode.INVALID_THRESHOLD
    );
  }
}

function validateCoordinates(xs: readonly number[], threshold: number): GF[] {
  if (xs.length < threshold) {
    throw new ShamirError(
      `Total shares (${xs.length}) must be >= threshold (${threshold})`,
      ShamirErrorCode.NOT_ENOUGH_COORDINATES
    );
  }

  const seen = new Set<number>();
  return xs.map((x, i) => {
    if (!Number.isInteger(x) || x < 1 || x > 0xff) {
      throw new ShamirError(
        `Share ${i} has invalid x-coordinate ${x} (must be in [1, 255])`,
        ShamirErrorCode.INVALID_COORDINATE
      );
    }
    if (seen.has(x)) {
      throw new ShamirError(`Duplicate x-coordinate ${x}`, ShamirErrorCode.DUPLICATE_COORDINATE);
    }
    seen.add(x);
    return GF.from(x);
  });
}

/**
 * Split a secret into shares.
 *
 * @param secret - The bytes to share (at least one)
 * @param config - Threshold and the x-coordinate of every share
 * @returns One share per x-coordinate, each holding `secret.length` values
 */
export function split(secret: Uint8Array, config: ShamirConfig): SplitResult {
  const { threshold, random = randomBytes } = config;

  validateThreshold(threshold);
  const xs = validateCoordinates(config.xs, threshold);

  if (secret.length === 0) {
    throw new ShamirError('Secret must contain at least one byte', ShamirErrorCode.EMPTY_SECRET);
  }

  const polynomials = GF.fromBytes(secret).map((s) => generatePolynomial(s, threshold - 1, random));

  const shares: Share[] = xs.map((x) => ({
    x,
    ys: polynomials.map((coefficients) => evaluatePolynomial(coefficients, x)),
  }));

  return { shares, threshold };
}

/**
 * Reconstruct a secret from shares by interpolating at x = 0.
 *
 * At least `threshold` shares of the same split are needed for the result
 * to be the secret; fewer produce an unrelated byte string.
 *
 * @throws InterpolationError if the shares cannot be interpolated together
 */
export function combine(shares: readonly Share[]): Uint8Array {
  return GF.toBytes(interpolate(shares, GF.ZERO).ys);
}

/**
 * Shamir Secret Sharing class with convenient API
 *
 * @example
 * ```typescript
 * const sss = new ShamirSecretSharing({ threshold: 3 });
 * const { shares } = sss.split(new TextEncoder().encode('test-secret'), [1, 2, 3, 4, 5]);
 *
 * const secret = sss.combine([shares[0], shares[2], shares[4]]);
 * const lost = sss.recover([shares[0], shares[2], shares[4]], 2);
 * ```
 */
export class ShamirSecretSharing {
  private readonly threshold: number;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(options: ShamirOptions) {
    validateThreshold(options.threshold);
    this.threshold = options.threshold;
    this.random = options.random ?? randomBytes;
    this.logger = options.logger ?? createLogger({ name: 'shamir' });
  }

  /**
   * Split a secret into one share per x-coordinate
   */
  split(secret: Uint8Array, xs: readonly number[]): SplitResult {
    const result = split(secret, { threshold: this.threshold, xs, random: this.random });
    this.logger.debug(
      { threshold: this.threshold, shares: result.shares.length, length: secret.length },
      'split secret'
    );
    return result;
  }

  /**
   * Combine shares to reconstruct the secret
   */
  combine(shares: readonly Share[]): Uint8Array {
    const secret = combine(shares);
    this.logger.debug({ shares: shares.length, length: secret.length }, 'combined shares');
    return secret;
  }

  /**
   * Re-create the share at `x` from any `threshold` shares
   */
  recover(shares: readonly Share[], x: number): Share {
    const [destX] = validateCoordinates([x], 1);
    const share = interpolate(shares, destX);
    this.logger.debug({ shares: shares.length, x }, 'recovered share');
    return share;
  }

  getThreshold(): number {
    return this.threshold;
  }
}

export { ShamirError, ShamirErrorCode } from './types.js';
export type { RandomSource, ShamirConfig, ShamirOptions, SplitResult } from './types.js';
