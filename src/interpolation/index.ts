/**
 * Lagrange interpolation over GF(256)
 *
 * Given n shares of m polynomials of degree n - 1, computes the value of every
 * polynomial at an arbitrary coordinate. The Lagrange basis coefficients are
 * built in the logarithm domain, which turns each product of ratios into a
 * sum of table lookups:
 *
 *   L_i(d) = Π_{j≠i} (x_j - d) / (x_i - x_j)
 *   log L_i(d) = a - log(x_i - d) - Σ_{j≠i} log(x_i - x_j)
 *
 * where a = Σ_j log(x_j - d) is shared by every basis coefficient. Signs
 * vanish in characteristic 2. Cost is O(n·(n+m)) field operations.
 */

import { GF } from '../gf256/index.js';
import { InterpolationError, InterpolationErrorCode } from './types.js';
import type { Share } from './types.js';

/**
 * Evaluate the polynomials implied by `shares` at `destX`.
 *
 * If one of the shares already sits at `destX`, that share object is returned
 * as is.
 *
 * @param shares - At least 2 shares with distinct x and equal-length ys
 * @param destX - The coordinate to evaluate at
 * @returns A share at `destX`
 * @throws InterpolationError on fewer than 2 shares, ys of different lengths,
 *   or two shares with the same x
 *
 * @example
 * ```typescript
 * // Recover the secrets stored at x = 0
 * const secret = interpolate([share1, share2, share3], GF.ZERO);
 * ```
 */
export function interpolate(shares: readonly Share[], destX: GF): Share {
  if (shares.length < 2) {
    throw new InterpolationError(
      `At least 2 shares are required, got ${shares.length}`,
      InterpolationErrorCode.TOO_FEW_SHARES
    );
  }

  const width = shares[0].ys.length;
  for (let i = 1; i < shares.length; i++) {
    if (shares[i].ys.length !== width) {
      throw new InterpolationError(
        `Share ${i} has ${shares[i].ys.length} values, expected ${width}`,
        InterpolationErrorCode.MISMATCHED_LENGTHS
      );
    }
  }

  // log of Π (x_j - destX)
  let a = 0;
  const offsets: number[] = [];
  for (const share of shares) {
    const d = share.x.sub(destX);
    if (d.isZero()) return share;

    const logD = d.log();
    offsets.push(logD);
    a += logD;
  }

  const result = new Uint8Array(width);

  for (let i = 0; i < shares.length; i++) {
    const s = shares[i];
    let b = a - offsets[i];

    for (let j = 0; j < shares.length; j++) {
      if (j === i) continue;

      const d = s.x.sub(shares[j].x);
      if (d.isZero()) {
        throw new InterpolationError(
          `Shares ${i} and ${j} have the same x-coordinate ${s.x}`,
          InterpolationErrorCode.DUPLICATE_X
        );
      }
      b -= d.log();
    }

    for (let k = 0; k < width; k++) {
      const y = s.ys[k];
      if (y.isZero()) continue;
      result[k] ^= GF.exp(b + y.log()).value;
    }
  }

  return { x: destX, ys: GF.fromBytes(result) };
}

export { InterpolationError, InterpolationErrorCode } from './types.js';
export type { Share } from './types.js';
