/**
 * gf256-shares
 * GF(256) arithmetic and threshold share reconstruction
 *
 * Provides:
 * - Field arithmetic on bytes modulo x^8 + x^4 + x^3 + x + 1
 * - Lagrange interpolation of shares at any coordinate
 * - Byte-string secret sharing on top of the two
 */

// =============================================================================
// Field Arithmetic
// =============================================================================

export { GF, GF_LOGS, GF_ILOGS, GF_POLYNOMIAL, GFError, GFErrorCode } from './gf256/index.js';

// =============================================================================
// Interpolation
// =============================================================================

export { interpolate, InterpolationError, InterpolationErrorCode } from './interpolation/index.js';

export type { Share } from './interpolation/types.js';

// =============================================================================
// Secret Sharing
// =============================================================================

export {
  ShamirSecretSharing,
  split,
  combine,
  generatePolynomial,
  evaluatePolynomial,
  ShamirError,
  ShamirErrorCode,
} from './shamir/index.js';

export type { RandomSource, ShamirConfig, ShamirOptions, SplitResult } from './shamir/types.js';

// =============================================================================
// Serialization
// =============================================================================

export {
  encodeShare,
  decodeShare,
  shareToBytes,
  shareFromBytes,
  EncodedShareSchema,
  ShareCodecError,
  ShareCodecErrorCode,
} from './codec/index.js';

export type { EncodedShare } from './codec/types.js';

// =============================================================================
// Logging
// =============================================================================

export { createLogger, levelFromEnv } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
