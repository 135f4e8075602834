/**
 * Share serialization
 *
 * Two forms are supported:
 * - JSON objects `{ x, ys }` with the y-values hex-encoded
 * - Raw bytes `[x, y_0, y_1, ...]`
 */

import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { GF } from '../gf256/index.js';
import type { Share } from '../interpolation/types.js';
import { EncodedShareSchema, ShareCodecError, ShareCodecErrorCode } from './types.js';
import type { EncodedShare } from './types.js';

export function encodeShare(share: Share): EncodedShare {
  return {
    x: share.x.value,
    ys: bytesToHex(GF.toBytes(share.ys)),
  };
}

/**
 * Decode and validate a share in JSON form
 *
 * @throws ShareCodecError if `input` is not a valid encoded share
 */
export function decodeShare(input: unknown): Share {
  const parsed = EncodedShareSchema.safeParse(input);
  if (!parsed.success) {
    throw new ShareCodecError(
      `Invalid share: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      ShareCodecErrorCode.INVALID_SHARE,
      parsed.error.issues
    );
  }

  return {
    x: GF.from(parsed.data.x),
    ys: GF.fromBytes(hexToBytes(parsed.data.ys)),
  };
}

export function shareToBytes(share: Share): Uint8Array {
  const bytes = new Uint8Array(share.ys.length + 1);
  bytes[0] = share.x.value;
  bytes.set(GF.toBytes(share.ys), 1);
  return bytes;
}

/**
 * @throws ShareCodecError if `bytes` is empty
 */
export function shareFromBytes(bytes: Uint8Array): Share {
  if (bytes.length === 0) {
    throw new ShareCodecError('Share must contain at least the x-coordinate', ShareCodecErrorCode.INVALID_SHARE);
  }

  return {
    x: GF.from(bytes[0]),
    ys: GF.fromBytes(bytes.subarray(1)),
  };
}

export { EncodedShareSchema, ShareCodecError, ShareCodecErrorCode } from './types.js';
export type { EncodedShare } from './types.js';
