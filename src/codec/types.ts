/**
 * Types for share serialization
 */

import { z } from 'zod';

/**
 * JSON form of a share: the x byte and the y bytes as lower-case hex
 */
export const EncodedShareSchema = z.object({
  x: z.number().int().min(0).max(255),
  ys: z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'ys must be an even-length hex string'),
});

export type EncodedShare = z.infer<typeof EncodedShareSchema>;

export enum ShareCodecErrorCode {
  INVALID_SHARE = 'INVALID_SHARE',
}

/**
 * Error thrown when a share cannot be decoded
 */
export class ShareCodecError extends Error {
  constructor(
    message: string,
    public readonly code: ShareCodecErrorCode,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ShareCodecError';
  }
}
