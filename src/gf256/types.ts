/**
 * Types for GF(256) arithmetic
 */

/**
 * Error codes raised by field operations
 */
export enum GFErrorCode {
  INVALID_ELEMENT = 'INVALID_ELEMENT',
  INVALID_EXPONENT = 'INVALID_EXPONENT',
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  LOG_OF_ZERO = 'LOG_OF_ZERO',
  ZERO_TO_NON_POSITIVE_POWER = 'ZERO_TO_NON_POSITIVE_POWER',
}

/**
 * Error thrown when a field operation is called outside its domain
 */
export class GFError extends Error {
  constructor(
    message: string,
    public readonly code: GFErrorCode
  ) {
    super(message);
    this.name = 'GFError';
  }
}
