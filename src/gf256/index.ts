/**
 * GF(256) arithmetic
 *
 * Elements of the Galois Field GF(2^8) are single bytes. Addition is XOR and
 * multiplication is polynomial multiplication modulo the reducing polynomial
 * x^8 + x^4 + x^3 + x + 1 (0x11b).
 *
 * The non-zero elements form a cyclic group of order 255 generated by 3, so
 * multiplication, division and exponentiation reduce to additions of discrete
 * logarithms read from two precomputed tables.
 */

import { GFError, GFErrorCode } from './types.js';

/**
 * The reducing polynomial x^8 + x^4 + x^3 + x + 1
 */
export const GF_POLYNOMIAL = 0x11b;

/** Size of the multiplicative group (every element except zero) */
const ORDER = 255;

/** Byte value of the generator element */
const GENERATOR = 3;

/**
 * Carry-less multiplication of two bytes, reduced by the field polynomial.
 * Only used to build the tables.
 */
function multiplyBits(a: number, b: number): number {
  let product = 0;

  while (b > 0) {
    if (b & 1) product ^= a;
    b >>= 1;
    a <<= 1;
    if (a & 0x100) a ^= GF_POLYNOMIAL;
  }

  return product;
}

function buildTables(): { logs: readonly number[]; ilogs: readonly number[] } {
  const logs = new Array<number>(ORDER).fill(0);
  const ilogs = new Array<number>(ORDER).fill(0);

  let x = 1;
  for (let k = 0; k < ORDER; k++) {
    ilogs[k] = x;
    logs[x - 1] = k;
    x = multiplyBits(x, GENERATOR);
  }

  return { logs: Object.freeze(logs), ilogs: Object.freeze(ilogs) };
}

const tables = buildTables();

/**
 * Logarithm table of the generator: `GF_LOGS[v - 1]` is the k in [0, 255)
 * such that 3^k == v.
 */
export const GF_LOGS: readonly number[] = tables.logs;

/**
 * Inverse logarithm table of the generator: `GF_ILOGS[k]` is 3^k.
 */
export const GF_ILOGS: readonly number[] = tables.ilogs;

/**
 * Reduce any integer into [0, 255)
 */
function normalize(k: number): number {
  const r = k % ORDER;
  return r < 0 ? r + ORDER : r;
}

function assertInteger(k: number, what: string): void {
  if (!Number.isSafeInteger(k)) {
    throw new GFError(`${what} must be an integer, got ${k}`, GFErrorCode.INVALID_EXPONENT);
  }
}

/**
 * An element of GF(256).
 *
 * Instances are immutable and interned: `GF.from(v) === GF.from(v)` for every
 * byte `v`. The ordering given by {@link GF.compare} is the byte order and has
 * no algebraic meaning.
 *
 * @example
 * ```typescript
 * const a = GF.from(0x57);
 * const b = GF.from(0x83);
 *
 * a.add(b);        // GF(212)
 * a.mul(b);        // GF(193)
 * a.mul(b).div(b); // GF(87)
 * a.pow(-1);       // multiplicative inverse of a
 * ```
 */
export class GF {
  /** Order of the multiplicative group */
  static readonly MAX = ORDER;

  private static readonly elements: readonly GF[] = Object.freeze(
    Array.from({ length: 256 }, (_, v) => Object.freeze(new GF(v)))
  );

  static readonly ZERO: GF = GF.elements[0];
  static readonly ONE: GF = GF.elements[1];
  static readonly GENERATOR: GF = GF.elements[GENERATOR];

  private constructor(
    /** The raw byte */
    readonly value: number
  ) {}

  // ===========================================================================
  // Construction and conversion
  // ===========================================================================

  /**
   * Get the element for a raw byte. Every byte is a valid, distinct element.
   *
   * @throws GFError if `v` is not an integer in [0, 255]
   */
  static from(v: number): GF {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) {
      throw new GFError(`Field element must be a byte, got ${v}`, GFErrorCode.INVALID_ELEMENT);
    }
    return GF.elements[v];
  }

  /**
   * Convert a byte array to field elements
   */
  static fromBytes(bytes: Uint8Array): GF[] {
    return Array.from(bytes, (v) => GF.elements[v]);
  }

  /**
   * Convert field elements back to a byte array
   */
  static toBytes(elements: readonly GF[]): Uint8Array {
    return Uint8Array.from(elements, (e) => e.value);
  }

  toByte(): number {
    return this.value;
  }

  toString(): string {
    return `GF(${this.value})`;
  }

  // ===========================================================================
  // Predicates and ordering
  // ===========================================================================

  isZero(): boolean {
    return this.value === 0;
  }

  equals(other: GF): boolean {
    return this.value === other.value;
  }

  compareTo(other: GF): number {
    return this.value - other.value;
  }

  /**
   * Byte-order comparator, usable with `Array.prototype.sort`
   */
  static compare(a: GF, b: GF): number {
    return a.value - b.value;
  }

  // ===========================================================================
  // Additive group
  // ===========================================================================

  /** Every element is its own opposite. */
  neg(): GF {
    return this;
  }

  plus(): GF {
    return this;
  }

  add(other: GF): GF {
    return GF.elements[this.value ^ other.value];
  }

  /** Same operation as {@link GF.add} in characteristic 2. */
  sub(other: GF): GF {
    return GF.elements[this.value ^ other.value];
  }

  // ===========================================================================
  // Multiplicative group
  // ===========================================================================

  mul(other: GF): GF {
    if (this.value === 0 || other.value === 0) return GF.ZERO;

    let c = GF_LOGS[this.value - 1] + GF_LOGS[other.value - 1];
    if (c >= ORDER) c -= ORDER;

    return GF.elements[GF_ILOGS[c]];
  }

  /**
   * @throws GFError if `other` is zero
   */
  div(other: GF): GF {
    if (other.value === 0) {
      throw new GFError(`Division of ${this} by zero`, GFErrorCode.DIVISION_BY_ZERO);
    }
    if (this.value === 0) return GF.ZERO;

    let c = GF_LOGS[this.value - 1] - GF_LOGS[other.value - 1];
    if (c < 0) c += ORDER;

    return GF.elements[GF_ILOGS[c]];
  }

  /**
   * Multiplicative inverse
   *
   * @throws GFError if this element is zero
   */
  inv(): GF {
    return GF.ONE.div(this);
  }

  /**
   * Raise this element to an integer power. Negative exponents are allowed
   * for non-zero elements.
   *
   * @throws GFError if this element is zero and `exponent <= 0`
   */
  pow(exponent: number): GF {
    assertInteger(exponent, 'Exponent');

    if (this.value === 0) {
      if (exponent <= 0) {
        throw new GFError(
          `Zero cannot be raised to the non-positive power ${exponent}`,
          GFErrorCode.ZERO_TO_NON_POSITIVE_POWER
        );
      }
      return GF.ZERO;
    }

    const reduced = exponent % ORDER;
    if (reduced === 0) return GF.ONE;

    return GF.elements[GF_ILOGS[normalize(reduced * GF_LOGS[this.value - 1])]];
  }

  /**
   * Discrete logarithm base the generator, in [0, 255)
   *
   * @throws GFError if this element is zero
   */
  log(): number {
    if (this.value === 0) {
      throw new GFError('Logarithm of zero is undefined', GFErrorCode.LOG_OF_ZERO);
    }
    return GF_LOGS[this.value - 1];
  }

  /**
   * Antilogarithm: the generator raised to `k`. Any integer is accepted and
   * reduced modulo 255.
   */
  static exp(k: number): GF {
    assertInteger(k, 'Logarithm');
    return GF.elements[GF_ILOGS[normalize(k)]];
  }
}

export { GFError, GFErrorCode } from './types.js';
