/**
 * Extended Tests for Shamir Secret Sharing over GF(256)
 *
 * Covers:
 * - Arbitrary (t,n) combinations and every reconstructing subset
 * - Share recovery at a new or lost coordinate
 * - The class API and its logging
 * - Long secrets and the full set of 255 coordinates
 */

import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { GF } from '../gf256/index.js';
import type { Share } from '../interpolation/types.js';
import { ShamirSecretSharing, split, combine, ShamirError } from './index.js';

function subsets<T>(items: T[], k: number): T[][] {
  if (k === 0) return [[]];
  if (items.length < k) return [];
  const [first, ...rest] = items;
  return [...subsets(rest, k - 1).map((s) => [first, ...s]), ...subsets(rest, k)];
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

function bytes(share: Share): number[] {
  return share.ys.map((y) => y.value);
}

/**
 * pino logger writing JSON records into an array
 */
function captureLogger() {
  const records: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    }
  );
  return { logger, records };
}

const encoder = new TextEncoder();

describe('Shamir Secret Sharing - Extended Tests', () => {
  // ===========================================================================
  // Property-Based Tests: Various (t,n) Combinations
  // ===========================================================================

  describe('property-based: arbitrary (t,n) combinations', () => {
    const cases: Array<[number, number]> = [
      [2, 2],
      [2, 4],
      [3, 3],
      [3, 6],
      [4, 7],
      [5, 5],
    ];

    for (const [t, n] of cases) {
      it(`should reconstruct from every ${t}-of-${n} subset`, () => {
        const secret = encoder.encode(`${t} of ${n}`);
        const { shares } = split(secret, { threshold: t, xs: range(1, n) });

        for (const subset of subsets(shares, t)) {
          expect(combine(subset)).toEqual(secret);
        }
      });
    }

    it('should reconstruct with every size above the threshold', () => {
      const secret = encoder.encode('above threshold');
      const { shares } = split(secret, { threshold: 3, xs: range(10, 16) });

      for (let k = 3; k <= shares.length; k++) {
        expect(combine(shares.slice(0, k))).toEqual(secret);
      }
    });
  });

  // ===========================================================================
  // Edge Cases
  // ===========================================================================

  describe('edge cases', () => {
    it('should use all 255 non-zero coordinates', () => {
      const secret = new Uint8Array([0, 1, 127, 128, 255]);
      const { shares } = split(secret, { threshold: 255, xs: range(1, 255) });

      expect(shares).toHaveLength(255);
      expect(combine(shares)).toEqual(secret);
    });

    it('should handle long secrets', () => {
      const secret = Uint8Array.from({ length: 4096 }, (_, i) => (i * 31) & 0xff);
      const { shares } = split(secret, { threshold: 4, xs: [9, 3, 250, 77, 128] });

      expect(combine([shares[4], shares[0], shares[2], shares[1]])).toEqual(secret);
    });

    it('should produce shares that differ from the secret', () => {
      const secret = encoder.encode('not in the clear');
      const { shares } = split(secret, { threshold: 2, xs: [1, 2, 3] });

      const unchanged = shares.filter((s) => GF.toBytes(s.ys).every((b, i) => b === secret[i]));
      expect(unchanged.length).toBeLessThan(shares.length);
    });
  });

  // ===========================================================================
  // Class API
  // ===========================================================================

  describe('ShamirSecretSharing', () => {
    it('should expose the configured threshold', () => {
      expect(new ShamirSecretSharing({ threshold: 3 }).getThreshold()).toBe(3);
    });

    it('should reject an invalid threshold on construction', () => {
      expect(() => new ShamirSecretSharing({ threshold: 1 })).toThrow(ShamirError);
      expect(() => new ShamirSecretSharing({ threshold: 256 })).toThrow(ShamirError);
    });

    it('should split and combine', () => {
      const sss = new ShamirSecretSharing({ threshold: 3 });
      const secret = encoder.encode('class api');
      const { shares, threshold } = sss.split(secret, [1, 2, 3, 4, 5]);

      expect(threshold).toBe(3);
      expect(sss.combine([shares[0], shares[2], shares[4]])).toEqual(secret);
    });

    it('should use the configured random source', () => {
      const sss = new ShamirSecretSharing({
        threshold: 2,
        random: (length) => new Uint8Array(length).fill(1),
      });

      // f(x) = 0x42 + x
      const { shares } = sss.split(new Uint8Array([0x42]), [1, 2]);

      expect(shares.map(bytes)).toEqual([[0x43], [0x40]]);
    });

    it('should recover a lost share', () => {
      const sss = new ShamirSecretSharing({ threshold: 3 });
      const { shares } = sss.split(encoder.encode('lost share'), [1, 2, 3, 4]);

      const recovered = sss.recover([shares[0], shares[1], shares[3]], 3);

      expect(recovered.x.value).toBe(3);
      expect(bytes(recovered)).toEqual(bytes(shares[2]));
    });

    it('should issue a new share that combines with the old ones', () => {
      const sss = new ShamirSecretSharing({ threshold: 2 });
      const secret = encoder.encode('new holder');
      const { shares } = sss.split(secret, [1, 2]);

      const issued = sss.recover(shares, 99);

      expect(sss.combine([shares[0], issued])).toEqual(secret);
    });

    it('should refuse to recover the share at x = 0', () => {
      const sss = new ShamirSecretSharing({ threshold: 2 });
      const { shares } = sss.split(encoder.encode('zero'), [1, 2]);

      expect(() => sss.recover(shares, 0)).toThrow('invalid x-coordinate 0');
    });

    it('should log share counts without secret material', () => {
      const { logger, records } = captureLogger();
      const sss = new ShamirSecretSharing({ threshold: 2, logger });
      const secret = encoder.encode('do not log me');

      const { shares } = sss.split(secret, [1, 2, 3]);
      sss.combine(shares);

      expect(records).toHaveLength(2);
      expect(records[0]).toMatchObject({ msg: 'split secret', threshold: 2, shares: 3, length: 13 });
      expect(records[1]).toMatchObject({ msg: 'combined shares', shares: 3, length: 13 });
      expect(JSON.stringify(records)).not.toContain('do not log me');
    });
  });
});
