/**
 * Share Reconstruction Example
 *
 * Demonstrates field arithmetic, splitting a secret into shares,
 * reconstructing it from a subset, and re-issuing a lost share.
 */

import { GF } from '../src/gf256/index.js';
import { interpolate } from '../src/interpolation/index.js';
import { ShamirSecretSharing } from '../src/shamir/index.js';
import { encodeShare, decodeShare } from '../src/codec/index.js';
import { createLogger } from '../src/logger.js';

// =============================================================================
// Example 1: Field Arithmetic
// =============================================================================

function fieldExample() {
  console.log('\n=== Example 1: GF(256) Arithmetic ===\n');

  const a = GF.from(0x57);
  const b = GF.from(0x83);

  console.log(`   ${a} + ${b} = ${a.add(b)}`);
  console.log(`   ${a} * ${b} = ${a.mul(b)}`);
  console.log(`   ${a} / ${b} = ${a.div(b)}`);
  console.log(`   ${a}^-1   = ${a.pow(-1)}`);
  console.log(`   log ${a}  = ${a.log()}`);
}

// =============================================================================
// Example 2: 3-of-5 Backup Key
// =============================================================================

function backupKeyExample() {
  console.log('\n=== Example 2: 3-of-5 Backup Key ===\n');

  const sss = new ShamirSecretSharing({
    threshold: 3,
    logger: createLogger({ level: 'debug', name: 'example' }),
  });

  const secret = new TextEncoder().encode('example backup key');

  console.log('1. Splitting secret...');
  const { shares } = sss.split(secret, [1, 2, 3, 4, 5]);
  const encoded = shares.map(encodeShare);
  for (const share of encoded) {
    console.log(`   Share ${share.x}: ${share.ys}`);
  }

  console.log('\n2. Reconstructing from shares 1, 3 and 5...');
  const subset = [encoded[0], encoded[2], encoded[4]].map(decodeShare);
  const recovered = new TextDecoder().decode(sss.combine(subset));
  console.log(`   ✓ Recovered: "${recovered}"`);

  console.log('\n3. Re-issuing lost share 2...');
  const reissued = sss.recover(subset, 2);
  console.log(`   ✓ Share 2: ${encodeShare(reissued).ys}`);

  console.log('\n4. Evaluating at x = 0 directly...');
  const atZero = interpolate(subset, GF.ZERO);
  console.log(`   ✓ ${GF.toBytes(atZero.ys).length} secret bytes`);
}

fieldExample();
backupKeyExample();
