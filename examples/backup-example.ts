/**
 * Master Key Backup Example
 *
 * Splits a master key into 5 shares held by different custodians, any 3 of
 * which can restore it.
 */

import { bytesToHex, randomBytes } from '@noble/hashes/utils';
import {
  HashChoice,
  reconstructSecret,
  safeReconstructSecret,
  shareFromHex,
  shareSecret,
  shareToHex,
} from '../src/index.js';

function main(): void {
  console.log('\n=== Master key backup (3-of-5) ===\n');

  const masterKey = randomBytes(32);
  console.log(`1. Master key: ${bytesToHex(masterKey).slice(0, 16)}...`);

  const shares = shareSecret(3, 5, masterKey, 'backup-2026', HashChoice.SHA256);
  const encoded = shares.map(shareToHex);
  console.log(`2. Created ${encoded.length} hex-encoded shares`);

  // Custodians 1, 3 and 5 come together
  const present = encoded.filter((_, i) => i % 2 === 0);
  const restored = reconstructSecret(present.map(shareFromHex));
  console.log(`3. Restored key matches: ${bytesToHex(restored) === bytesToHex(masterKey)}`);

  // Two custodians are not enough
  const attempt = safeReconstructSecret(shares.slice(0, 2));
  if (!attempt.ok) {
    console.log(`4. Two shares rejected: ${attempt.error.code}`);
  }
}

main();
