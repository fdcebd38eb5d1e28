/**
 * Cross-checks a set of shares before reconstruction
 */

import {
  DuplicateShareError,
  InconsistentShareSetError,
  InsufficientSharesError,
} from '../errors.js';
import type { Share, ShareSetHeader } from './types.js';

export interface ValidateOptions {
  /**
   * Reject repeated indices. Non-strict reconstruction turns this off and
   * skips combinations containing duplicates instead.
   */
  strict?: boolean;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/**
 * Checks, in order:
 * 1. identifier, hash id, threshold and payload length agree
 * 2. no index appears twice (strict only)
 * 3. at least `threshold` distinct indices are present
 *
 * @returns The header common to the set
 */
export function validateShareSet(
  shares: readonly Share[],
  options: ValidateOptions = {}
): ShareSetHeader {
  const { strict = true } = options;
  const first = shares[0];

  if (!first) {
    throw new InsufficientSharesError(1, 0);
  }

  for (const share of shares) {
    if (!sameBytes(share.identifier, first.identifier)) {
      throw new InconsistentShareSetError('Shares carry different identifiers', 'identifier');
    }
    if (share.hashId !== first.hashId) {
      throw new InconsistentShareSetError(
        `Shares carry different hash ids (${first.hashId} and ${share.hashId})`,
        'hashId'
      );
    }
    if (share.threshold !== first.threshold) {
      throw new InconsistentShareSetError(
        `Shares carry different thresholds (${first.threshold} and ${share.threshold})`,
        'threshold'
      );
    }
    if (share.payload.length !== first.payload.length) {
      throw new InconsistentShareSetError(
        `Share ${share.index} has ${share.payload.length} payload bytes, expected ${first.payload.length}`,
        'payloadLength'
      );
    }
  }

  const seen = new Set<number>();
  for (const share of shares) {
    if (strict && seen.has(share.index)) {
      throw new DuplicateShareError(share.index);
    }
    seen.add(share.index);
  }

  if (seen.size < first.threshold) {
    throw new InsufficientSharesError(first.threshold, seen.size);
  }

  return {
    identifier: first.identifier,
    hashId: first.hashId,
    threshold: first.threshold,
    payloadLength: first.payload.length,
  };
}
