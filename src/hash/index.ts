/**
 * Digest algorithms embedded in shares
 *
 * The hash id travels in every share header so that a reconstruction can
 * recompute and check the digest appended to the secret before splitting.
 */

import { sha1 } from '@noble/hashes/sha1';
import { sha256 } from '@noble/hashes/sha256';
import { concatBytes } from '@noble/hashes/utils';
import { IntegrityError, ParameterError } from '../errors.js';

/**
 * Hash ids as encoded in the share header
 */
export enum HashChoice {
  NONE = 0,
  SHA1 = 1,
  SHA256 = 2,
}

export type HashName = 'none' | 'sha1' | 'sha256';

/**
 * Digest capability the sharing engine depends on
 */
export interface Hash {
  readonly id: HashChoice;
  readonly name: HashName;
  /** Output length in bytes (0 for NONE) */
  readonly digestLength: number;
  digest(data: Uint8Array): Uint8Array;
}

const NONE: Hash = {
  id: HashChoice.NONE,
  name: 'none',
  digestLength: 0,
  digest: () => new Uint8Array(0),
};

const SHA1: Hash = {
  id: HashChoice.SHA1,
  name: 'sha1',
  digestLength: 20,
  digest: (data) => sha1(data),
};

const SHA256: Hash = {
  id: HashChoice.SHA256,
  name: 'sha256',
  digestLength: 32,
  digest: (data) => sha256(data),
};

const HASHES: ReadonlyMap<number, Hash> = new Map<number, Hash>([
  [HashChoice.NONE, NONE],
  [HashChoice.SHA1, SHA1],
  [HashChoice.SHA256, SHA256],
]);

export function isHashId(id: number): id is HashChoice {
  return HASHES.has(id);
}

/**
 * Look up a hash by its header id
 */
export function getHash(id: number): Hash {
  const hash = HASHES.get(id);
  if (!hash) {
    throw new ParameterError(`Unknown hash algorithm id: ${id}`, { hashId: id });
  }
  return hash;
}

export function hashFromName(name: HashName): Hash {
  for (const hash of HASHES.values()) {
    if (hash.name === name) return hash;
  }
  throw new ParameterError(`Unknown hash algorithm: ${name}`);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i]! ^ b[i]!;
  }
  return diff === 0;
}

/**
 * secret || H(secret). With NONE the secret is returned as a copy.
 */
export function appendDigest(secret: Uint8Array, hash: Hash): Uint8Array {
  return concatBytes(secret, hash.digest(secret));
}

/**
 * Split recovered bytes into secret and digest, recompute the digest over
 * the secret part and compare.
 *
 * @throws IntegrityError when the digest does not match
 */
export function verifyAndStripDigest(recovered: Uint8Array, hash: Hash): Uint8Array {
  if (hash.digestLength === 0) {
    return recovered;
  }

  if (recovered.length < hash.digestLength) {
    throw new IntegrityError(
      `Recovered data (${recovered.length} bytes) is shorter than a ${hash.name} digest`
    );
  }

  const boundary = recovered.length - hash.digestLength;
  const secret = recovered.slice(0, boundary);
  const embedded = recovered.subarray(boundary);

  if (!bytesEqual(hash.digest(secret), embedded)) {
    throw new IntegrityError();
  }

  return secret;
}
