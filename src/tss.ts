/**
 * Threshold Secret Sharing
 *
 * The two public operations:
 * - shareSecret: append a digest, split byte-wise, wrap each evaluation
 *   vector in a share record
 * - reconstructSecret: decode, cross-check, interpolate, verify and strip
 *   the digest
 *
 * Both are stateless; nothing is cached between calls.
 */

import { utf8ToBytes } from '@noble/hashes/utils';
import { z } from 'zod';
import { split, combine, validateSplitParameters } from './shamir/index.js';
import type { RandomSource } from './shamir/types.js';
import { checkShare, createShare, decodeShare } from './share/codec.js';
import { validateShareSet } from './share/validator.js';
import {
  IDENTIFIER_LENGTH,
  MAX_PAYLOAD_LENGTH,
  type Share,
  type ShareInput,
} from './share/types.js';
import {
  HashChoice,
  appendDigest,
  getHash,
  isHashId,
  verifyAndStripDigest,
} from './hash/index.js';
import {
  InsufficientSharesError,
  IntegrityError,
  ParameterError,
  isTSSError,
  type TSSError,
} from './errors.js';

// =============================================================================
// Types
// =============================================================================

export type BytesLike = Uint8Array | string;

export interface ReconstructOptions {
  /**
   * Strict (default): reject duplicate indices and use the first
   * `threshold` shares. Non-strict: try `threshold`-sized combinations
   * and return the first one whose digest verifies. The number of
   * combinations grows as C(n, threshold), so a bad share in a large set
   * can take many interpolations to route around.
   */
  strict?: boolean;
  /** Upper bound on combinations tried in non-strict mode */
  maxCombinations?: number;
}

export interface ShareSecretOptions {
  /** Random byte source for polynomial coefficients */
  random?: RandomSource;
}

/**
 * Outcome of the `safe*` variants
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: TSSError };

// =============================================================================
// Option schemas
// =============================================================================

/** Default bound on the non-strict combination search */
export const DEFAULT_MAX_COMBINATIONS = 100_000;

export const ReconstructOptionsSchema = z.object({
  strict: z.boolean().default(true),
  maxCombinations: z.number().int().positive().default(DEFAULT_MAX_COMBINATIONS),
});

export const ThresholdSecretSharingOptionsSchema = z.object({
  hash: z.nativeEnum(HashChoice).default(HashChoice.SHA256),
  strict: z.boolean().default(true),
});

export type ThresholdSecretSharingOptions = z.input<typeof ThresholdSecretSharingOptionsSchema>;

function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ParameterError('Invalid options', { issues: parsed.error.issues });
  }
  return parsed.data;
}

function toBytes(value: BytesLike): Uint8Array {
  return typeof value === 'string' ? utf8ToBytes(value) : value;
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Split a secret into `shareCount` shares, any `threshold` of which
 * reconstruct it.
 *
 * Strings are UTF-8 encoded. The identifier is at most 16 bytes.
 *
 * @example
 * ```typescript
 * const shares = shareSecret(3, 5, 'top-secret-key', 'id1', HashChoice.SHA256);
 * const secret = reconstructSecret([shares[0], shares[2], shares[4]]);
 * ```
 */
export function shareSecret(
  threshold: number,
  shareCount: number,
  secret: BytesLike,
  identifier: BytesLike,
  hash: HashChoice = HashChoice.SHA256,
  options: ShareSecretOptions = {}
): Share[] {
  validateSplitParameters(threshold, shareCount);

  if (!isHashId(hash)) {
    throw new ParameterError(`Unknown hash algorithm id: ${hash}`, { hashId: hash });
  }

  const secretBytes = toBytes(secret);
  const identifierBytes = toBytes(identifier);
  const digest = getHash(hash);

  if (secretBytes.length === 0) {
    throw new ParameterError('Secret must not be empty');
  }

  if (secretBytes.length + digest.digestLength > MAX_PAYLOAD_LENGTH) {
    throw new ParameterError(
      `Secret is too long: ${secretBytes.length} bytes plus a ${digest.digestLength}-byte digest exceeds ${MAX_PAYLOAD_LENGTH}`,
      { secretLength: secretBytes.length }
    );
  }

  if (identifierBytes.length > IDENTIFIER_LENGTH) {
    throw new ParameterError(
      `Identifier is ${identifierBytes.length} bytes; at most ${IDENTIFIER_LENGTH} allowed`
    );
  }

  const wrapped = appendDigest(secretBytes, digest);
  const points = options.random
    ? split(wrapped, threshold, shareCount, options.random)
    : split(wrapped, threshold, shareCount);
  wrapped.fill(0);

  return points.map(({ x, y }) =>
    createShare({
      identifier: identifierBytes,
      hashId: hash,
      threshold,
      index: x,
      payload: y,
    })
  );
}

function toShare(input: ShareInput): Share {
  return input instanceof Uint8Array ? decodeShare(input) : checkShare(input);
}

function interpolate(shares: readonly Share[]): Uint8Array {
  return combine(shares.map((share) => ({ x: share.index, y: share.payload })));
}

/**
 * Index combinations of size k over [0, n), in lexicographic order
 */
function* combinations(n: number, k: number): Generator<number[]> {
  const picks = Array.from({ length: k }, (_, i) => i);
  while (true) {
    yield picks.slice();
    let i = k - 1;
    while (i >= 0 && picks[i] === n - k + i) i--;
    if (i < 0) return;
    picks[i] = picks[i]! + 1;
    for (let j = i + 1; j < k; j++) {
      picks[j] = picks[j - 1]! + 1;
    }
  }
}

/**
 * Try each threshold-sized subset in turn until one verifies.
 */
function reconstructLenient(
  shares: readonly Share[],
  threshold: number,
  hashId: HashChoice,
  maxCombinations: number
): Uint8Array {
  const hash = getHash(hashId);
  let attempted = 0;
  let visited = 0;

  for (const picks of combinations(shares.length, threshold)) {
    if (visited === maxCombinations) {
      throw new IntegrityError(
        `Gave up after ${maxCombinations} combinations of ${threshold} shares out of ${shares.length}`
      );
    }
    visited++;
    const subset = picks.map((i) => shares[i]!);
    if (new Set(subset.map((s) => s.index)).size !== subset.length) {
      continue;
    }
    attempted++;
    try {
      return verifyAndStripDigest(interpolate(subset), hash);
    } catch (err) {
      if (!(err instanceof IntegrityError)) throw err;
    }
  }

  if (attempted === 0) {
    const distinct = new Set(shares.map((s) => s.index)).size;
    throw new InsufficientSharesError(threshold, distinct);
  }

  throw new IntegrityError(
    `No combination of ${threshold} shares out of ${shares.length} produced a verified secret`
  );
}

/**
 * Recover a secret from shares, either share records or their encoded
 * bytes.
 *
 * @throws DecodeError, InconsistentShareSetError, DuplicateShareError,
 *   InsufficientSharesError or IntegrityError
 */
export function reconstructSecret(
  shares: readonly ShareInput[],
  options: ReconstructOptions = {}
): Uint8Array {
  const { strict, maxCombinations } = parseOptions(ReconstructOptionsSchema, options);
  const decoded = shares.map(toShare);
  const header = validateShareSet(decoded, { strict });

  if (!strict) {
    return reconstructLenient(decoded, header.threshold, header.hashId, maxCombinations);
  }

  const recovered = interpolate(decoded.slice(0, header.threshold));
  return verifyAndStripDigest(recovered, getHash(header.hashId));
}

function capture<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (isTSSError(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * `shareSecret` returning a Result instead of throwing TSS errors
 */
export function safeShareSecret(
  ...args: Parameters<typeof shareSecret>
): Result<Share[]> {
  return capture(() => shareSecret(...args));
}

/**
 * `reconstructSecret` returning a Result instead of throwing TSS errors
 */
export function safeReconstructSecret(
  shares: readonly ShareInput[],
  options: ReconstructOptions = {}
): Result<Uint8Array> {
  return capture(() => reconstructSecret(shares, options));
}

// =============================================================================
// ThresholdSecretSharing Class
// =============================================================================

/**
 * Bundles default hash and reconstruction mode
 *
 * @example
 * ```typescript
 * const tss = new ThresholdSecretSharing({ hash: HashChoice.SHA1 });
 * const shares = tss.split('my shared secret', { threshold: 5, shares: 8, identifier: 'secretid42' });
 * const secret = tss.reconstruct(shares.slice(2, 7));
 * ```
 */
export class ThresholdSecretSharing {
  readonly hash: HashChoice;
  readonly strict: boolean;

  constructor(options: ThresholdSecretSharingOptions = {}) {
    const parsed = parseOptions(ThresholdSecretSharingOptionsSchema, options);
    this.hash = parsed.hash;
    this.strict = parsed.strict;
  }

  split(
    secret: BytesLike,
    params: { threshold: number; shares: number; identifier: BytesLike }
  ): Share[] {
    return shareSecret(params.threshold, params.shares, secret, params.identifier, this.hash);
  }

  reconstruct(shares: readonly ShareInput[]): Uint8Array {
    return reconstructSecret(shares, { strict: this.strict });
  }
}
