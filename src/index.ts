/**
 * tss-gf256
 * Threshold Secret Sharing over GF(256)
 *
 * Splits a byte secret into n shares so that any t of them recover it and
 * fewer reveal nothing. Shares use the draft-mcgrew-tss-03 binary layout
 * and embed an optional SHA-1 / SHA-256 digest so reconstruction can
 * verify itself.
 */

// =============================================================================
// Main API
// =============================================================================

export {
  shareSecret,
  reconstructSecret,
  safeShareSecret,
  safeReconstructSecret,
  ThresholdSecretSharing,
  ReconstructOptionsSchema,
  ThresholdSecretSharingOptionsSchema,
  DEFAULT_MAX_COMBINATIONS,
} from './tss.js';

export type {
  BytesLike,
  ReconstructOptions,
  ShareSecretOptions,
  Result,
  ThresholdSecretSharingOptions,
} from './tss.js';

// =============================================================================
// Shares
// =============================================================================

export {
  encodeShare,
  decodeShare,
  checkShare,
  shareToHex,
  shareFromHex,
  shareToBase64,
  shareFromBase64,
} from './share/codec.js';

export { validateShareSet } from './share/validator.js';

export type { Share, ShareInput, ShareSetHeader } from './share/types.js';

export {
  IDENTIFIER_LENGTH,
  HEADER_LENGTH,
  MAX_PAYLOAD_LENGTH,
} from './share/types.js';

// =============================================================================
// Hashes
// =============================================================================

export { HashChoice, getHash, hashFromName, isHashId } from './hash/index.js';
export type { Hash, HashName } from './hash/index.js';

// =============================================================================
// Core Primitives
// =============================================================================

export {
  ShamirSecretSharing,
  split as shamirSplit,
  combine as shamirCombine,
  lagrangeBasisAtZero,
  MAX_SHARES,
} from './shamir/index.js';

export type { ShareWithIndex, RandomSource, ShamirConfig } from './shamir/types.js';

export * as gf256 from './utils/gf256.js';

// =============================================================================
// Errors
// =============================================================================

export {
  TSSError,
  TSSErrorCode,
  ParameterError,
  DecodeError,
  InconsistentShareSetError,
  InsufficientSharesError,
  DuplicateShareError,
  IntegrityError,
  isTSSError,
} from './errors.js';

export type { InconsistentField } from './errors.js';
