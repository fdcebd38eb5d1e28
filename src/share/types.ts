/**
 * Share record and wire-format constants
 */

import type { HashChoice } from '../hash/index.js';

/**
 * A single share of a split secret.
 *
 * Created by `shareSecret` or `decodeShare`, and frozen. Records built
 * any other way are re-checked by `checkShare` before use.
 *
 * Freezing is shallow: the bytes of `identifier` and `payload` can still
 * be written through. Treat them as read-only; `encodeShare` and
 * `reconstructSecret` read them as they are at call time.
 */
export interface Share {
  /** Correlates shares of one split; at most 16 bytes, no trailing zeros */
  readonly identifier: Uint8Array;
  readonly hashId: HashChoice;
  /** Number of shares needed to reconstruct */
  readonly threshold: number;
  /** Evaluation point, 1..255 */
  readonly index: number;
  /** One byte per position of the digest-appended secret */
  readonly payload: Uint8Array;
}

/**
 * Anything `reconstructSecret` accepts as a share
 */
export type ShareInput = Share | Uint8Array;

/**
 * Header fields shared by every share of one split
 */
export interface ShareSetHeader {
  identifier: Uint8Array;
  hashId: HashChoice;
  threshold: number;
  payloadLength: number;
}

/** Identifier field width; shorter identifiers are zero-padded */
export const IDENTIFIER_LENGTH = 16;

/** identifier(16) | hash id(1) | threshold(1) | share length(2) */
export const HEADER_LENGTH = IDENTIFIER_LENGTH + 4;

/** Share length counts the index byte plus the payload */
export const MAX_SHARE_LENGTH = 0xffff;

/** Longest digest-appended secret that fits the share length field */
export const MAX_PAYLOAD_LENGTH = MAX_SHARE_LENGTH - 1;
