/**
 * Types for byte-wise Shamir Secret Sharing over GF(256)
 */

/**
 * One evaluation vector: the polynomial for every byte position,
 * evaluated at the same nonzero point.
 */
export interface ShareWithIndex {
  /** The x-coordinate (share index, 1..255) */
  x: number;
  /** f_i(x) for every byte position i */
  y: Uint8Array;
}

/**
 * Source of uniformly random bytes. Must be cryptographically strong;
 * errors it throws abort the split.
 */
export type RandomSource = (length: number) => Uint8Array;

/**
 * Configuration for splitting
 */
export interface ShamirConfig {
  /** Minimum number of shares required for reconstruction (threshold) */
  threshold: number;
  /** Total number of shares to generate */
  totalShares: number;
}
