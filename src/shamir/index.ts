/**
 * Shamir Secret Sharing over GF(256)
 *
 * Implements (t, n) threshold sharing of byte strings where:
 * - every byte of the secret gets its own random polynomial of degree t - 1
 * - the polynomial is evaluated at x = 1..n, one byte per share
 * - any t shares recover every byte by Lagrange interpolation at x = 0
 */

import { randomBytes } from '@noble/hashes/utils';
import { add, inverse, mul } from '../utils/gf256.js';
import { ParameterError } from '../errors.js';
import type { RandomSource, ShamirConfig, ShareWithIndex } from './types.js';

/** Only 255 nonzero field elements exist to serve as share indices */
export const MAX_SHARES = 255;

/**
 * Generate a random polynomial of specified degree with the secret byte as
 * the constant term.
 *
 * @returns Coefficients [a_0, a_1, ..., a_degree] with a_0 = secret
 */
export function generatePolynomial(
  secret: number,
  degree: number,
  random: RandomSource = randomBytes
): Uint8Array {
  if (!Number.isInteger(degree) || degree < 0) {
    throw new Error('Polynomial degree must be non-negative');
  }

  if (!Number.isInteger(secret) || secret < 0 || secret > 255) {
    throw new Error('Secret must be in range [0, 255]');
  }

  const coefficients = new Uint8Array(degree + 1);
  coefficients[0] = secret;
  coefficients.set(drawRandom(random, degree), 1);

  return coefficients;
}

/**
 * Evaluate a polynomial at point x using Horner's method.
 *
 * f(x) = a_0 + x(a_1 + x(a_2 + ... + x(a_n)))
 */
export function evaluatePolynomial(coefficients: Uint8Array, x: number): number {
  if (coefficients.length === 0) {
    throw new Error('Coefficients array cannot be empty');
  }

  if (x === 0) {
    throw new Error('Share index cannot be 0');
  }

  let result = coefficients[coefficients.length - 1]!;

  for (let i = coefficients.length - 2; i >= 0; i--) {
    result = add(mul(result, x), coefficients[i]!);
  }

  return result;
}

/**
 * Check threshold and share count before any randomness is drawn.
 */
export function validateSplitParameters(threshold: number, totalShares: number): void {
  if (!Number.isInteger(threshold) || !Number.isInteger(totalShares)) {
    throw new ParameterError('Threshold and share count must be integers', {
      threshold,
      totalShares,
    });
  }

  if (threshold < 1) {
    throw new ParameterError('Threshold must be at least 1', { threshold });
  }

  if (totalShares < threshold) {
    throw new ParameterError(
      `Total shares (${totalShares}) must be >= threshold (${threshold})`,
      { threshold, totalShares }
    );
  }

  if (totalShares > MAX_SHARES) {
    throw new ParameterError(
      `Total shares (${totalShares}) cannot exceed ${MAX_SHARES}`,
      { totalShares }
    );
  }
}

/**
 * Split a byte string into shares.
 *
 * Shares are indexed from 1 to n. Each share's y has the same length as
 * the secret.
 */
export function split(
  secret: Uint8Array,
  threshold: number,
  totalShares: number,
  random: RandomSource = randomBytes
): ShareWithIndex[] {
  validateSplitParameters(threshold, totalShares);

  const shares: ShareWithIndex[] = [];
  for (let x = 1; x <= totalShares; x++) {
    shares.push({ x, y: new Uint8Array(secret.length) });
  }

  for (let i = 0; i < secret.length; i++) {
    const coefficients = generatePolynomial(secret[i]!, threshold - 1, random);
    for (const share of shares) {
      share.y[i] = evaluatePolynomial(coefficients, share.x);
    }
    coefficients.fill(0);
  }

  return shares;
}

/**
 * Lagrange basis coefficients at x = 0 for the given indices.
 *
 * L_j(0) = Π_{m≠j} x_m / (x_m - x_j), and subtraction is XOR in GF(256).
 */
export function lagrangeBasisAtZero(indices: readonly number[]): number[] {
  return indices.map((xj, j) => {
    let basis = 1;
    for (let m = 0; m < indices.length; m++) {
      if (m === j) continue;
      const xm = indices[m]!;
      basis = mul(basis, mul(xm, inverse(add(xm, xj))));
    }
    return basis;
  });
}

/**
 * Reconstruct the secret bytes from shares using Lagrange interpolation.
 *
 * Every share passed in takes part; callers choose which t shares to use.
 */
export function combine(shares: readonly ShareWithIndex[]): Uint8Array {
  if (shares.length === 0) {
    throw new Error('At least one share is required');
  }

  const length = shares[0]!.y.length;
  for (let i = 0; i < shares.length; i++) {
    const share = shares[i]!;
    if (!Number.isInteger(share.x) || share.x < 1 || share.x > MAX_SHARES) {
      throw new Error(`Share ${i} has invalid x-coordinate (must be in [1, 255])`);
    }
    if (share.y.length !== length) {
      throw new Error(`Share ${i} has length ${share.y.length}, expected ${length}`);
    }
  }

  const xValues = new Set(shares.map((s) => s.x));
  if (xValues.size !== shares.length) {
    throw new Error('Duplicate share indices detected');
  }

  const basis = lagrangeBasisAtZero(shares.map((s) => s.x));
  const secret = new Uint8Array(length);

  for (let i = 0; i < length; i++) {
    let value = 0;
    for (let j = 0; j < shares.length; j++) {
      value = add(value, mul(shares[j]!.y[i]!, basis[j]!));
    }
    secret[i] = value;
  }

  return secret;
}

function drawRandom(random: RandomSource, length: number): Uint8Array {
  const bytes = random(length);
  if (bytes.length !== length) {
    throw new Error(`Random source returned ${bytes.length} bytes, expected ${length}`);
  }
  return bytes;
}

/**
 * Shamir Secret Sharing class with convenient API
 */
export class ShamirSecretSharing {
  private readonly random: RandomSource;

  constructor(config?: { random?: RandomSource }) {
    this.random = config?.random ?? randomBytes;
  }

  /**
   * Split a secret into shares
   */
  split(secret: Uint8Array, config: ShamirConfig): ShareWithIndex[] {
    return split(secret, config.threshold, config.totalShares, this.random);
  }

  /**
   * Combine shares to reconstruct the secret
   */
  combine(shares: readonly ShareWithIndex[]): Uint8Array {
    return combine(shares);
  }
}
