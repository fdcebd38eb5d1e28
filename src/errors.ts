/**
 * Error taxonomy for secret sharing
 *
 * Every failure of `shareSecret` / `reconstructSecret` is one of the
 * subclasses below, so callers can tell a malformed share apart from a
 * failed integrity check by `code` or `instanceof`.
 */

/**
 * TSS Error Codes
 */
export enum TSSErrorCode {
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  DECODE_ERROR = 'DECODE_ERROR',
  INCONSISTENT_SHARES = 'INCONSISTENT_SHARES',
  INSUFFICIENT_SHARES = 'INSUFFICIENT_SHARES',
  DUPLICATE_SHARE = 'DUPLICATE_SHARE',
  INTEGRITY_FAILURE = 'INTEGRITY_FAILURE',
}

/**
 * Base class of all secret sharing errors
 */
export class TSSError extends Error {
  constructor(
    message: string,
    public readonly code: TSSErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TSSError';
  }
}

/**
 * Invalid threshold, share count, secret or identifier at split time
 */
export class ParameterError extends TSSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, TSSErrorCode.INVALID_PARAMETER, details);
    this.name = 'ParameterError';
  }
}

/**
 * Serialized share bytes are structurally malformed
 */
export class DecodeError extends TSSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, TSSErrorCode.DECODE_ERROR, details);
    this.name = 'DecodeError';
  }
}

export type InconsistentField = 'identifier' | 'hashId' | 'threshold' | 'payloadLength';

/**
 * Shares that do not belong to the same split operation
 */
export class InconsistentShareSetError extends TSSError {
  constructor(
    message: string,
    public readonly field: InconsistentField
  ) {
    super(message, TSSErrorCode.INCONSISTENT_SHARES, { field });
    this.name = 'InconsistentShareSetError';
  }
}

export class InsufficientSharesError extends TSSError {
  constructor(
    public readonly required: number,
    public readonly provided: number
  ) {
    super(
      `Not enough shares to reconstruct the secret: ${provided} provided, ${required} required`,
      TSSErrorCode.INSUFFICIENT_SHARES,
      { required, provided }
    );
    this.name = 'InsufficientSharesError';
  }
}

export class DuplicateShareError extends TSSError {
  constructor(public readonly index: number) {
    super(`Duplicate share index: ${index}`, TSSErrorCode.DUPLICATE_SHARE, { index });
    this.name = 'DuplicateShareError';
  }
}

/**
 * The digest recomputed over the recovered secret does not match the
 * embedded one. Usually means wrong or tampered shares.
 */
export class IntegrityError extends TSSError {
  constructor(message = 'Digest mismatch: recovered secret failed integrity check') {
    super(message, TSSErrorCode.INTEGRITY_FAILURE);
    this.name = 'IntegrityError';
  }
}

export function isTSSError(value: unknown): value is TSSError {
  return value instanceof TSSError;
}
