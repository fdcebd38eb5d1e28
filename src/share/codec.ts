/**
 * Share serialization
 *
 * Layout (big-endian), compatible with draft-mcgrew-tss-03:
 *
 *   0      16    identifier, zero-padded
 *   16     1     hash id
 *   17     1     threshold
 *   18     2     share length (index byte + payload)
 *   20     1     share index
 *   21     L     payload
 *
 * Decoding rejects anything that does not match the declared lengths
 * exactly; nothing is truncated or repaired.
 */

import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { DecodeError, ParameterError } from '../errors.js';
import { getHash, isHashId } from '../hash/index.js';
import {
  HEADER_LENGTH,
  IDENTIFIER_LENGTH,
  MAX_PAYLOAD_LENGTH,
  type Share,
} from './types.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Drop the zero padding of a decoded identifier field
 */
function trimIdentifier(field: Uint8Array): Uint8Array {
  let end = field.length;
  while (end > 0 && field[end - 1] === 0) end--;
  return field.slice(0, end);
}

type ShareFields = Pick<Share, 'identifier' | 'hashId' | 'threshold' | 'index' | 'payload'>;

function byteFieldProblem(value: number, name: string): string | undefined {
  if (!Number.isInteger(value) || value < 1 || value > 255) {
    return `${name} must be an integer in [1, 255], got ${value}`;
  }
  return undefined;
}

/**
 * First field of a share record that does not fit the wire format, if any
 */
function fieldProblem(fields: ShareFields): string | undefined {
  if (fields.identifier.length > IDENTIFIER_LENGTH) {
    return `Identifier is ${fields.identifier.length} bytes; at most ${IDENTIFIER_LENGTH} allowed`;
  }
  if (!isHashId(fields.hashId)) {
    return `Unknown hash algorithm id: ${fields.hashId}`;
  }
  const byteProblem =
    byteFieldProblem(fields.threshold, 'Threshold') ?? byteFieldProblem(fields.index, 'Share index');
  if (byteProblem) return byteProblem;

  const { digestLength, name } = getHash(fields.hashId);
  if (fields.payload.length === 0) {
    return 'Share carries no payload';
  }
  if (fields.payload.length > MAX_PAYLOAD_LENGTH) {
    return `Share payload is ${fields.payload.length} bytes; at most ${MAX_PAYLOAD_LENGTH} allowed`;
  }
  if (fields.payload.length < digestLength) {
    return `Payload is ${fields.payload.length} bytes, shorter than a ${name} digest`;
  }
  return undefined;
}

function freezeShare(fields: ShareFields): Share {
  return Object.freeze({
    identifier: trimIdentifier(fields.identifier),
    hashId: fields.hashId,
    threshold: fields.threshold,
    index: fields.index,
    payload: fields.payload.slice(),
  });
}

/**
 * Build a frozen share record. Inputs are copied.
 *
 * @throws ParameterError when a field does not fit the wire format
 */
export function createShare(fields: ShareFields): Share {
  const problem = fieldProblem(fields);
  if (problem) {
    throw new ParameterError(problem, { index: fields.index });
  }
  return freezeShare(fields);
}

/**
 * Re-check a share record that did not come from the decoder, such as an
 * object literal built by the caller, and return a fresh frozen copy.
 *
 * @throws DecodeError when a field does not fit the wire format
 */
export function checkShare(share: Share): Share {
  const problem = fieldProblem(share);
  if (problem) {
    throw new DecodeError(problem, { index: share.index });
  }
  return freezeShare(share);
}

/**
 * Serialize a share to its binary wire form
 *
 * @throws ParameterError when a field would not fit its slot
 */
export function encodeShare(share: Share): Uint8Array {
  const problem = fieldProblem(share);
  if (problem) {
    throw new ParameterError(problem, { index: share.index });
  }

  const shareLength = share.payload.length + 1;
  const out = new Uint8Array(HEADER_LENGTH + shareLength);
  const view = new DataView(out.buffer);

  out.set(share.identifier, 0);
  view.setUint8(IDENTIFIER_LENGTH, share.hashId);
  view.setUint8(IDENTIFIER_LENGTH + 1, share.threshold);
  view.setUint16(IDENTIFIER_LENGTH + 2, shareLength, false);
  view.setUint8(HEADER_LENGTH, share.index);
  out.set(share.payload, HEADER_LENGTH + 1);

  return out;
}

/**
 * Parse a share from its binary wire form.
 *
 * @throws DecodeError on any structural problem
 */
export function decodeShare(bytes: Uint8Array): Share {
  if (bytes.length < HEADER_LENGTH + 1) {
    throw new DecodeError(
      `Share is ${bytes.length} bytes; at least ${HEADER_LENGTH + 1} required`,
      { length: bytes.length }
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const hashId = view.getUint8(IDENTIFIER_LENGTH);
  const threshold = view.getUint8(IDENTIFIER_LENGTH + 1);
  const shareLength = view.getUint16(IDENTIFIER_LENGTH + 2, false);
  const index = view.getUint8(HEADER_LENGTH);

  if (bytes.length !== HEADER_LENGTH + shareLength) {
    throw new DecodeError(
      `Share data is ${bytes.length - HEADER_LENGTH} bytes, header declares ${shareLength}`,
      { length: bytes.length, shareLength }
    );
  }

  if (shareLength < 2) {
    throw new DecodeError('Share carries no payload', { shareLength });
  }

  if (!isHashId(hashId)) {
    throw new DecodeError(`Unknown hash algorithm id: ${hashId}`, { hashId });
  }

  if (threshold === 0) {
    throw new DecodeError('Threshold must be in [1, 255], got 0');
  }

  if (index === 0) {
    throw new DecodeError('Share index must be in [1, 255], got 0');
  }

  const payload = bytes.slice(HEADER_LENGTH + 1);
  const { digestLength, name } = getHash(hashId);
  if (payload.length < digestLength) {
    throw new DecodeError(
      `Payload is ${payload.length} bytes, shorter than a ${name} digest`,
      { payloadLength: payload.length, digestLength }
    );
  }

  return freezeShare({
    identifier: bytes.subarray(0, IDENTIFIER_LENGTH),
    hashId,
    threshold,
    index,
    payload,
  });
}

export function shareToHex(share: Share): string {
  return bytesToHex(encodeShare(share));
}

export function shareFromHex(hex: string): Share {
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(hex);
  } catch (err) {
    throw new DecodeError(`Invalid hex share: ${err instanceof Error ? err.message : String(err)}`);
  }
  return decodeShare(bytes);
}

export function shareToBase64(share: Share): string {
  return Buffer.from(encodeShare(share)).toString('base64');
}

export function shareFromBase64(text: string): Share {
  if (!BASE64_PATTERN.test(text)) {
    throw new DecodeError('Invalid base64 share');
  }
  return decodeShare(new Uint8Array(Buffer.from(text, 'base64')));
}
