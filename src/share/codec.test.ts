/**
 * Tests for the share wire format
 */

import { describe, it, expect } from 'vitest';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import {
  checkShare,
  decodeShare,
  encodeShare,
  shareFromBase64,
  shareFromHex,
  shareToBase64,
  shareToHex,
} from './codec.js';
import { HEADER_LENGTH } from './types.js';
import { shareSecret } from '../tss.js';
import { HashChoice } from '../hash/index.js';
import { DecodeError, ParameterError } from '../errors.js';

const fixedRandom = (byte: number) => (length: number) => new Uint8Array(length).fill(byte);

/** identifier "id", no hash, threshold 2, share length 2, index 1, payload 0x51 */
const SHARE_1_HEX = '69640000000000000000000000000000000200020151';

function header(hashId: number, threshold: number, shareLength: number): Uint8Array {
  const bytes = new Uint8Array(HEADER_LENGTH);
  bytes.set([0x69, 0x64], 0);
  bytes[16] = hashId;
  bytes[17] = threshold;
  bytes[18] = shareLength >> 8;
  bytes[19] = shareLength & 0xff;
  return bytes;
}

function withBody(head: Uint8Array, body: number[]): Uint8Array {
  const out = new Uint8Array(head.length + body.length);
  out.set(head);
  out.set(body, head.length);
  return out;
}

describe('Share codec', () => {
  describe('encodeShare', () => {
    it('should lay out header, index and payload', () => {
      const shares = shareSecret(2, 3, 'A', 'id', HashChoice.NONE, { random: fixedRandom(0x10) });

      expect(shares.map(shareToHex)).toEqual([
        SHARE_1_HEX,
        '69640000000000000000000000000000000200020261',
        '69640000000000000000000000000000000200020371',
      ]);
    });

    it('should write the share length big-endian', () => {
      const [share] = shareSecret(3, 5, 'top-secret-key', 'id1', HashChoice.SHA256);
      const bytes = encodeShare(share!);

      expect(bytes).toHaveLength(67);
      expect(bytesToHex(bytes.subarray(0, HEADER_LENGTH))).toBe(
        '696431000000000000000000000000000203002f'
      );
    });

    it('should fill a 16-byte identifier completely', () => {
      const [share] = shareSecret(1, 1, 'x', 'abcdefghijklmnop', HashChoice.NONE);

      expect(new TextDecoder().decode(encodeShare(share!).subarray(0, 16))).toBe('abcdefghijklmnop');
    });

    it('should refuse an identifier wider than its field', () => {
      const [share] = shareSecret(1, 1, 'x', 'id', HashChoice.NONE);

      expect(() => encodeShare({ ...share!, identifier: new Uint8Array(20).fill(0x41) })).toThrow(
        'Identifier is 20 bytes; at most 16 allowed'
      );
    });

    it('should refuse a payload the length field cannot hold', () => {
      const [share] = shareSecret(1, 1, 'x', 'id', HashChoice.NONE);

      expect(() => encodeShare({ ...share!, payload: new Uint8Array(65535) })).toThrow(ParameterError);
    });

    it('should refuse header values outside a byte', () => {
      const [share] = shareSecret(1, 1, 'x', 'id', HashChoice.NONE);

      expect(() => encodeShare({ ...share!, threshold: 256 })).toThrow(
        'Threshold must be an integer in [1, 255], got 256'
      );
      expect(() => encodeShare({ ...share!, index: 0 })).toThrow(
        'Share index must be an integer in [1, 255], got 0'
      );
    });
  });

  describe('decodeShare', () => {
    it('should parse every field', () => {
      const share = decodeShare(hexToBytes(SHARE_1_HEX));

      expect(Array.from(share.identifier)).toEqual([0x69, 0x64]);
      expect(share.hashId).toBe(HashChoice.NONE);
      expect(share.threshold).toBe(2);
      expect(share.index).toBe(1);
      expect(Array.from(share.payload)).toEqual([0x51]);
    });

    it('should return a frozen record', () => {
      expect(Object.isFrozen(decodeShare(hexToBytes(SHARE_1_HEX)))).toBe(true);
    });

    it('should read shares inside a larger buffer', () => {
      const buffer = new Uint8Array(30);
      buffer.set(hexToBytes(SHARE_1_HEX), 4);

      expect(decodeShare(buffer.subarray(4, 26)).index).toBe(1);
    });

    it('should reject input shorter than a header and index', () => {
      expect(() => decodeShare(new Uint8Array(20))).toThrow(DecodeError);
    });

    it('should reject trailing bytes', () => {
      expect(() => decodeShare(withBody(header(0, 2, 2), [1, 0x51, 0x00]))).toThrow(
        'Share data is 3 bytes, header declares 2'
      );
    });

    it('should reject missing bytes', () => {
      expect(() => decodeShare(withBody(header(0, 2, 3), [1, 0x51]))).toThrow(
        'Share data is 2 bytes, header declares 3'
      );
    });

    it('should reject a share without payload', () => {
      expect(() => decodeShare(withBody(header(0, 2, 1), [1]))).toThrow('no payload');
    });

    it('should reject an unknown hash id', () => {
      expect(() => decodeShare(withBody(header(3, 2, 2), [1, 0x51]))).toThrow(
        'Unknown hash algorithm id: 3'
      );
    });

    it('should reject threshold 0', () => {
      expect(() => decodeShare(withBody(header(0, 0, 2), [1, 0x51]))).toThrow(DecodeError);
    });

    it('should reject index 0', () => {
      expect(() => decodeShare(withBody(header(0, 2, 2), [0, 0x51]))).toThrow(
        'Share index must be in [1, 255], got 0'
      );
    });

    it('should reject a hashed share shorter than its digest', () => {
      expect(() => decodeShare(withBody(header(2, 2, 5), [1, 1, 2, 3, 4]))).toThrow(
        'shorter than a sha256 digest'
      );
    });

    it('should round-trip through encodeShare', () => {
      const shares = shareSecret(2, 2, 'hello', 'node-7', HashChoice.SHA1);
      const decoded = decodeShare(encodeShare(shares[1]!));

      expect(decoded).toEqual(shares[1]);
    });
  });

  describe('checkShare', () => {
    it('should return an equal frozen copy of a valid record', () => {
      const [share] = shareSecret(2, 3, 'copy', 'id', HashChoice.SHA1);
      const checked = checkShare({ ...share! });

      expect(checked).toEqual(share);
      expect(checked.payload).not.toBe(share!.payload);
      expect(Object.isFrozen(checked)).toBe(true);
    });

    it('should reject hand-built records with a decode error', () => {
      const [share] = shareSecret(2, 3, 'copy', 'id', HashChoice.SHA1);
      const unknownId: number = 9;

      expect(() => checkShare({ ...share!, index: 0 })).toThrow(DecodeError);
      expect(() => checkShare({ ...share!, threshold: 0 })).toThrow(DecodeError);
      expect(() => checkShare({ ...share!, hashId: unknownId })).toThrow(
        'Unknown hash algorithm id: 9'
      );
      expect(() => checkShare({ ...share!, payload: new Uint8Array(0) })).toThrow(
        'Share carries no payload'
      );
      expect(() => checkShare({ ...share!, payload: new Uint8Array(5) })).toThrow(
        'Payload is 5 bytes, shorter than a sha1 digest'
      );
    });
  });

  describe('text encodings', () => {
    it('should decode hex', () => {
      expect(shareFromHex(SHARE_1_HEX).index).toBe(1);
    });

    it('should reject malformed hex', () => {
      expect(() => shareFromHex('zz')).toThrow(DecodeError);
      expect(() => shareFromHex('abc')).toThrow(DecodeError);
    });

    it('should encode and decode base64', () => {
      const share = shareFromHex(SHARE_1_HEX);
      const text = shareToBase64(share);

      expect(text).toBe(Buffer.from(hexToBytes(SHARE_1_HEX)).toString('base64'));
      expect(shareFromBase64(text)).toEqual(share);
    });

    it('should reject malformed base64', () => {
      expect(() => shareFromBase64('not base64!')).toThrow('Invalid base64 share');
    });
  });
});
