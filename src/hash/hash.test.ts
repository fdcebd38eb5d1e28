import { describe, it, expect } from 'vitest';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import {
  HashChoice,
  appendDigest,
  getHash,
  hashFromName,
  isHashId,
  verifyAndStripDigest,
} from './index.js';
import { IntegrityError, ParameterError } from '../errors.js';

describe('Hash', () => {
  describe('getHash', () => {
    it('should map header ids to algorithms', () => {
      expect(getHash(0).name).toBe('none');
      expect(getHash(1).name).toBe('sha1');
      expect(getHash(2).name).toBe('sha256');
    });

    it('should report digest lengths', () => {
      expect(getHash(HashChoice.NONE).digestLength).toBe(0);
      expect(getHash(HashChoice.SHA1).digestLength).toBe(20);
      expect(getHash(HashChoice.SHA256).digestLength).toBe(32);
    });

    it('should reject unknown ids', () => {
      expect(() => getHash(3)).toThrow(ParameterError);
      expect(isHashId(3)).toBe(false);
      expect(isHashId(2)).toBe(true);
    });
  });

  describe('digest', () => {
    it('should compute SHA-1 and SHA-256', () => {
      const data = utf8ToBytes('abc');

      expect(bytesToHex(getHash(HashChoice.SHA1).digest(data))).toBe(
        'a9993e364706816aba3e25717850c26c9cd0d89d'
      );
      expect(bytesToHex(getHash(HashChoice.SHA256).digest(data))).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    });
  });

  describe('hashFromName', () => {
    it('should resolve names', () => {
      expect(hashFromName('sha256').id).toBe(HashChoice.SHA256);
      expect(hashFromName('none').id).toBe(HashChoice.NONE);
    });
  });

  describe('appendDigest / verifyAndStripDigest', () => {
    it('should append the digest after the secret', () => {
      const wrapped = appendDigest(utf8ToBytes('abc'), getHash(HashChoice.SHA1));

      expect(wrapped).toHaveLength(23);
      expect(bytesToHex(wrapped)).toBe('616263a9993e364706816aba3e25717850c26c9cd0d89d');
    });

    it('should leave the secret unchanged without a hash', () => {
      const none = getHash(HashChoice.NONE);
      const secret = Uint8Array.of(1, 2, 3);

      expect(Array.from(appendDigest(secret, none))).toEqual([1, 2, 3]);
      expect(Array.from(verifyAndStripDigest(secret, none))).toEqual([1, 2, 3]);
    });

    it('should strip a matching digest', () => {
      const sha256 = getHash(HashChoice.SHA256);
      const wrapped = appendDigest(utf8ToBytes('secret'), sha256);

      expect(new TextDecoder().decode(verifyAndStripDigest(wrapped, sha256))).toBe('secret');
    });

    it('should reject a modified secret', () => {
      const sha256 = getHash(HashChoice.SHA256);
      const wrapped = appendDigest(utf8ToBytes('secret'), sha256);
      wrapped[0] = wrapped[0]! ^ 0x01;

      expect(() => verifyAndStripDigest(wrapped, sha256)).toThrow(IntegrityError);
    });

    it('should reject data shorter than the digest', () => {
      expect(() => verifyAndStripDigest(new Uint8Array(10), getHash(HashChoice.SHA1))).toThrow(
        'shorter than a sha1 digest'
      );
    });
  });
});
