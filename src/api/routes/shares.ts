/**
 * Secret Sharing Routes
 *
 * Thin HTTP layer over shareSecret / reconstructSecret
 */

import type { FastifyInstance } from 'fastify';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import { shareSecret, reconstructSecret } from '../../tss.js';
import { shareFromHex, shareToHex } from '../../share/codec.js';
import { hashFromName } from '../../hash/index.js';
import { badRequest } from '../middleware/index.js';
import {
  ShareSecretSchema,
  ReconstructSecretSchema,
  type Encoding,
  type ShareSecretResponse,
  type ReconstructSecretResponse,
} from '../types.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode request text into bytes
 */
function decodeText(text: string, encoding: Encoding): Uint8Array {
  switch (encoding) {
    case 'utf8':
      return utf8ToBytes(text);
    case 'hex':
      try {
        return hexToBytes(text);
      } catch {
        throw badRequest('Secret is not valid hex');
      }
    case 'base64':
      if (!BASE64_PATTERN.test(text)) {
        throw badRequest('Secret is not valid base64');
      }
      return new Uint8Array(Buffer.from(text, 'base64'));
  }
}

/**
 * Encode response bytes as text
 */
function encodeText(bytes: Uint8Array, encoding: Encoding): string {
  switch (encoding) {
    case 'utf8':
      return new TextDecoder().decode(bytes);
    case 'hex':
      return bytesToHex(bytes);
    case 'base64':
      return Buffer.from(bytes).toString('base64');
  }
}

export async function shareRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * POST /v1/shares
   * Split a secret into shares
   */
  fastify.post<{
    Body: unknown;
    Reply: ShareSecretResponse;
  }>('/v1/shares', {
    schema: {
      description: 'Split a secret into threshold shares',
      tags: ['shares'],
      body: {
        type: 'object',
        required: ['threshold', 'shares', 'secret'],
        properties: {
          threshold: { type: 'number' },
          shares: { type: 'number' },
          secret: { type: 'string' },
          identifier: { type: 'string' },
          hash: { type: 'string', enum: ['none', 'sha1', 'sha256'] },
          encoding: { type: 'string', enum: ['utf8', 'hex', 'base64'] },
        },
      },
    },
  }, async (request, reply) => {
    const body = ShareSecretSchema.parse(request.body);
    const hash = hashFromName(body.hash);

    request.log.info(
      { threshold: body.threshold, shares: body.shares, hash: hash.name },
      'Splitting secret'
    );

    const shares = shareSecret(
      body.threshold,
      body.shares,
      decodeText(body.secret, body.encoding),
      body.identifier,
      hash.id
    );

    const response: ShareSecretResponse = {
      identifier: body.identifier,
      hash: hash.name,
      threshold: body.threshold,
      shares: shares.map(shareToHex),
    };

    reply.send(response);
  });

  /**
   * POST /v1/secrets
   * Reconstruct a secret from hex-encoded shares
   */
  fastify.post<{
    Body: unknown;
    Reply: ReconstructSecretResponse;
  }>('/v1/secrets', {
    schema: {
      description: 'Reconstruct a secret from shares',
      tags: ['shares'],
      body: {
        type: 'object',
        required: ['shares'],
        properties: {
          shares: { type: 'array', items: { type: 'string' } },
          strict: { type: 'boolean' },
          encoding: { type: 'string', enum: ['utf8', 'hex', 'base64'] },
        },
      },
    },
  }, async (request, reply) => {
    const body = ReconstructSecretSchema.parse(request.body);

    request.log.info(
      { shares: body.shares.length, strict: body.strict },
      'Reconstructing secret'
    );

    const secret = reconstructSecret(body.shares.map(shareFromHex), { strict: body.strict });

    const response: ReconstructSecretResponse = {
      secret: encodeText(secret, body.encoding),
    };

    reply.send(response);
  });
}
