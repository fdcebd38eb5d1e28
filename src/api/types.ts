/**
 * API Types for the secret sharing REST API
 *
 * Request and response schemas for all API endpoints
 */

import { z } from 'zod';
import type { HashName } from '../hash/index.js';

export const API_VERSION = '0.1.0';

// =============================================================================
// Request Schemas
// =============================================================================

export const EncodingSchema = z.enum(['utf8', 'hex', 'base64']);

export type Encoding = z.infer<typeof EncodingSchema>;

/**
 * Schema for splitting a secret.
 *
 * Threshold/share-count consistency is left to the sharing engine so the
 * caller gets its INVALID_PARAMETER error.
 */
export const ShareSecretSchema = z.object({
  threshold: z.number().int().positive(),
  shares: z.number().int().positive(),
  secret: z.string().min(1),
  identifier: z.string().default(''),
  hash: z.enum(['none', 'sha1', 'sha256']).default('sha256'),
  encoding: EncodingSchema.default('utf8'),
});

export type ShareSecretRequest = z.infer<typeof ShareSecretSchema>;

/**
 * Schema for reconstructing a secret from hex-encoded shares
 */
export const ReconstructSecretSchema = z.object({
  shares: z.array(z.string().min(1)).min(1),
  strict: z.boolean().default(true),
  encoding: EncodingSchema.default('utf8'),
});

export type ReconstructSecretRequest = z.infer<typeof ReconstructSecretSchema>;

// =============================================================================
// Response Types
// =============================================================================

export interface ShareSecretResponse {
  identifier: string;
  hash: HashName;
  threshold: number;
  /** Hex-encoded shares in index order */
  shares: string[];
}

export interface ReconstructSecretResponse {
  /** The secret in the requested encoding */
  secret: string;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  version: string;
}

/**
 * Error response
 */
export interface ErrorResponse {
  error: {
    message: string;
    code?: string;
    statusCode: number;
  };
}
