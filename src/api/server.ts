/**
 * Secret Sharing REST API Server
 *
 * Fastify-based REST API for splitting and reconstructing secrets
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { errorHandler } from './middleware/index.js';
import { healthRoutes, shareRoutes } from './routes/index.js';
import { API_VERSION } from './types.js';

export interface ServerConfig {
  /** Port to listen on */
  port?: number;

  /** Host to bind to */
  host?: string;

  /** Enable CORS */
  enableCors?: boolean;

  /** Enable rate limiting */
  enableRateLimit?: boolean;

  /** Requests per minute per client when rate limiting is on */
  rateLimitMax?: number;

  /** Fastify logger configuration */
  logger?: FastifyServerOptions['logger'];
}

/**
 * Create and configure Fastify server
 */
export async function createServer(config: ServerConfig = {}): Promise<FastifyInstance> {
  const {
    enableCors = true,
    enableRateLimit = true,
    rateLimitMax = 100,
    logger = true,
  } = config;

  const fastify = Fastify({
    logger,
    ajv: {
      customOptions: {
        removeAdditional: 'all',
        coerceTypes: true,
        useDefaults: true,
      },
    },
  });

  fastify.setErrorHandler(errorHandler);

  if (enableCors) {
    await fastify.register(cors, {
      origin: true,
      credentials: true,
    });
  }

  if (enableRateLimit) {
    await fastify.register(rateLimit, {
      max: rateLimitMax,
      timeWindow: '1 minute',
      errorResponseBuilder: () => ({
        error: {
          message: 'Rate limit exceeded. Please try again later.',
          code: 'RATE_LIMIT_EXCEEDED',
          statusCode: 429,
        },
      }),
    });
  }

  await fastify.register(healthRoutes);
  await fastify.register(shareRoutes);

  fastify.get('/', async (_request, reply) => {
    reply.send({
      name: 'TSS API',
      version: API_VERSION,
      description: 'Threshold Secret Sharing over GF(256)',
      endpoints: {
        health: 'GET /health',
        split: 'POST /v1/shares',
        reconstruct: 'POST /v1/secrets',
      },
    });
  });

  return fastify;
}

/**
 * Start the server
 */
export async function startServer(config: ServerConfig = {}): Promise<FastifyInstance> {
  const { port = 3000, host = '0.0.0.0' } = config;

  const fastify = await createServer(config);

  try {
    await fastify.listen({ port, host });
    return fastify;
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start server if running directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const port = process.env.PORT ? parseInt(process.env.PORT, 10) : 3000;
  const host = process.env.HOST || '0.0.0.0';

  startServer({ port, host }).catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}
