/**
 * Health Check Route
 */

import type { FastifyInstance } from 'fastify';
import { API_VERSION, type HealthResponse } from '../types.js';

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get<{
    Reply: HealthResponse;
  }>('/health', {
    schema: {
      description: 'Health check endpoint',
      tags: ['health'],
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string' },
            version: { type: 'string' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    const response: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };

    reply.send(response);
  });
}
