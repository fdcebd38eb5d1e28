/**
 * Error Handler Middleware
 *
 * Global error handler for Fastify with proper error formatting
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { TSSError, TSSErrorCode } from '../../errors.js';
import type { ErrorResponse } from '../types.js';

/**
 * Custom API error with status code
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Malformed input is a 400; a well-formed share set that cannot yield the
 * secret is a 422.
 */
const TSS_STATUS: Record<TSSErrorCode, number> = {
  [TSSErrorCode.INVALID_PARAMETER]: 400,
  [TSSErrorCode.DECODE_ERROR]: 400,
  [TSSErrorCode.INCONSISTENT_SHARES]: 422,
  [TSSErrorCode.INSUFFICIENT_SHARES]: 422,
  [TSSErrorCode.DUPLICATE_SHARE]: 422,
  [TSSErrorCode.INTEGRITY_FAILURE]: 422,
};

function isFastifyError(error: Error): error is FastifyError {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * Error handler function for Fastify
 */
export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const response: ErrorResponse = {
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        statusCode: 400,
      },
    };

    reply.status(400).send({
      ...response,
      validationErrors: error.issues,
    });
    return;
  }

  // Secret sharing failures
  if (error instanceof TSSError) {
    const statusCode = TSS_STATUS[error.code];
    request.log.warn({ code: error.code }, error.message);

    const response: ErrorResponse = {
      error: {
        message: error.message,
        code: error.code,
        statusCode,
      },
    };

    reply.status(statusCode).send(response);
    return;
  }

  // Handle custom API errors
  if (error instanceof ApiError) {
    const response: ErrorResponse = {
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
      },
    };

    reply.status(error.statusCode).send(response);
    return;
  }

  // Handle Fastify errors
  if (isFastifyError(error)) {
    const statusCode = error.statusCode ?? 500;
    const response: ErrorResponse = {
      error: {
        message: error.message,
        code: error.code,
        statusCode,
      },
    };

    reply.status(statusCode).send(response);
    return;
  }

  // Handle generic errors
  request.log.error(error);
  const response: ErrorResponse = {
    error: {
      message: error.message || 'Internal server error',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    },
  };

  reply.status(500).send(response);
}

/**
 * Helper to create bad request error
 */
export function badRequest(message: string): ApiError {
  return new ApiError(400, message, 'BAD_REQUEST');
}
