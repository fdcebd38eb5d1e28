/**
 * Middleware exports
 */

export { errorHandler, ApiError, badRequest } from './error-handler.js';
