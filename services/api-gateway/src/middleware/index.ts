/**
 * Middleware
 *
 * Express middleware for the API Gateway.
 */

export { createCorsMiddleware, ExpressResponseHeaders } from './cors.js';
export { notFoundHandler, globalErrorHandler } from './errorHandler.js';
