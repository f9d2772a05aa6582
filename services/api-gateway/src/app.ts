/**
 * Express Application
 *
 * Middleware chain: request logging, CORS, routes, then the error handlers.
 */

import express, { type Express } from 'express';
import { pinoHttp } from 'pino-http';
import { createLogger } from '@corsguard/common-types';
import type { CorsPolicy } from '@corsguard/cors-engine';
import { createCorsMiddleware, notFoundHandler, globalErrorHandler } from './middleware/index.js';
import { createHealthRouter } from './routes/public/index.js';

const logger = createLogger('api-gateway');

export interface AppOptions {
  policy: CorsPolicy;
  isProduction: boolean;
  /** Server start time for uptime calculation (defaults to now) */
  startTime?: number;
}

export function createApp({ policy, isProduction, startTime = Date.now() }: AppOptions): Express {
  const app = express();

  app.use(pinoHttp({ logger }));
  app.use(createCorsMiddleware(policy));

  // ============================================================================
  // PUBLIC ROUTES
  // ============================================================================

  app.use('/health', createHealthRouter(startTime));

  // ============================================================================
  // ERROR HANDLERS (must be last)
  // ============================================================================

  app.use(notFoundHandler);
  app.use(globalErrorHandler(isProduction));

  return app;
}
