/**
 * API Gateway - Main Entry Point
 *
 * Express server that enforces the configured CORS policy in front of its
 * routes. The policy is read from the environment once at startup; an invalid
 * policy stops the process before it listens.
 */

import { createLogger, getConfig } from '@corsguard/common-types';
import { CorsConfigError, type CorsPolicy } from '@corsguard/cors-engine';
import { createApp } from './app.js';
import { buildCorsPolicy } from './bootstrap/index.js';

const logger = createLogger('api-gateway');

function loadPolicy(): CorsPolicy {
  try {
    return buildCorsPolicy(getConfig());
  } catch (error) {
    if (error instanceof CorsConfigError) {
      logger.fatal({ issues: error.issues }, '[Gateway] Invalid CORS configuration');
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  const envConfig = getConfig();

  logger.info('[Gateway] Starting API Gateway service...');
  logger.info({ port: envConfig.PORT, env: envConfig.NODE_ENV }, '[Gateway] Configuration:');

  const app = createApp({
    policy: loadPolicy(),
    isProduction: envConfig.NODE_ENV === 'production',
  });

  const server = app.listen(envConfig.PORT, (err?: Error) => {
    if (err) {
      logger.error({ err }, '[Gateway] Failed to start server');
      process.exit(1);
    }
    logger.info(`[Gateway] Server listening on port ${envConfig.PORT}`);
    logger.info(`[Gateway] Health check: http://localhost:${envConfig.PORT}/health`);
  });

  server.on('error', (err: Error) => {
    logger.error({ err }, '[Gateway] Server error');
  });

  // ============================================================================
  // GRACEFUL SHUTDOWN
  // ============================================================================

  const shutdown = async (): Promise<void> => {
    logger.info('[Gateway] Shutting down gracefully...');

    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    logger.info('[Gateway] HTTP server closed');

    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: error }, '[Gateway] Error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  process.on('uncaughtException', error => {
    logger.fatal({ err: error }, '[Gateway] Uncaught exception:');
    onSignal();
  });

  process.on('unhandledRejection', reason => {
    logger.fatal({ reason }, '[Gateway] Unhandled rejection:');
    onSignal();
  });

  await new Promise<void>(resolve => server.once('listening', resolve));
  logger.info('[Gateway] API Gateway is fully operational!');
}

// Start the server
main().catch((error: unknown) => {
  logger.fatal({ err: error }, '[Gateway] Fatal error during startup:');
  process.exit(1);
});
