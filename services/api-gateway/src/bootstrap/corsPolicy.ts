/**
 * CORS Policy Bootstrap
 *
 * Builds the service's CORS policy from validated environment configuration.
 */

import { createLogger, type EnvConfig } from '@corsguard/common-types';
import { AllowedOrigins, CorsPolicy, STANDARD_METHODS } from '@corsguard/cors-engine';

const logger = createLogger('api-gateway');

/**
 * @throws CorsConfigError when the configured values do not form a valid policy
 */
export function buildCorsPolicy(config: EnvConfig): CorsPolicy {
  const policy = CorsPolicy.create({
    allowedOrigins: AllowedOrigins.fromList(config.CORS_ORIGINS),
    allowedMethods: config.CORS_METHODS ?? STANDARD_METHODS,
    allowedHeaders: config.CORS_ALLOWED_HEADERS,
    exposedHeaders: config.CORS_EXPOSED_HEADERS,
    allowCredentials: config.CORS_ALLOW_CREDENTIALS,
    maxAge: config.CORS_MAX_AGE,
  });

  logger.info({ policy: policy.toJSON() }, '[Gateway] CORS policy loaded');
  return policy;
}
