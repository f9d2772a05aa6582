/**
 * Service Constants
 *
 * Network and service defaults shared by the host service and its configuration.
 */

/**
 * Network and service defaults
 */
export const SERVICE_DEFAULTS = {
  /** Default HTTP port for the API gateway */
  PORT: 3000,
} as const;

/**
 * Health check status values
 */
export enum HealthStatus {
  Healthy = 'ok',
}
