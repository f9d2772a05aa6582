/**
 * Public Routes
 *
 * Endpoints that need no authentication.
 */

export { createHealthRouter } from './health.js';
