/**
 * Bootstrap
 *
 * Server initialization utilities.
 */

export { buildCorsPolicy } from './corsPolicy.js';
