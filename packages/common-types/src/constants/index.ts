/**
 * Constants Barrel Export
 */

export * from './service.js';
