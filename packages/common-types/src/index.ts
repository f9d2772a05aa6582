// Export config (runtime environment variables)
export * from './config/index.js';

// Export constants (compile-time constants)
export * from './constants/index.js';

// Export utilities
export { createLogger } from './utils/logger.js';
export { splitCommaList } from './utils/commaList.js';
