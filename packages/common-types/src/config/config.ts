import { z } from 'zod';
import { SERVICE_DEFAULTS } from '../constants/index.js';
import { splitCommaList } from '../utils/commaList.js';

/**
 * Helper for optional comma-separated lists
 * Empty strings are treated as "not provided"
 * @returns Zod schema yielding the trimmed entries, or undefined
 */
const optionalCommaList = () =>
  z
    .string()
    .optional()
    .transform(val => {
      if (val === undefined) {
        return undefined;
      }
      const entries = splitCommaList(val);
      return entries.length > 0 ? entries : undefined;
    });

/**
 * Environment variable validation schema
 * Validates all required configuration at startup
 */
export const envSchema = z.object({
  // HTTP Server Configuration
  PORT: z.string().regex(/^\d+$/).transform(Number).default(SERVICE_DEFAULTS.PORT),

  // CORS Policy Configuration
  CORS_ORIGINS: optionalCommaList().transform(val => val ?? ['*']), // '*' reflects any origin
  CORS_METHODS: optionalCommaList(), // Falls back to the standard method list
  CORS_ALLOWED_HEADERS: optionalCommaList().transform(val => val ?? ['*']), // '*' = no header restriction
  CORS_EXPOSED_HEADERS: optionalCommaList().transform(val => val ?? []),
  CORS_ALLOW_CREDENTIALS: z
    .enum(['true', 'false'])
    .optional()
    .or(z.literal('').transform(() => undefined))
    .transform(val => val === 'true'),
  CORS_MAX_AGE: z
    .string()
    .regex(/^\d+$/, 'Must be a whole number of seconds')
    .transform(Number)
    .optional()
    .or(z.literal('').transform(() => undefined)),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates and returns environment configuration
 * Throws detailed error if validation fails
 */
export function validateEnv(): EnvConfig {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map(issue => `  - ${issue.path.map(String).join('.')}: ${issue.message}`)
        .join('\n');

      throw new Error(
        `Environment validation failed:\n${issues}\n\n` +
          'Please check the environment variables passed to the service.'
      );
    }
    throw error;
  }
}

/**
 * Cached config instance
 * Can be reset for testing via resetConfig()
 */
let _config: EnvConfig | undefined;

/**
 * Get validated environment configuration
 * Caches the result for performance, but can be reset via resetConfig()
 */
export function getConfig(): EnvConfig {
  _config ??= validateEnv();
  return _config;
}

/**
 * Reset the cached config (primarily for testing)
 *
 * IMPORTANT: Call this in afterEach() to prevent test pollution
 */
export function resetConfig(): void {
  _config = undefined;
}

/**
 * Create config with custom values (for testing)
 * Uses safe test defaults instead of reading from process.env
 */
export function createTestConfig(overrides: Partial<EnvConfig> = {}): EnvConfig {
  const testDefaults: EnvConfig = {
    // HTTP Server
    PORT: SERVICE_DEFAULTS.PORT,

    // CORS
    CORS_ORIGINS: ['*'],
    CORS_METHODS: undefined,
    CORS_ALLOWED_HEADERS: ['*'],
    CORS_EXPOSED_HEADERS: [],
    CORS_ALLOW_CREDENTIALS: false,
    CORS_MAX_AGE: undefined,

    // Environment
    NODE_ENV: 'test',

    // Logging
    LOG_LEVEL: 'error', // Quiet logs in tests
  };

  return { ...testDefaults, ...overrides };
}
