/**
 * Tests for Config module
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, resetConfig, createTestConfig, validateEnv, envSchema } from './config.js';

describe('config', () => {
  // Store original process.env
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetConfig();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    resetConfig();
    process.env = originalEnv;
  });

  describe('createTestConfig', () => {
    it('should return default test config', () => {
      const config = createTestConfig();

      expect(config.NODE_ENV).toBe('test');
      expect(config.LOG_LEVEL).toBe('error');
      expect(config.CORS_ORIGINS).toEqual(['*']);
      expect(config.CORS_ALLOW_CREDENTIALS).toBe(false);
    });

    it('should allow overrides', () => {
      const config = createTestConfig({
        CORS_ORIGINS: ['https://app.example.com'],
        CORS_MAX_AGE: 600,
      });

      expect(config.CORS_ORIGINS).toEqual(['https://app.example.com']);
      expect(config.CORS_MAX_AGE).toBe(600);
    });

    it('should not read from process.env', () => {
      process.env.LOG_LEVEL = 'trace';
      process.env.CORS_ORIGINS = 'https://ignored.example.com';

      const config = createTestConfig();

      expect(config.LOG_LEVEL).toBe('error');
      expect(config.CORS_ORIGINS).toEqual(['*']);
    });
  });

  describe('envSchema', () => {
    it('should apply defaults for an empty environment', () => {
      const config = envSchema.parse({});

      expect(config.PORT).toBe(3000);
      expect(config.CORS_ORIGINS).toEqual(['*']);
      expect(config.CORS_METHODS).toBeUndefined();
      expect(config.CORS_ALLOWED_HEADERS).toEqual(['*']);
      expect(config.CORS_EXPOSED_HEADERS).toEqual([]);
      expect(config.CORS_ALLOW_CREDENTIALS).toBe(false);
      expect(config.CORS_MAX_AGE).toBeUndefined();
      expect(config.NODE_ENV).toBe('development');
      expect(config.LOG_LEVEL).toBe('info');
    });

    it('should split comma-separated CORS lists', () => {
      const config = envSchema.parse({
        CORS_ORIGINS: 'https://a.example.com, https://b.example.com',
        CORS_METHODS: 'GET,POST',
        CORS_ALLOWED_HEADERS: 'Content-Type, X-Requested-With',
        CORS_EXPOSED_HEADERS: 'X-Request-Id',
      });

      expect(config.CORS_ORIGINS).toEqual(['https://a.example.com', 'https://b.example.com']);
      expect(config.CORS_METHODS).toEqual(['GET', 'POST']);
      expect(config.CORS_ALLOWED_HEADERS).toEqual(['Content-Type', 'X-Requested-With']);
      expect(config.CORS_EXPOSED_HEADERS).toEqual(['X-Request-Id']);
    });

    it('should treat blank lists as not provided', () => {
      const config = envSchema.parse({ CORS_ORIGINS: ' , ', CORS_METHODS: '' });

      expect(config.CORS_ORIGINS).toEqual(['*']);
      expect(config.CORS_METHODS).toBeUndefined();
    });

    it('should parse credentials and max age', () => {
      const config = envSchema.parse({ CORS_ALLOW_CREDENTIALS: 'true', CORS_MAX_AGE: '3600' });

      expect(config.CORS_ALLOW_CREDENTIALS).toBe(true);
      expect(config.CORS_MAX_AGE).toBe(3600);
    });

    it('should treat empty max age as not provided', () => {
      const config = envSchema.parse({ CORS_MAX_AGE: '' });

      expect(config.CORS_MAX_AGE).toBeUndefined();
    });

    it('should reject a non-numeric max age', () => {
      expect(envSchema.safeParse({ CORS_MAX_AGE: '1h' }).success).toBe(false);
    });

    it('should reject invalid credentials flag', () => {
      expect(envSchema.safeParse({ CORS_ALLOW_CREDENTIALS: 'yes' }).success).toBe(false);
    });
  });

  describe('validateEnv', () => {
    it('should throw a readable error listing invalid variables', () => {
      process.env.CORS_MAX_AGE = 'forever';

      expect(() => validateEnv()).toThrow(/ - CORS_MAX_AGE: /);
    });
  });

  describe('getConfig', () => {
    it('should cache the validated config until reset', () => {
      process.env.PORT = '4100';
      const first = getConfig();

      process.env.PORT = '4200';
      expect(getConfig()).toBe(first);
      expect(getConfig().PORT).toBe(4100);

      resetConfig();
      expect(getConfig().PORT).toBe(4200);
    });
  });
});
