/**
 * CORS Policy Bootstrap Tests
 */

import { describe, it, expect } from 'vitest';
import { createTestConfig } from '@corsguard/common-types';
import { CorsConfigError, STANDARD_METHODS } from '@corsguard/cors-engine';
import { buildCorsPolicy } from './corsPolicy.js';

describe('buildCorsPolicy', () => {
  it('should build the permissive policy from default configuration', () => {
    const policy = buildCorsPolicy(createTestConfig());

    expect(policy.allowedOrigins.kind).toBe('any');
    expect(policy.allowedHeaders.kind).toBe('any');
    expect(policy.allowedMethods.toArray()).toEqual([...STANDARD_METHODS]);
    expect(policy.allowCredentials).toBe(false);
    expect(policy.echoesOrigin).toBe(false);
    expect(policy.maxAge).toBeUndefined();
  });

  it('should build an exact origin set with credentials', () => {
    const policy = buildCorsPolicy(
      createTestConfig({
        CORS_ORIGINS: ['https://app.example.com', 'http://localhost:5173'],
        CORS_ALLOW_CREDENTIALS: true,
        CORS_MAX_AGE: 600,
      })
    );

    expect(policy.allowedOrigins.kind).toBe('exact');
    expect(policy.toJSON()).toMatchObject({
      allowedOrigins: ['https://app.example.com', 'http://localhost:5173'],
      allowCredentials: true,
      maxAge: 600,
      echoesOrigin: true,
    });
  });

  it('should upper-case configured methods', () => {
    const policy = buildCorsPolicy(createTestConfig({ CORS_METHODS: ['get', 'post'] }));

    expect(policy.allowedMethods.toArray()).toEqual(['GET', 'POST']);
  });

  it('should restrict headers to the configured list', () => {
    const policy = buildCorsPolicy(
      createTestConfig({
        CORS_ALLOWED_HEADERS: ['Content-Type', 'Authorization'],
        CORS_EXPOSED_HEADERS: ['X-Request-Id'],
      })
    );

    expect(policy.toJSON()).toMatchObject({
      allowedHeaders: ['Content-Type', 'Authorization'],
      exposedHeaders: ['X-Request-Id'],
    });
  });

  it('should reject an origin that is not a URL', () => {
    expect(() =>
      buildCorsPolicy(createTestConfig({ CORS_ORIGINS: ['app.example.com'] }))
    ).toThrow(CorsConfigError);
  });
});
