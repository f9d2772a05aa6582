/**
 * Error Response Utilities Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ErrorCode, createErrorResponse, getStatusCode, ErrorResponses } from './errorResponses.js';

describe('errorResponses', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-11-02T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('createErrorResponse', () => {
    it('should create error response with all required fields', () => {
      expect(createErrorResponse(ErrorCode.NOT_FOUND, 'Route GET /x not found')).toEqual({
        error: 'NOT_FOUND',
        message: 'Route GET /x not found',
        timestamp: '2025-11-02T12:00:00.000Z',
      });
    });

    it('should include requestId when provided', () => {
      expect(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'boom', 'req-123')).toEqual({
        error: 'INTERNAL_ERROR',
        message: 'boom',
        requestId: 'req-123',
        timestamp: '2025-11-02T12:00:00.000Z',
      });
    });

    it('should omit an empty requestId', () => {
      expect(createErrorResponse(ErrorCode.NOT_FOUND, 'missing', '')).not.toHaveProperty(
        'requestId'
      );
    });
  });

  describe('getStatusCode', () => {
    it('should map error codes to HTTP statuses', () => {
      expect(getStatusCode(ErrorCode.NOT_FOUND)).toBe(404);
      expect(getStatusCode(ErrorCode.INTERNAL_ERROR)).toBe(500);
    });
  });

  describe('ErrorResponses', () => {
    it('should suffix the resource for notFound', () => {
      expect(ErrorResponses.notFound('Route GET /unknown').message).toBe(
        'Route GET /unknown not found'
      );
    });

    it('should use a default message for internalError', () => {
      expect(ErrorResponses.internalError()).toEqual({
        error: 'INTERNAL_ERROR',
        message: 'An internal error occurred',
        timestamp: '2025-11-02T12:00:00.000Z',
      });
    });
  });
});
