/**
 * API Gateway Types
 */

import type { HealthStatus } from '@corsguard/common-types';
import type { ErrorCode } from './utils/errorResponses.js';

/**
 * Health check response
 */
export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  /** Milliseconds since the server started */
  uptime: number;
}

/**
 * Error response
 */
export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  requestId?: string;
  timestamp: string;
}
