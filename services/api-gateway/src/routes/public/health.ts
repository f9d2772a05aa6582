/**
 * Health Check Routes
 *
 * Public endpoint for health monitoring.
 */

import { Router } from 'express';
import { StatusCodes } from 'http-status-codes';
import { HealthStatus } from '@corsguard/common-types';
import type { HealthResponse } from '../../types.js';

/**
 * Create health check router
 * @param startTime - Server start time for uptime calculation
 */
export function createHealthRouter(startTime: number): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const health: HealthResponse = {
      status: HealthStatus.Healthy,
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime,
    };

    res.status(StatusCodes.OK).json(health);
  });

  return router;
}
