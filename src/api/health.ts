/**
 * Health and metrics endpoints.
 * GET /health  — liveness (never authenticated)
 * GET /metrics — Prometheus text exposition
 */

import { SERVICE_NAME, SERVICE_VERSION } from '../config.js';
import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { HealthResponse } from '../types/api.js';
import { success } from './respond.js';

export function createHealthHandlers(container: Container) {
  const health: Handler = pipeline(container.logging('health'), errorHandler)(async () => {
    const data: HealthResponse = {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    };
    return success(data);
  });

  const metrics: Handler = pipeline(container.logging('metrics'), errorHandler, container.authenticate)(async () => {
    return new Response(container.statsService.renderMetrics(), {
      status: 200,
      headers: { 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' },
    });
  });

  return { health, metrics };
}
