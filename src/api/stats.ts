/**
 * Stats and cache administration endpoints.
 * GET    /api/v1/stats — Cache size and process counters
 * DELETE /api/v1/cache — Empty the result cache
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { success } from './respond.js';

export function createStatsHandlers(container: Container) {
  const getStats: Handler = pipeline(
    container.logging('stats'),
    errorHandler,
    container.authenticate
  )(async () => {
    return success(container.statsService.snapshot());
  });

  const clearCache: Handler = pipeline(
    container.logging('cache'),
    errorHandler,
    container.authenticate
  )(async () => {
    return success({ cleared: container.statsService.clearCache() });
  });

  return { getStats, clearCache };
}
