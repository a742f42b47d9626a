/**
 * Stats endpoint.
 * GET /api/v1/stats — Evaluation counts (no auth required)
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { jsonResponse } from '../responses.js';

export function createStatsHandlers(container: Container) {
  const getStats: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    const stats = await container.statsService.getStats();

    return jsonResponse(stats, 200, { 'Cache-Control': 'no-store' });
  });

  return { getStats };
}
