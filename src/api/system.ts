/**
 * Service-level endpoints.
 * GET /        — API metadata
 * GET /health  — Liveness and store reachability
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { RootResponse } from '../types/api.js';
import { jsonResponse } from '../responses.js';

export const ENDPOINTS = {
  submit_evaluation: '/api/v1/evaluation',
  health: '/health',
  stats: '/api/v1/stats',
} as const;

export function createSystemHandlers(container: Container) {
  const root: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    const body: RootResponse = {
      name: container.app.name,
      version: container.app.version,
      message: `Welcome to ${container.app.name}`,
      endpoints: { ...ENDPOINTS },
    };

    return jsonResponse(body);
  });

  const health: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    const report = await container.healthService.check();

    return jsonResponse(report.body, report.healthy ? 200 : 503, {
      'Cache-Control': 'no-store',
    });
  });

  return { root, health };
}
