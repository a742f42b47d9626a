/**
 * Liveness plus a storage reachability check.
 * Never throws: an unreachable store is reported as unhealthy.
 */

import type { IEvaluationRepository } from '../repositories/IEvaluationRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { HealthResponse } from '../types/api.js';
import { PersistenceError } from '../errors.js';

export interface HealthReport {
  healthy: boolean;
  body: HealthResponse;
}

export class HealthService {
  constructor(
    private readonly evaluationRepo: IEvaluationRepository,
    private readonly logProvider: ILogProvider
  ) {}

  async check(): Promise<HealthReport> {
    const timestamp = new Date().toISOString();

    try {
      await this.evaluationRepo.ping();
      return {
        healthy: true,
        body: { status: 'healthy', database: 'connected', timestamp },
      };
    } catch (err) {
      this.logProvider.warn('Health check failed: store unreachable', {
        cause: err instanceof PersistenceError ? err.internalMessage : String(err),
      });
      return {
        healthy: false,
        body: { status: 'unhealthy', database: 'disconnected', timestamp },
      };
    }
  }
}
