/**
 * Dependency wiring.
 * Constructs all services and middleware from explicitly passed dependencies.
 * main.ts passes the Supabase repository; tests pass the in-memory mock.
 */

import type { IEvaluationRepository } from './repositories/IEvaluationRepository.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import { EvaluationService } from './services/EvaluationService.js';
import { StatsService } from './services/StatsService.js';
import { HealthService } from './services/HealthService.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { bodyLimit } from './middleware/body-limit.js';

export interface AppInfo {
  name: string;
  version: string;
}

export interface Container {
  app: AppInfo;
  evaluationService: EvaluationService;
  statsService: StatsService;
  healthService: HealthService;
  logProvider: ILogProvider;
  bodyLimit: Middleware;
  errorHandler: Middleware;
  logging: Middleware;
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export function createContainer(deps: {
  evaluationRepo: IEvaluationRepository;
  logProvider: ILogProvider;
  app: AppInfo;
  maxBodyBytes?: number;
}): Container {
  return {
    app: deps.app,
    evaluationService: new EvaluationService(deps.evaluationRepo, deps.logProvider),
    statsService: new StatsService(deps.evaluationRepo),
    healthService: new HealthService(deps.evaluationRepo, deps.logProvider),
    logProvider: deps.logProvider,
    bodyLimit: bodyLimit(deps.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES),
    errorHandler: createErrorHandler(deps.logProvider),
    logging: createLoggingMiddleware(deps.logProvider),
  };
}
