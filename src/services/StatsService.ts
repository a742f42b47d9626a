/**
 * Read-back statistics over stored evaluations.
 */

import type { IEvaluationRepository } from '../repositories/IEvaluationRepository.js';
import type { StatsResponse } from '../types/api.js';

export class StatsService {
  constructor(private readonly evaluationRepo: IEvaluationRepository) {}

  async getStats(): Promise<StatsResponse> {
    const total = await this.evaluationRepo.count();
    return { total_evaluations: total };
  }
}
