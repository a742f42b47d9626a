/**
 * Evaluation submission.
 * Stamps the receipt time and appends the record to the store. Storage
 * failures are logged with their internal cause and rethrown unchanged; the
 * record is discarded, never retried here.
 */

import type { IEvaluationRepository } from '../repositories/IEvaluationRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EvaluationInput, EvaluationRecord, SubmittedEvaluation } from '../types/models.js';
import { PersistenceError } from '../errors.js';

export class EvaluationService {
  constructor(
    private readonly evaluationRepo: IEvaluationRepository,
    private readonly logProvider: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  async submit(input: EvaluationInput): Promise<SubmittedEvaluation> {
    const record: EvaluationRecord = {
      ...input,
      received_at: this.now().toISOString(),
    };

    let evaluationId: string;
    try {
      evaluationId = await this.evaluationRepo.insert(record);
    } catch (err) {
      if (err instanceof PersistenceError) {
        this.logProvider.error('Failed to store evaluation', {
          operation: err.operation,
          cause: err.internalMessage,
          userId: input.user_id,
          chatId: input.chat_id,
        });
      }
      throw err;
    }

    this.logProvider.info(`Evaluation ${evaluationId} stored with thumbs ${input.thumbs}`, {
      evaluationId,
      userId: input.user_id,
      sessionId: input.session_id,
      chatId: input.chat_id,
      messages: input.chat_history.length,
    });

    return { evaluationId, receivedAt: record.received_at };
  }
}
