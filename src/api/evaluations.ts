/**
 * Evaluation endpoint.
 * POST /api/v1/evaluation — Submit a thumbs rating for a chat turn
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { SubmitEvaluationResponse } from '../types/api.js';
import { ValidationError } from '../errors.js';
import { validateEvaluation } from '../validation/EvaluationValidator.js';
import { jsonResponse } from '../responses.js';
import { readJsonBody } from './json.js';

export function createEvaluationHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit
  )(async (req, _ctx) => {
    const body = await readJsonBody(req);

    const result = validateEvaluation(body);
    if (!result.ok) {
      throw new ValidationError(result.errors);
    }

    const { evaluationId, receivedAt } = await container.evaluationService.submit(result.value);

    const response: SubmitEvaluationResponse = {
      success: true,
      message: 'Evaluation submitted successfully',
      evaluation_id: evaluationId,
      timestamp: receivedAt,
    };

    return jsonResponse(response, 200);
  });

  return { submit };
}
