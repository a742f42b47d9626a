/**
 * Evaluation body validation.
 * Parses an untrusted JSON value into an EvaluationInput, or reports every
 * field violation at once. Pure: no I/O, no clock.
 */

import { z } from 'zod';
import { CHAT_ROLES, THUMBS } from '../types/models.js';
import type { EvaluationInput } from '../types/models.js';
import type { FieldError } from '../types/api.js';

export type ValidationResult =
  | { ok: true; value: EvaluationInput }
  | { ok: false; errors: FieldError[] };

function requiredText(field: string) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .refine((value) => value.trim().length > 0, {
      message: `${field} must not be empty`,
    });
}

/** ISO-8601 date-time that carries `Z` or a numeric UTC offset. */
function zonedDateTime(field: string) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .datetime({
      offset: true,
      message: `${field} must be an ISO-8601 date-time with a timezone (e.g. 2025-11-12T10:30:00Z)`,
    });
}

const chatMessageSchema = z.object(
  {
    role: z.enum(CHAT_ROLES, {
      errorMap: () => ({ message: `role must be one of: ${CHAT_ROLES.join(', ')}` }),
    }),
    content: requiredText('content'),
    timestamp: zonedDateTime('timestamp').optional(),
  },
  { invalid_type_error: 'chat message must be an object' }
);

const evaluationSchema = z.object(
  {
    chat_history: z
      .array(chatMessageSchema, {
        required_error: 'chat_history is required',
        invalid_type_error: 'chat_history must be an array',
      })
      .min(1, 'chat_history must contain at least one message'),
    exact_turn: requiredText('exact_turn'),
    thumbs: z.enum(THUMBS, {
      errorMap: () => ({ message: 'thumbs must be "up" or "down"' }),
    }),
    user_id: requiredText('user_id'),
    session_id: requiredText('session_id'),
    chat_id: requiredText('chat_id'),
    chat_created_at: zonedDateTime('chat_created_at'),
    thumbs_created_at: zonedDateTime('thumbs_created_at'),
  },
  {
    required_error: 'Request body is required',
    invalid_type_error: 'Request body must be a JSON object',
  }
);

export function validateEvaluation(input: unknown): ValidationResult {
  const result = evaluationSchema.safeParse(input);

  if (result.success) {
    return { ok: true, value: result.data };
  }

  return {
    ok: false,
    errors: result.error.issues.map((issue) => ({
      field: formatPath(issue.path),
      message: issue.message,
    })),
  };
}

/** ['chat_history', 0, 'role'] → 'chat_history[0].role'; [] → 'body'. */
export function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return 'body';

  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}
