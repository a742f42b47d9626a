/**
 * API types — shapes for request/response payloads.
 * Field names are snake_case on the wire to match what clients already send.
 */

// ── Responses ──

export interface SubmitEvaluationResponse {
  success: true;
  message: string;
  evaluation_id: string;
  timestamp: string;
}

export interface StatsResponse {
  total_evaluations: number;
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  database: 'connected' | 'disconnected';
  timestamp: string;
}

export interface RootResponse {
  name: string;
  version: string;
  message: string;
  endpoints: {
    submit_evaluation: string;
    health: string;
    stats: string;
  };
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'VALIDATION_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'INTERNAL_ERROR';

/** One violation found while validating a request body. */
export interface FieldError {
  /** Path of the offending value, e.g. `chat_history[0].role`. */
  field: string;
  message: string;
}

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
