/**
 * Domain models — an evaluation as the application understands it.
 * Decoupled from both API shapes and database row shapes.
 */

export const CHAT_ROLES = ['user', 'assistant', 'system'] as const;
export type ChatRole = (typeof CHAT_ROLES)[number];

export const THUMBS = ['up', 'down'] as const;
export type Thumbs = (typeof THUMBS)[number];

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  /** When the message was sent, if the client tracked it. */
  readonly timestamp?: string;
}

/** A validated submission, before the system stamps it. */
export interface EvaluationInput {
  readonly chat_history: readonly ChatMessage[];
  readonly exact_turn: string;
  readonly thumbs: Thumbs;
  readonly user_id: string;
  readonly session_id: string;
  readonly chat_id: string;
  readonly chat_created_at: string;
  readonly thumbs_created_at: string;
}

/** What gets persisted: the input plus the server receipt time. */
export interface EvaluationRecord extends EvaluationInput {
  readonly received_at: string;
}

export interface SubmittedEvaluation {
  evaluationId: string;
  receivedAt: string;
}
