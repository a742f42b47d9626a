/**
 * Database row types — mirror the Supabase `evaluations` table (sql/evaluations.sql).
 * chat_history is a jsonb column holding the ordered message list.
 */

import type { ChatMessage, Thumbs } from './models.js';

export interface EvaluationRow {
  id: string;
  chat_history: readonly ChatMessage[];
  exact_turn: string;
  thumbs: Thumbs;
  user_id: string;
  session_id: string;
  chat_id: string;
  chat_created_at: string;
  thumbs_created_at: string;
  received_at: string;
}

/** Insert payload; the database generates the id. */
export type NewEvaluationRow = Omit<EvaluationRow, 'id'>;
