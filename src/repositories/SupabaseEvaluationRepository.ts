/**
 * Supabase implementation of IEvaluationRepository.
 * Driver errors (returned or thrown) are converted to PersistenceError so a
 * failed call never escapes as an unknown error.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEvaluationRepository } from './IEvaluationRepository.js';
import type { NewEvaluationRow } from '../types/database.js';
import { PersistenceError } from '../errors.js';

export const DEFAULT_EVALUATIONS_TABLE = 'evaluations';

export class SupabaseEvaluationRepository implements IEvaluationRepository {
  constructor(
    private readonly db: SupabaseClient,
    private readonly table: string = DEFAULT_EVALUATIONS_TABLE
  ) {}

  async insert(row: NewEvaluationRow): Promise<string> {
    const { data, error } = await this.guard('insert', () =>
      this.db
        .from(this.table)
        .insert({
          chat_history: row.chat_history,
          exact_turn: row.exact_turn,
          thumbs: row.thumbs,
          user_id: row.user_id,
          session_id: row.session_id,
          chat_id: row.chat_id,
          chat_created_at: row.chat_created_at,
          thumbs_created_at: row.thumbs_created_at,
          received_at: row.received_at,
        })
        .select('id')
        .single()
    );

    if (error) throw new PersistenceError('insert', error);
    if (!data || data.id === undefined || data.id === null) {
      throw new PersistenceError('insert', new Error('Insert returned no id'));
    }
    return String(data.id);
  }

  async count(): Promise<number> {
    const { count, error } = await this.guard('count', () =>
      this.db.from(this.table).select('*', { count: 'exact', head: true })
    );

    if (error) throw new PersistenceError('count', error);
    return count ?? 0;
  }

  async ping(): Promise<void> {
    const { error } = await this.guard('ping', () =>
      this.db.from(this.table).select('id', { head: true }).limit(1)
    );

    if (error) throw new PersistenceError('ping', error);
  }

  /** Run a query, turning a thrown driver/network error into PersistenceError. */
  private async guard<T>(operation: string, query: () => PromiseLike<T>): Promise<T> {
    try {
      return await query();
    } catch (err) {
      throw new PersistenceError(operation, err);
    }
  }
}
