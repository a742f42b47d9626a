/**
 * Evaluation data access interface.
 * Append-only: there is no update or delete.
 */

import type { NewEvaluationRow } from '../types/database.js';

export interface IEvaluationRepository {
  /**
   * Insert one evaluation and return the id the store generated for it.
   * Throws PersistenceError when the store is unreachable or rejects the row.
   */
  insert(row: NewEvaluationRow): Promise<string>;

  /** Total number of stored evaluations. Throws PersistenceError on failure. */
  count(): Promise<number>;

  /** Resolves when the store answers; throws PersistenceError otherwise. */
  ping(): Promise<void>;
}
