/**
 * Per-question result data access interface.
 * Rows are keyed by (evaluationId, questionId); a terminal row is frozen and
 * later writes to it are ignored.
 */

import type { EvaluationQuestionResult } from '../types/models.js';

export interface IResultRepository {
  /** Insert or update the row for the key. Returns the row as stored. */
  upsert(result: EvaluationQuestionResult): Promise<EvaluationQuestionResult>;

  get(evaluationId: string, questionId: string): Promise<EvaluationQuestionResult | null>;

  /** Rows with status succeeded or failed. */
  listTerminal(evaluationId: string): Promise<EvaluationQuestionResult[]>;

  /** All rows, including ones still between retry attempts. */
  list(evaluationId: string): Promise<EvaluationQuestionResult[]>;
}
