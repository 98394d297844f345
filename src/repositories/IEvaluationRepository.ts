/**
 * Evaluation data access interface.
 */

import type { Evaluation, EvaluationFilter, EvaluationState } from '../types/models.js';

export type EvaluationPatch = Partial<
  Pick<Evaluation, 'state' | 'startedAt' | 'completedAt' | 'failure' | 'aggregate'>
>;

export interface IEvaluationRepository {
  load(id: string): Promise<Evaluation | null>;

  /** Insert or replace the whole record. */
  save(evaluation: Evaluation): Promise<Evaluation>;

  /**
   * Compare-and-set on the lifecycle state: applies `patch` only while the stored
   * state is one of `from`. Returns the updated record, or null when the state had moved on.
   */
  transition(id: string, from: EvaluationState[], patch: EvaluationPatch): Promise<Evaluation | null>;

  /** Newest first. */
  list(filter?: EvaluationFilter): Promise<Evaluation[]>;
}
