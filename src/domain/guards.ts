/**
 * Narrowing helpers for values read back from storage.
 */

import type { ComparisonPolicy, EvaluationState, QuestionResultStatus } from '../types/models.js';

export const EVALUATION_STATES: readonly EvaluationState[] = [
  'pending',
  'running',
  'completed',
  'errored',
  'cancelled',
];

export const COMPARISON_POLICIES: readonly ComparisonPolicy[] = ['normalized', 'exact', 'numeric', 'contains'];

const RESULT_STATUSES: readonly QuestionResultStatus[] = ['pending', 'succeeded', 'failed'];

export function isEvaluationState(value: string): value is EvaluationState {
  return EVALUATION_STATES.some((known) => known === value);
}

export function isComparisonPolicy(value: string): value is ComparisonPolicy {
  return COMPARISON_POLICIES.some((known) => known === value);
}

export function isResultStatus(value: string): value is QuestionResultStatus {
  return RESULT_STATUSES.some((known) => known === value);
}
