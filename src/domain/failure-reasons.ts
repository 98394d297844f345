/**
 * Failure reason catalogue and result-status helpers.
 */

import type { FailureReason, QuestionResultStatus } from '../types/models.js';

export const FAILURE_REASONS: readonly FailureReason[] = [
  'transient-network',
  'rate-limited',
  'timeout',
  'malformed-response',
  'authentication',
  'invalid-configuration',
  'unknown',
];

export const FAILURE_REASON_DESCRIPTIONS: Record<FailureReason, string> = {
  'transient-network': 'Network communication with the model provider failed',
  'rate-limited': 'Provider rate limit reached',
  timeout: 'The model did not answer within the question timeout',
  'malformed-response': 'Model response could not be parsed into an answer',
  authentication: 'Invalid API key, insufficient credits or access denied',
  'invalid-configuration': 'The provider rejected the model or request configuration',
  unknown: 'Unexpected error not fitting any other category',
};

/** Reasons that abort the whole run instead of failing one question. */
export const RUN_FATAL_REASONS: ReadonlySet<FailureReason> = new Set(['invalid-configuration']);

export function isFailureReason(value: string): value is FailureReason {
  return FAILURE_REASONS.some((known) => known === value);
}

/** Description of a recorded reason; null for reasons outside the catalogue, such as repository faults. */
export function describeFailureReason(reason: string): string | null {
  return isFailureReason(reason) ? FAILURE_REASON_DESCRIPTIONS[reason] : null;
}

export function isTerminalStatus(status: QuestionResultStatus): boolean {
  return status === 'succeeded' || status === 'failed';
}

/** Zero-filled counter keyed by every failure reason. */
export function emptyReasonCounts(): Record<FailureReason, number> {
  return {
    'transient-network': 0,
    'rate-limited': 0,
    timeout: 0,
    'malformed-response': 0,
    authentication: 0,
    'invalid-configuration': 0,
    unknown: 0,
  };
}
