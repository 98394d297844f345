/**
 * Answer judging and evaluation aggregation.
 *
 * Accuracy is computed over succeeded questions only: a failed question means
 * no answer was obtained, which is reported separately from a wrong answer.
 */

import { emptyReasonCounts } from '../domain/failure-reasons.js';
import type {
  ComparisonPolicy,
  EvaluationAggregate,
  EvaluationQuestionResult,
} from '../types/models.js';

const NUMERIC_TOLERANCE = 1e-9;

export function normalizeAnswer(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

function parseNumber(value: string): number | null {
  const cleaned = value.trim().replace(/,/g, '');
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export class ScoringService {
  judge(expected: string, actual: string, policy: ComparisonPolicy = 'normalized'): boolean {
    switch (policy) {
      case 'exact':
        return expected === actual;
      case 'numeric': {
        const e = parseNumber(expected);
        const a = parseNumber(actual);
        if (e !== null && a !== null) return Math.abs(e - a) <= NUMERIC_TOLERANCE;
        return normalizeAnswer(expected) === normalizeAnswer(actual);
      }
      case 'contains':
        return normalizeAnswer(actual).includes(normalizeAnswer(expected));
      case 'normalized':
        return normalizeAnswer(expected) === normalizeAnswer(actual);
    }
  }

  /** Aggregate terminal results. Non-terminal rows are ignored. */
  aggregate(results: EvaluationQuestionResult[], totalQuestions: number): EvaluationAggregate {
    const failedByReason = emptyReasonCounts();
    let succeeded = 0;
    let failed = 0;
    let correct = 0;
    let latencyTotal = 0;
    let counted = 0;

    for (const result of results) {
      if (result.status === 'succeeded') {
        succeeded++;
        if (result.isCorrect === true) correct++;
      } else if (result.status === 'failed') {
        failed++;
        failedByReason[result.failureReason ?? 'unknown']++;
      } else {
        continue;
      }
      latencyTotal += result.latencyMs;
      counted++;
    }

    return {
      totalQuestions,
      succeeded,
      failed,
      failedByReason,
      correct,
      incorrect: succeeded - correct,
      accuracy: succeeded > 0 ? correct / succeeded : 0,
      meanLatencyMs: counted > 0 ? latencyTotal / counted : 0,
    };
  }
}
