/**
 * Domain model → API response mapping.
 * Dates become ISO-8601 strings; nothing else changes shape.
 */

import { describeFailureReason } from '../domain/failure-reasons.js';
import type {
  BenchmarkInfo,
  Evaluation,
  EvaluationFailure,
  EvaluationQuestionResult,
  EvaluationStatus,
} from '../types/models.js';
import type {
  BenchmarkResponse,
  EvaluationFailureResponse,
  EvaluationStatusResponse,
  EvaluationSummaryResponse,
  QuestionResultResponse,
} from '../types/api.js';

export function toBenchmarkResponse(info: BenchmarkInfo): BenchmarkResponse {
  return {
    id: info.id,
    name: info.name,
    description: info.description,
    questionCount: info.questionCount,
    answerComparison: info.answerComparison,
    createdAt: info.createdAt.toISOString(),
  };
}

function toFailureResponse(failure: EvaluationFailure | null): EvaluationFailureResponse | null {
  if (!failure) return null;
  return {
    reason: failure.reason,
    description: describeFailureReason(failure.reason),
    message: failure.message,
    at: failure.at.toISOString(),
  };
}

export function toStatusResponse(status: EvaluationStatus): EvaluationStatusResponse {
  return {
    id: status.id,
    state: status.state,
    counts: { ...status.counts },
    startedAt: status.startedAt?.toISOString() ?? null,
    completedAt: status.completedAt?.toISOString() ?? null,
    failure: toFailureResponse(status.failure),
  };
}

export function toEvaluationSummary(evaluation: Evaluation): EvaluationSummaryResponse {
  return {
    id: evaluation.id,
    benchmarkId: evaluation.benchmarkId,
    agentConfig: {
      strategy: evaluation.agentConfig.strategy,
      model: evaluation.agentConfig.model,
      parameters: { ...evaluation.agentConfig.parameters },
    },
    state: evaluation.state,
    createdAt: evaluation.createdAt.toISOString(),
    completedAt: evaluation.completedAt?.toISOString() ?? null,
    aggregate: evaluation.aggregate,
  };
}

export function toQuestionResult(result: EvaluationQuestionResult): QuestionResultResponse {
  return {
    questionId: result.questionId,
    status: result.status,
    answer: result.answer?.text ?? null,
    reasoning: result.answer?.reasoning ?? null,
    isCorrect: result.isCorrect,
    failureReason: result.failureReason,
    attemptCount: result.attemptCount,
    latencyMs: result.latencyMs,
  };
}
