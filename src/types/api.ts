/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  AgentParameterValue,
  ComparisonPolicy,
  EvaluationAggregate,
  EvaluationState,
  FailureReason,
  QuestionResultStatus,
} from './models.js';

// ── Requests ──

export interface AgentConfigPayload {
  strategy: string;
  model: string;
  parameters?: Record<string, AgentParameterValue>;
}

export interface CreateEvaluationRequest {
  benchmarkId: string;
  agentConfig: AgentConfigPayload;
}

// ── Responses ──

export interface BenchmarkResponse {
  id: string;
  name: string;
  description: string | null;
  questionCount: number;
  answerComparison: ComparisonPolicy;
  createdAt: string;
}

export interface CreateEvaluationResponse {
  id: string;
  state: EvaluationState;
}

export interface EvaluationFailureResponse {
  reason: string;
  description: string | null;
  message: string;
  at: string;
}

export interface EvaluationStatusResponse {
  id: string;
  state: EvaluationState;
  counts: {
    total: number;
    succeeded: number;
    failed: number;
    remaining: number;
  };
  startedAt: string | null;
  completedAt: string | null;
  failure: EvaluationFailureResponse | null;
}

export interface EvaluationSummaryResponse {
  id: string;
  benchmarkId: string;
  agentConfig: AgentConfigPayload;
  state: EvaluationState;
  createdAt: string;
  completedAt: string | null;
  aggregate: EvaluationAggregate | null;
}

export interface QuestionResultResponse {
  questionId: string;
  status: QuestionResultStatus;
  answer: string | null;
  reasoning: string | null;
  isCorrect: boolean | null;
  failureReason: FailureReason | null;
  attemptCount: number;
  latencyMs: number;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INVALID_STATE'
  | 'REPOSITORY_UNAVAILABLE'
  | 'EVALUATION_ERRORED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
