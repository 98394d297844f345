/**
 * Domain models: the core entities as the engine understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Benchmarks ──

export interface Question {
  id: string;
  text: string;
  expectedAnswer: string;
  metadata: Readonly<Record<string, string>>;
}

/** How a produced answer is compared with the expected one. */
export type ComparisonPolicy = 'normalized' | 'exact' | 'numeric' | 'contains';

export interface BenchmarkInfo {
  id: string;
  name: string;
  description: string | null;
  questionCount: number;
  answerComparison: ComparisonPolicy;
  createdAt: Date;
}

// ── Agent Configuration ──

export type AgentParameterValue = string | number | boolean;

export interface AgentConfig {
  /** Reasoning-strategy identifier, e.g. "none" or "chain-of-thought". */
  readonly strategy: string;
  /** Model identifier in `provider/name` form. */
  readonly model: string;
  readonly parameters: Readonly<Record<string, AgentParameterValue>>;
}

// ── Failures ──

export type FailureReason =
  | 'transient-network'
  | 'rate-limited'
  | 'timeout'
  | 'malformed-response'
  | 'authentication'
  | 'invalid-configuration'
  | 'unknown';

// ── Answers ──

export interface Answer {
  /** Final answer extracted from the model output. */
  text: string;
  reasoning: string | null;
  raw: string;
}

// ── Evaluations ──

export type EvaluationState = 'pending' | 'running' | 'completed' | 'errored' | 'cancelled';

export interface EvaluationFailure {
  reason: string;
  message: string;
  at: Date;
}

export interface EvaluationAggregate {
  totalQuestions: number;
  succeeded: number;
  failed: number;
  failedByReason: Record<FailureReason, number>;
  correct: number;
  incorrect: number;
  /** correct / succeeded; failed questions are reported, not scored. */
  accuracy: number;
  meanLatencyMs: number;
}

export interface Evaluation {
  id: string;
  benchmarkId: string;
  agentConfig: AgentConfig;
  state: EvaluationState;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  failure: EvaluationFailure | null;
  aggregate: EvaluationAggregate | null;
  createdBy: string | null;
}

/** `pending` marks a row written between retry attempts; it is not terminal. */
export type QuestionResultStatus = 'pending' | 'succeeded' | 'failed';

export interface EvaluationQuestionResult {
  evaluationId: string;
  questionId: string;
  status: QuestionResultStatus;
  answer: Answer | null;
  isCorrect: boolean | null;
  failureReason: FailureReason | null;
  failureDetail: string | null;
  attemptCount: number;
  latencyMs: number;
  updatedAt: Date;
}

export interface EvaluationStatus {
  id: string;
  state: EvaluationState;
  counts: {
    total: number;
    succeeded: number;
    failed: number;
    remaining: number;
  };
  startedAt: Date | null;
  completedAt: Date | null;
  failure: EvaluationFailure | null;
}

export interface EvaluationFilter {
  state?: EvaluationState;
  benchmarkId?: string;
  limit?: number;
}
