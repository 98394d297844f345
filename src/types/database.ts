/**
 * Database row types. They mirror the Supabase table schemas in supabase/migrations.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { EvaluationAggregate } from './models.js';

// ── Benchmarks ──

export interface BenchmarkRow {
  id: string;
  name: string;
  description: string | null;
  question_count: number;
  answer_comparison: string;
  created_at: string;
}

export interface BenchmarkQuestionRow {
  benchmark_id: string;
  question_id: string;
  position: number;
  text: string;
  expected_answer: string;
  metadata: Record<string, string> | null;
}

// ── Evaluations ──

export interface EvaluationRow {
  id: string;
  benchmark_id: string;
  agent_strategy: string;
  agent_model: string;
  agent_parameters: Record<string, string | number | boolean>;
  state: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  failure: { reason: string; message: string; at: string } | null;
  aggregate: EvaluationAggregate | null; // jsonb
  created_by: string | null;
}

export interface QuestionResultRow {
  evaluation_id: string;
  question_id: string;
  status: string;
  answer_text: string | null;
  answer_reasoning: string | null;
  answer_raw: string | null;
  is_correct: boolean | null;
  failure_reason: string | null;
  failure_detail: string | null;
  attempt_count: number;
  latency_ms: number;
  updated_at: string;
}
