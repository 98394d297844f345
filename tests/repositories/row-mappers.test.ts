import { describe, it, expect } from 'vitest';
import { toBenchmarkInfo, toQuestion } from '../../src/repositories/SupabaseBenchmarkStore.js';
import { toEvaluation, toEvaluationRow } from '../../src/repositories/SupabaseEvaluationRepository.js';
import { toResult, toResultRow } from '../../src/repositories/SupabaseResultRepository.js';
import { createAgentConfig } from '../../src/domain/agent-config.js';
import { RepositoryUnavailableError } from '../../src/errors.js';
import type { EvaluationRow, QuestionResultRow } from '../../src/types/database.js';
import type { Evaluation } from '../../src/types/models.js';

describe('benchmark rows', () => {
  it('should map a benchmark and fall back to normalized comparison', () => {
    const info = toBenchmarkInfo({
      id: 'arith',
      name: 'Arithmetic',
      description: null,
      question_count: 12,
      answer_comparison: 'fuzzy',
      created_at: '2026-01-01T00:00:00.000Z',
    });

    expect(info).toEqual({
      id: 'arith',
      name: 'Arithmetic',
      description: null,
      questionCount: 12,
      answerComparison: 'normalized',
      createdAt: new Date('2026-01-01T00:00:00.000Z'),
    });
  });

  it('should map a question and freeze it', () => {
    const question = toQuestion({
      benchmark_id: 'arith',
      question_id: 'q1',
      position: 0,
      text: 'What is 1+1?',
      expected_answer: '2',
      metadata: null,
    });

    expect(question).toEqual({ id: 'q1', text: 'What is 1+1?', expectedAnswer: '2', metadata: {} });
    expect(Object.isFrozen(question)).toBe(true);
  });
});

describe('evaluation rows', () => {
  const evaluation: Evaluation = {
    id: 'ev-1',
    benchmarkId: 'arith',
    agentConfig: createAgentConfig('none', 'openai/gpt-4o-mini', { temperature: 0.2 }),
    state: 'errored',
    createdAt: new Date('2026-03-01T12:00:00.000Z'),
    startedAt: new Date('2026-03-01T12:00:01.000Z'),
    completedAt: new Date('2026-03-01T12:00:05.000Z'),
    failure: {
      reason: 'invalid-configuration',
      message: 'Question q1: http 404: No endpoints found',
      at: new Date('2026-03-01T12:00:05.000Z'),
    },
    aggregate: null,
    createdBy: 'alice',
  };

  it('should map an evaluation to its row', () => {
    expect(toEvaluationRow(evaluation)).toEqual({
      id: 'ev-1',
      benchmark_id: 'arith',
      agent_strategy: 'none',
      agent_model: 'openai/gpt-4o-mini',
      agent_parameters: { temperature: 0.2 },
      state: 'errored',
      created_at: '2026-03-01T12:00:00.000Z',
      started_at: '2026-03-01T12:00:01.000Z',
      completed_at: '2026-03-01T12:00:05.000Z',
      failure: {
        reason: 'invalid-configuration',
        message: 'Question q1: http 404: No endpoints found',
        at: '2026-03-01T12:00:05.000Z',
      },
      aggregate: null,
      created_by: 'alice',
    });
  });

  it('should read back what it wrote', () => {
    expect(toEvaluation(toEvaluationRow(evaluation))).toEqual(evaluation);
  });

  it('should reject an unknown state', () => {
    const row: EvaluationRow = { ...toEvaluationRow(evaluation), state: 'paused' };

    expect(() => toEvaluation(row)).toThrow(RepositoryUnavailableError);
  });
});

describe('result rows', () => {
  const row: QuestionResultRow = {
    evaluation_id: 'ev-1',
    question_id: 'q1',
    status: 'succeeded',
    answer_text: '2',
    answer_reasoning: null,
    answer_raw: 'Answer: 2',
    is_correct: true,
    failure_reason: null,
    failure_detail: null,
    attempt_count: 2,
    latency_ms: 812,
    updated_at: '2026-03-01T12:00:02.000Z',
  };

  it('should map a succeeded row', () => {
    expect(toResult(row)).toEqual({
      evaluationId: 'ev-1',
      questionId: 'q1',
      status: 'succeeded',
      answer: { text: '2', reasoning: null, raw: 'Answer: 2' },
      isCorrect: true,
      failureReason: null,
      failureDetail: null,
      attemptCount: 2,
      latencyMs: 812,
      updatedAt: new Date('2026-03-01T12:00:02.000Z'),
    });
  });

  it('should read an unrecognised failure reason as unknown', () => {
    const failed = toResult({
      ...row,
      status: 'failed',
      answer_text: null,
      answer_raw: null,
      is_correct: null,
      failure_reason: 'quota-exceeded',
    });

    expect(failed).toMatchObject({ status: 'failed', answer: null, failureReason: 'unknown' });
  });

  it('should reject an unknown status', () => {
    expect(() => toResult({ ...row, status: 'skipped' })).toThrow('unknown status "skipped"');
  });

  it('should round latency when writing', () => {
    const written = toResultRow({ ...toResult(row), latencyMs: 812.6 });

    expect(written.latency_ms).toBe(813);
    expect(written.answer_raw).toBe('Answer: 2');
  });
});
