/**
 * Supabase implementation of IResultRepository.
 *
 * Terminal rows are frozen. upsert() first updates the row only while it is
 * still `pending`; when nothing matched it inserts with ON CONFLICT DO NOTHING,
 * and when that also wrote nothing the stored (terminal) row is returned.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IResultRepository } from './IResultRepository.js';
import type { QuestionResultRow } from '../types/database.js';
import type { EvaluationQuestionResult } from '../types/models.js';
import { isFailureReason } from '../domain/failure-reasons.js';
import { isResultStatus } from '../domain/guards.js';
import { RepositoryUnavailableError } from '../errors.js';
import { fetchAllPages } from './paging.js';

const TABLE = 'evaluation_question_results';

export class SupabaseResultRepository implements IResultRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(result: EvaluationQuestionResult): Promise<EvaluationQuestionResult> {
    const row = toResultRow(result);

    const { data: updated, error: updateError } = await this.db
      .from(TABLE)
      .update(row)
      .eq('evaluation_id', row.evaluation_id)
      .eq('question_id', row.question_id)
      .eq('status', 'pending')
      .select()
      .maybeSingle();

    if (updateError) throw new RepositoryUnavailableError('result update', updateError.message);
    if (updated) return toResult(updated as QuestionResultRow);

    const { data: inserted, error: insertError } = await this.db
      .from(TABLE)
      .upsert(row, { onConflict: 'evaluation_id,question_id', ignoreDuplicates: true })
      .select();

    if (insertError) throw new RepositoryUnavailableError('result insert', insertError.message);
    const [first] = inserted as QuestionResultRow[];
    if (first) return toResult(first);

    const stored = await this.get(result.evaluationId, result.questionId);
    if (!stored) {
      throw new RepositoryUnavailableError('result upsert', 'row vanished after conflict');
    }
    return stored;
  }

  async get(evaluationId: string, questionId: string): Promise<EvaluationQuestionResult | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('evaluation_id', evaluationId)
      .eq('question_id', questionId)
      .maybeSingle();

    if (error) throw new RepositoryUnavailableError('result get', error.message);
    return data ? toResult(data as QuestionResultRow) : null;
  }

  async listTerminal(evaluationId: string): Promise<EvaluationQuestionResult[]> {
    const rows = await fetchAllPages<QuestionResultRow>('result list', (from, to) =>
      this.db
        .from(TABLE)
        .select('*')
        .eq('evaluation_id', evaluationId)
        .in('status', ['succeeded', 'failed'])
        .order('question_id', { ascending: true })
        .range(from, to)
    );
    return rows.map(toResult);
  }

  async list(evaluationId: string): Promise<EvaluationQuestionResult[]> {
    const rows = await fetchAllPages<QuestionResultRow>('result list', (from, to) =>
      this.db
        .from(TABLE)
        .select('*')
        .eq('evaluation_id', evaluationId)
        .order('question_id', { ascending: true })
        .range(from, to)
    );
    return rows.map(toResult);
  }
}

export function toResultRow(result: EvaluationQuestionResult): QuestionResultRow {
  return {
    evaluation_id: result.evaluationId,
    question_id: result.questionId,
    status: result.status,
    answer_text: result.answer?.text ?? null,
    answer_reasoning: result.answer?.reasoning ?? null,
    answer_raw: result.answer?.raw ?? null,
    is_correct: result.isCorrect,
    failure_reason: result.failureReason,
    failure_detail: result.failureDetail,
    attempt_count: result.attemptCount,
    latency_ms: Math.round(result.latencyMs),
    updated_at: result.updatedAt.toISOString(),
  };
}

export function toResult(row: QuestionResultRow): EvaluationQuestionResult {
  if (!isResultStatus(row.status)) {
    throw new RepositoryUnavailableError('result decode', `unknown status "${row.status}"`);
  }
  const failureReason =
    row.failure_reason === null ? null : isFailureReason(row.failure_reason) ? row.failure_reason : 'unknown';

  return {
    evaluationId: row.evaluation_id,
    questionId: row.question_id,
    status: row.status,
    answer:
      row.answer_text === null
        ? null
        : { text: row.answer_text, reasoning: row.answer_reasoning, raw: row.answer_raw ?? '' },
    isCorrect: row.is_correct,
    failureReason,
    failureDetail: row.failure_detail,
    attemptCount: row.attempt_count,
    latencyMs: row.latency_ms,
    updatedAt: new Date(row.updated_at),
  };
}
