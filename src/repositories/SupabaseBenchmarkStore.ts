/**
 * Supabase implementation of IBenchmarkStore.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IBenchmarkStore } from './IBenchmarkStore.js';
import type { BenchmarkQuestionRow, BenchmarkRow } from '../types/database.js';
import type { BenchmarkInfo, Question } from '../types/models.js';
import { isComparisonPolicy } from '../domain/guards.js';
import { RepositoryUnavailableError } from '../errors.js';
import { fetchAllPages } from './paging.js';

export class SupabaseBenchmarkStore implements IBenchmarkStore {
  constructor(private readonly db: SupabaseClient) {}

  async describe(benchmarkId: string): Promise<BenchmarkInfo | null> {
    const { data, error } = await this.db
      .from('benchmarks')
      .select('*')
      .eq('id', benchmarkId)
      .maybeSingle();

    if (error) throw new RepositoryUnavailableError('benchmark describe', error.message);
    return data ? toBenchmarkInfo(data as BenchmarkRow) : null;
  }

  async questions(benchmarkId: string): Promise<Question[]> {
    const rows = await fetchAllPages<BenchmarkQuestionRow>('benchmark questions', (from, to) =>
      this.db
        .from('benchmark_questions')
        .select('*')
        .eq('benchmark_id', benchmarkId)
        .order('position', { ascending: true })
        .range(from, to)
    );
    return rows.map(toQuestion);
  }

  async list(): Promise<BenchmarkInfo[]> {
    const rows = await fetchAllPages<BenchmarkRow>('benchmark list', (from, to) =>
      this.db.from('benchmarks').select('*').order('name', { ascending: true }).order('id').range(from, to)
    );
    return rows.map(toBenchmarkInfo);
  }
}

export function toBenchmarkInfo(row: BenchmarkRow): BenchmarkInfo {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    questionCount: row.question_count,
    answerComparison: isComparisonPolicy(row.answer_comparison) ? row.answer_comparison : 'normalized',
    createdAt: new Date(row.created_at),
  };
}

export function toQuestion(row: BenchmarkQuestionRow): Question {
  return Object.freeze({
    id: row.question_id,
    text: row.text,
    expectedAnswer: row.expected_answer,
    metadata: Object.freeze({ ...(row.metadata ?? {}) }),
  });
}
