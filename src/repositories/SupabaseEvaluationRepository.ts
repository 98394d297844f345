/**
 * Supabase implementation of IEvaluationRepository.
 * transition() is a conditional UPDATE: the `state IN (...)` filter makes it a
 * compare-and-set, and an empty result means the state had already moved on.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { EvaluationPatch, IEvaluationRepository } from './IEvaluationRepository.js';
import type { EvaluationRow } from '../types/database.js';
import type { Evaluation, EvaluationFilter, EvaluationState } from '../types/models.js';
import { createAgentConfig } from '../domain/agent-config.js';
import { isEvaluationState } from '../domain/guards.js';
import { RepositoryUnavailableError } from '../errors.js';

const TABLE = 'evaluations';
const DEFAULT_LIST_LIMIT = 50;

export class SupabaseEvaluationRepository implements IEvaluationRepository {
  constructor(private readonly db: SupabaseClient) {}

  async load(id: string): Promise<Evaluation | null> {
    const { data, error } = await this.db.from(TABLE).select('*').eq('id', id).maybeSingle();

    if (error) throw new RepositoryUnavailableError('evaluation load', error.message);
    return data ? toEvaluation(data as EvaluationRow) : null;
  }

  async save(evaluation: Evaluation): Promise<Evaluation> {
    const { data, error } = await this.db
      .from(TABLE)
      .upsert(toEvaluationRow(evaluation), { onConflict: 'id' })
      .select()
      .single();

    if (error) throw new RepositoryUnavailableError('evaluation save', error.message);
    return toEvaluation(data as EvaluationRow);
  }

  async transition(
    id: string,
    from: EvaluationState[],
    patch: EvaluationPatch
  ): Promise<Evaluation | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .update(toPatchRow(patch))
      .eq('id', id)
      .in('state', from)
      .select()
      .maybeSingle();

    if (error) throw new RepositoryUnavailableError('evaluation transition', error.message);
    return data ? toEvaluation(data as EvaluationRow) : null;
  }

  async list(filter: EvaluationFilter = {}): Promise<Evaluation[]> {
    let query = this.db.from(TABLE).select('*');
    if (filter.state) query = query.eq('state', filter.state);
    if (filter.benchmarkId) query = query.eq('benchmark_id', filter.benchmarkId);

    const { data, error } = await query
      .order('created_at', { ascending: false })
      .limit(filter.limit ?? DEFAULT_LIST_LIMIT);

    if (error) throw new RepositoryUnavailableError('evaluation list', error.message);
    return (data as EvaluationRow[]).map(toEvaluation);
  }
}

export function toEvaluation(row: EvaluationRow): Evaluation {
  if (!isEvaluationState(row.state)) {
    throw new RepositoryUnavailableError('evaluation decode', `unknown state "${row.state}"`);
  }
  return {
    id: row.id,
    benchmarkId: row.benchmark_id,
    agentConfig: createAgentConfig(row.agent_strategy, row.agent_model, row.agent_parameters ?? {}),
    state: row.state,
    createdAt: new Date(row.created_at),
    startedAt: row.started_at ? new Date(row.started_at) : null,
    completedAt: row.completed_at ? new Date(row.completed_at) : null,
    failure: row.failure
      ? { reason: row.failure.reason, message: row.failure.message, at: new Date(row.failure.at) }
      : null,
    aggregate: row.aggregate,
    createdBy: row.created_by,
  };
}

export function toEvaluationRow(evaluation: Evaluation): EvaluationRow {
  return {
    id: evaluation.id,
    benchmark_id: evaluation.benchmarkId,
    agent_strategy: evaluation.agentConfig.strategy,
    agent_model: evaluation.agentConfig.model,
    agent_parameters: { ...evaluation.agentConfig.parameters },
    state: evaluation.state,
    created_at: evaluation.createdAt.toISOString(),
    started_at: evaluation.startedAt?.toISOString() ?? null,
    completed_at: evaluation.completedAt?.toISOString() ?? null,
    failure: evaluation.failure
      ? { ...evaluation.failure, at: evaluation.failure.at.toISOString() }
      : null,
    aggregate: evaluation.aggregate,
    created_by: evaluation.createdBy,
  };
}

function toPatchRow(patch: EvaluationPatch): Partial<EvaluationRow> {
  const row: Partial<EvaluationRow> = {};
  if (patch.state !== undefined) row.state = patch.state;
  if (patch.startedAt !== undefined) row.started_at = patch.startedAt?.toISOString() ?? null;
  if (patch.completedAt !== undefined) row.completed_at = patch.completedAt?.toISOString() ?? null;
  if (patch.failure !== undefined) {
    row.failure = patch.failure ? { ...patch.failure, at: patch.failure.at.toISOString() } : null;
  }
  if (patch.aggregate !== undefined) row.aggregate = patch.aggregate;
  return row;
}
