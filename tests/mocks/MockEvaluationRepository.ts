/**
 * In-memory mock for IEvaluationRepository.
 * Records are copied in and out so callers cannot mutate stored state.
 * `failing` makes every call throw, simulating an unreachable database.
 */

import type { EvaluationPatch, IEvaluationRepository } from '../../src/repositories/IEvaluationRepository.js';
import type { Evaluation, EvaluationFilter, EvaluationState } from '../../src/types/models.js';
import { RepositoryUnavailableError } from '../../src/errors.js';

export class MockEvaluationRepository implements IEvaluationRepository {
  private evaluations = new Map<string, Evaluation>();
  public failing = false;
  /** Every state each evaluation has been moved to, in order. */
  public readonly history: Array<{ id: string; state: EvaluationState }> = [];

  async load(id: string): Promise<Evaluation | null> {
    this.check('load');
    const stored = this.evaluations.get(id);
    return stored ? { ...stored } : null;
  }

  async save(evaluation: Evaluation): Promise<Evaluation> {
    this.check('save');
    this.evaluations.set(evaluation.id, { ...evaluation });
    this.history.push({ id: evaluation.id, state: evaluation.state });
    return { ...evaluation };
  }

  async transition(
    id: string,
    from: EvaluationState[],
    patch: EvaluationPatch
  ): Promise<Evaluation | null> {
    this.check('transition');
    const stored = this.evaluations.get(id);
    if (!stored || !from.includes(stored.state)) return null;

    const updated: Evaluation = { ...stored, ...patch };
    this.evaluations.set(id, updated);
    if (patch.state) this.history.push({ id, state: patch.state });
    return { ...updated };
  }

  async list(filter: EvaluationFilter = {}): Promise<Evaluation[]> {
    this.check('list');
    return [...this.evaluations.values()]
      .filter((e) => !filter.state || e.state === filter.state)
      .filter((e) => !filter.benchmarkId || e.benchmarkId === filter.benchmarkId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, filter.limit ?? 50)
      .map((e) => ({ ...e }));
  }

  // ── Test Helpers ──

  /** Overwrite a record directly, bypassing compare-and-set (another process writing). */
  force(id: string, patch: EvaluationPatch): void {
    const stored = this.evaluations.get(id);
    if (!stored) throw new Error(`No evaluation ${id}`);
    this.evaluations.set(id, { ...stored, ...patch });
  }

  private check(operation: string): void {
    if (this.failing) {
      throw new RepositoryUnavailableError(`evaluation ${operation}`, 'connection refused');
    }
  }
}
