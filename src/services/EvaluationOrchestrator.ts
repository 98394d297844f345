/**
 * Evaluation orchestrator.
 *
 * Owns the evaluation lifecycle:
 *   pending → running → completed | errored | cancelled
 *
 * A run dispatches every question without a terminal result, persists each
 * settlement before counting it, and finishes with a compare-and-set on the
 * stored state. Resuming a run (after a crash or a cancel) skips questions
 * whose result is already terminal, so repeated runs never duplicate work.
 *
 * Run-level faults (an unreachable repository, a model the provider rejects)
 * abort the run and leave the evaluation `errored`. Everything else is a
 * per-question failure recorded as data.
 */

import { randomUUID } from 'node:crypto';
import type { AgentRunnerRegistry } from '../agents/AgentRunnerRegistry.js';
import type { IAgentRunner } from '../agents/IAgentRunner.js';
import { validateAgentConfig } from '../domain/agent-config.js';
import { RUN_FATAL_REASONS } from '../domain/failure-reasons.js';
import {
  ConflictError,
  EvaluationErroredError,
  InvalidStateError,
  NotFoundError,
  RepositoryUnavailableError,
  ValidationError,
} from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IBenchmarkStore } from '../repositories/IBenchmarkStore.js';
import type { IEvaluationRepository } from '../repositories/IEvaluationRepository.js';
import type { IResultRepository } from '../repositories/IResultRepository.js';
import type {
  AgentConfig,
  BenchmarkInfo,
  ComparisonPolicy,
  Evaluation,
  EvaluationAggregate,
  EvaluationFilter,
  EvaluationQuestionResult,
  EvaluationStatus,
  Question,
} from '../types/models.js';
import type { DispatchPool, RequestSlots, RetryNotice, Settlement } from './DispatchPool.js';
import type { ScoringService } from './ScoringService.js';

export interface ProgressInfo {
  evaluationId: string;
  /** Questions with a terminal result, including ones finished by earlier runs. */
  completed: number;
  total: number;
  succeeded: number;
  failed: number;
  elapsedMs: number;
}

export interface RunOptions {
  onProgress?: (progress: ProgressInfo) => void;
  /** Overrides the pool's request concurrency for this run. */
  concurrency?: number;
}

export interface RunOutcome {
  evaluation: Evaluation;
  /** Set when the evaluation completed; null when it was cancelled. */
  aggregate: EvaluationAggregate | null;
}

/** Everything an export needs: the record, its benchmark's questions, every stored row. */
export interface EvaluationReport {
  evaluation: Evaluation;
  questions: Question[];
  results: EvaluationQuestionResult[];
}

export interface EvaluationOrchestratorDeps {
  benchmarks: IBenchmarkStore;
  evaluations: IEvaluationRepository;
  results: IResultRepository;
  registry: AgentRunnerRegistry;
  pool: DispatchPool;
  scoring: ScoringService;
  logger: ILogProvider;
}

export interface EvaluationOrchestratorOptions {
  /** How often a run re-reads its evaluation to notice a cancel from another process. 0 disables. Default: 5_000. */
  cancelPollIntervalMs?: number;
  now?: () => Date;
  generateId?: () => string;
}

interface ActiveRun {
  cancel: AbortController;
}

interface RunFault {
  reason: string;
  message: string;
  cause: unknown;
}

interface PreparedRun {
  info: BenchmarkInfo;
  questions: Question[];
}

/** Setup problem found before any dispatch. */
class RunSetupError extends Error {
  constructor(readonly reason: string, message: string) {
    super(message);
    this.name = 'RunSetupError';
  }
}

export class EvaluationOrchestrator {
  private readonly benchmarks: IBenchmarkStore;
  private readonly evaluations: IEvaluationRepository;
  private readonly resultRepo: IResultRepository;
  private readonly registry: AgentRunnerRegistry;
  private readonly pool: DispatchPool;
  private readonly scoring: ScoringService;
  private readonly logger: ILogProvider;
  private readonly cancelPollIntervalMs: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly active = new Map<string, ActiveRun>();

  constructor(deps: EvaluationOrchestratorDeps, options: EvaluationOrchestratorOptions = {}) {
    this.benchmarks = deps.benchmarks;
    this.evaluations = deps.evaluations;
    this.resultRepo = deps.results;
    this.registry = deps.registry;
    this.pool = deps.pool;
    this.scoring = deps.scoring;
    this.logger = deps.logger;
    this.cancelPollIntervalMs = options.cancelPollIntervalMs ?? 5_000;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  // ── Creation ──

  async createEvaluation(
    benchmarkId: string,
    agentConfig: AgentConfig,
    createdBy: string | null = null
  ): Promise<string> {
    const info = await this.benchmarks.describe(benchmarkId);
    if (!info) {
      throw new ValidationError(`Unknown benchmark "${benchmarkId}"`);
    }

    const questions = await this.benchmarks.questions(benchmarkId);
    if (questions.length === 0) {
      throw new ValidationError(`Benchmark "${benchmarkId}" has no questions`);
    }

    const runner = this.registry.get(agentConfig.strategy);
    if (!runner) {
      throw new ValidationError(`Unknown strategy "${agentConfig.strategy}"`, {
        available: this.registry.strategies(),
      });
    }

    const errors = configErrors(runner, agentConfig);
    if (errors.length > 0) {
      throw new ValidationError('Invalid agent configuration', { errors });
    }

    const evaluation: Evaluation = {
      id: this.generateId(),
      benchmarkId,
      agentConfig,
      state: 'pending',
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      failure: null,
      aggregate: null,
      createdBy,
    };
    await this.evaluations.save(evaluation);

    this.logger.info('Evaluation created', {
      evaluationId: evaluation.id,
      benchmarkId,
      strategy: agentConfig.strategy,
      model: agentConfig.model,
      questions: questions.length,
    });
    return evaluation.id;
  }

  // ── Running ──

  async run(evaluationId: string, options: RunOptions = {}): Promise<RunOutcome> {
    if (this.active.has(evaluationId)) {
      throw new ConflictError(`Evaluation ${evaluationId} is already running`, { evaluationId });
    }

    const activeRun: ActiveRun = { cancel: new AbortController() };
    this.active.set(evaluationId, activeRun);
    try {
      return await this.runGuarded(evaluationId, activeRun, options);
    } finally {
      this.active.delete(evaluationId);
    }
  }

  private async runGuarded(
    evaluationId: string,
    activeRun: ActiveRun,
    options: RunOptions
  ): Promise<RunOutcome> {
    const evaluation = await this.evaluations.load(evaluationId);
    if (!evaluation) throw new NotFoundError(`Evaluation ${evaluationId} not found`);

    if (evaluation.state === 'completed') {
      return { evaluation, aggregate: evaluation.aggregate };
    }
    if (evaluation.state === 'errored') {
      throw new InvalidStateError(`Evaluation ${evaluationId} has errored and cannot be run`, {
        state: evaluation.state,
      });
    }

    let prepared: PreparedRun;
    try {
      prepared = await this.prepare(evaluation);
    } catch (err) {
      const fault: RunFault =
        err instanceof RunSetupError
          ? { reason: err.reason, message: err.message, cause: err }
          : faultFrom(err);
      return this.fail(evaluation, fault);
    }

    const { info, questions } = prepared;
    const questionIds = new Set(questions.map((q) => q.id));

    let existing: EvaluationQuestionResult[];
    try {
      existing = (await this.resultRepo.list(evaluationId)).filter((r) => questionIds.has(r.questionId));
    } catch (err) {
      return this.fail(evaluation, faultFrom(err));
    }

    const priorAttempts = new Map<string, number>();
    const done = new Set<string>();
    let succeeded = 0;
    let failed = 0;
    for (const row of existing) {
      if (row.status === 'succeeded') succeeded++;
      else if (row.status === 'failed') failed++;
      if (row.status === 'pending') priorAttempts.set(row.questionId, row.attemptCount);
      else done.add(row.questionId);
    }
    const remaining = questions.filter((q) => !done.has(q.id));

    let running: Evaluation | null;
    try {
      running = await this.evaluations.transition(evaluationId, ['pending', 'running', 'cancelled'], {
        state: 'running',
        startedAt: evaluation.startedAt ?? this.now(),
        failure: null,
      });
    } catch (err) {
      return this.fail(evaluation, faultFrom(err));
    }
    if (!running) {
      return this.resolveLostStart(evaluationId);
    }

    this.logger.info(evaluation.state === 'pending' ? 'Evaluation run started' : 'Evaluation run resumed', {
      evaluationId,
      total: questions.length,
      remaining: remaining.length,
      previousState: evaluation.state,
    });

    const started = Date.now();
    const fatal = new AbortController();
    const stop = new AbortController();
    const stopRun = () => stop.abort();
    activeRun.cancel.signal.addEventListener('abort', stopRun, { once: true });
    const outcome: { fault: RunFault | null } = { fault: null };

    const abortRun = (next: RunFault) => {
      if (outcome.fault) return;
      outcome.fault = next;
      fatal.abort();
      stop.abort();
      this.logger.error('Evaluation run aborted', {
        evaluationId,
        reason: next.reason,
        message: next.message,
      });
    };

    const reportProgress = () => {
      if (!options.onProgress) return;
      try {
        options.onProgress({
          evaluationId,
          completed: succeeded + failed,
          total: questions.length,
          succeeded,
          failed,
          elapsedMs: Date.now() - started,
        });
      } catch (err) {
        this.logger.warn('Progress callback failed', {
          evaluationId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    };

    const worker = async (question: Question, slots: RequestSlots): Promise<void> => {
      try {
        const settlement = await this.pool.dispatch(question, evaluation.agentConfig, {
          signal: stop.signal,
          slots,
          requestSignal: fatal.signal,
          fatalReasons: RUN_FATAL_REASONS,
          onFatal: (reason, detail) =>
            abortRun({ reason, message: `Question ${question.id}: ${detail}`, cause: null }),
          priorAttempts: priorAttempts.get(question.id) ?? 0,
          evaluationId,
          onRetry: async (notice) => {
            if (fatal.signal.aborted) return;
            await this.persist(this.pendingRow(evaluationId, notice));
          },
        });

        // Run-fatal failures were already reported through onFatal.
        if (fatal.signal.aborted || settlement.status === 'abandoned') return;

        const row = this.settledRow(evaluationId, question, settlement, info.answerComparison);
        await this.persist(row);
        if (fatal.signal.aborted) return;

        if (row.status === 'succeeded') {
          succeeded++;
        } else {
          failed++;
          this.logger.warn('Question failed', {
            evaluationId,
            questionId: question.id,
            reason: row.failureReason,
            attempts: row.attemptCount,
            detail: row.failureDetail,
          });
        }
        reportProgress();
      } catch (err) {
        abortRun(faultFrom(err));
      }
    };

    const stopPolling = this.watchForCancel(evaluationId, activeRun.cancel);
    try {
      await this.pool.runAll(remaining, worker, { concurrency: options.concurrency });
    } finally {
      stopPolling();
      activeRun.cancel.signal.removeEventListener('abort', stopRun);
    }

    if (outcome.fault) return this.fail(running, outcome.fault);

    try {
      return await this.finish(running, questions);
    } catch (err) {
      return this.fail(running, faultFrom(err));
    }
  }

  private async prepare(evaluation: Evaluation): Promise<PreparedRun> {
    const info = await this.benchmarks.describe(evaluation.benchmarkId);
    if (!info) {
      throw new RunSetupError('invalid-configuration', `Benchmark ${evaluation.benchmarkId} no longer exists`);
    }

    const questions = await this.benchmarks.questions(evaluation.benchmarkId);
    if (questions.length === 0) {
      throw new RunSetupError('invalid-configuration', `Benchmark ${evaluation.benchmarkId} has no questions`);
    }

    const runner = this.registry.get(evaluation.agentConfig.strategy);
    if (!runner) {
      throw new RunSetupError(
        'invalid-configuration',
        `Unknown strategy "${evaluation.agentConfig.strategy}"`
      );
    }

    const errors = configErrors(runner, evaluation.agentConfig);
    if (errors.length > 0) {
      throw new RunSetupError('invalid-configuration', errors.join('; '));
    }

    return { info, questions };
  }

  /** Every question is settled or the run stopped: complete it, or record the cancel. */
  private async finish(running: Evaluation, questions: Question[]): Promise<RunOutcome> {
    const evaluationId = running.id;
    const questionIds = new Set(questions.map((q) => q.id));
    const terminal = (await this.resultRepo.listTerminal(evaluationId)).filter((r) =>
      questionIds.has(r.questionId)
    );

    if (terminal.length < questions.length) {
      const cancelled = await this.evaluations.transition(evaluationId, ['running', 'cancelled'], {
        state: 'cancelled',
      });
      const evaluation = cancelled ?? (await this.mustLoad(evaluationId));
      this.logger.info('Evaluation cancelled', {
        evaluationId,
        completed: terminal.length,
        total: questions.length,
      });
      return { evaluation, aggregate: null };
    }

    const aggregate = this.scoring.aggregate(terminal, questions.length);
    const completed = await this.evaluations.transition(evaluationId, ['running'], {
      state: 'completed',
      completedAt: this.now(),
      aggregate,
    });

    if (!completed) {
      // Lost the compare-and-set, most likely to a cancel from elsewhere.
      const current = await this.mustLoad(evaluationId);
      return { evaluation: current, aggregate: current.aggregate };
    }

    this.logger.info('Evaluation completed', {
      evaluationId,
      accuracy: aggregate.accuracy,
      correct: aggregate.correct,
      succeeded: aggregate.succeeded,
      failed: aggregate.failed,
    });
    return { evaluation: completed, aggregate };
  }

  /** Move the evaluation to `errored` and reject the run. */
  private async fail(evaluation: Evaluation, fault: RunFault): Promise<never> {
    const failure = { reason: fault.reason, message: fault.message, at: this.now() };
    try {
      await this.evaluations.transition(evaluation.id, ['pending', 'running', 'cancelled'], {
        state: 'errored',
        completedAt: failure.at,
        failure,
      });
    } catch (err) {
      this.logger.error('Could not record evaluation failure', {
        evaluationId: evaluation.id,
        reason: fault.reason,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    throw new EvaluationErroredError(evaluation.id, fault.reason, fault.message, fault.cause);
  }

  /** The start transition found the evaluation in a state another actor moved it to. */
  private async resolveLostStart(evaluationId: string): Promise<RunOutcome> {
    const current = await this.mustLoad(evaluationId);
    if (current.state === 'completed') {
      return { evaluation: current, aggregate: current.aggregate };
    }
    throw new InvalidStateError(`Evaluation ${evaluationId} is ${current.state} and cannot be run`, {
      state: current.state,
    });
  }

  /** Poll the stored state so a cancel issued by another process stops this run. */
  private watchForCancel(evaluationId: string, cancel: AbortController): () => void {
    if (this.cancelPollIntervalMs <= 0) return () => undefined;

    let polling = false;
    const timer = setInterval(() => {
      if (polling || cancel.signal.aborted) return;
      polling = true;
      this.evaluations
        .load(evaluationId)
        .then((current) => {
          if (current?.state === 'cancelled') {
            this.logger.info('Cancel observed from store', { evaluationId });
            cancel.abort();
          }
        })
        .catch((err: unknown) => {
          this.logger.warn('Cancel poll failed', {
            evaluationId,
            error: err instanceof Error ? err.message : String(err),
          });
        })
        .finally(() => {
          polling = false;
        });
    }, this.cancelPollIntervalMs);
    timer.unref();

    return () => clearInterval(timer);
  }

  private async persist(row: EvaluationQuestionResult): Promise<void> {
    try {
      await this.resultRepo.upsert(row);
    } catch (err) {
      if (err instanceof RepositoryUnavailableError) throw err;
      throw new RepositoryUnavailableError('result upsert', err);
    }
  }

  private pendingRow(evaluationId: string, notice: RetryNotice): EvaluationQuestionResult {
    return {
      evaluationId,
      questionId: notice.questionId,
      status: 'pending',
      answer: null,
      isCorrect: null,
      failureReason: notice.reason,
      failureDetail: notice.detail,
      attemptCount: notice.attemptCount,
      latencyMs: notice.latencyMs,
      updatedAt: this.now(),
    };
  }

  private settledRow(
    evaluationId: string,
    question: Question,
    settlement: Exclude<Settlement, { status: 'abandoned' }>,
    policy: ComparisonPolicy
  ): EvaluationQuestionResult {
    if (settlement.status === 'succeeded') {
      return {
        evaluationId,
        questionId: question.id,
        status: 'succeeded',
        answer: settlement.answer,
        isCorrect: this.scoring.judge(question.expectedAnswer, settlement.answer.text, policy),
        failureReason: null,
        failureDetail: null,
        attemptCount: settlement.attemptCount,
        latencyMs: settlement.latencyMs,
        updatedAt: this.now(),
      };
    }
    return {
      evaluationId,
      questionId: question.id,
      status: 'failed',
      answer: null,
      isCorrect: null,
      failureReason: settlement.reason,
      failureDetail: settlement.detail,
      attemptCount: settlement.attemptCount,
      latencyMs: settlement.latencyMs,
      updatedAt: this.now(),
    };
  }

  // ── Cancellation ──

  async cancel(evaluationId: string): Promise<Evaluation> {
    const evaluation = await this.mustLoad(evaluationId);

    if (evaluation.state === 'completed' || evaluation.state === 'errored') {
      throw new InvalidStateError(`Evaluation ${evaluationId} is already ${evaluation.state}`, {
        state: evaluation.state,
      });
    }
    if (evaluation.state === 'cancelled') return evaluation;

    const activeRun = this.active.get(evaluationId);
    if (activeRun) {
      activeRun.cancel.abort();
      this.logger.info('Evaluation cancel requested', { evaluationId });
      return evaluation;
    }

    const cancelled = await this.evaluations.transition(evaluationId, ['pending', 'running'], {
      state: 'cancelled',
    });
    if (!cancelled) {
      const current = await this.mustLoad(evaluationId);
      if (current.state === 'cancelled') return current;
      throw new InvalidStateError(`Evaluation ${evaluationId} is already ${current.state}`, {
        state: current.state,
      });
    }

    this.logger.info('Evaluation cancelled', { evaluationId });
    return cancelled;
  }

  /** True while a run for the evaluation is executing in this process. */
  isRunning(evaluationId: string): boolean {
    return this.active.has(evaluationId);
  }

  // ── Reads ──

  async status(evaluationId: string): Promise<EvaluationStatus> {
    const evaluation = await this.mustLoad(evaluationId);
    const questions = await this.benchmarks.questions(evaluation.benchmarkId);
    const questionIds = new Set(questions.map((q) => q.id));
    const terminal = (await this.resultRepo.listTerminal(evaluationId)).filter((r) =>
      questionIds.has(r.questionId)
    );

    const succeeded = terminal.filter((r) => r.status === 'succeeded').length;
    const failed = terminal.length - succeeded;

    return {
      id: evaluation.id,
      state: evaluation.state,
      counts: {
        total: questions.length,
        succeeded,
        failed,
        remaining: questions.length - terminal.length,
      },
      startedAt: evaluation.startedAt,
      completedAt: evaluation.completedAt,
      failure: evaluation.failure,
    };
  }

  async getEvaluation(evaluationId: string): Promise<Evaluation> {
    return this.mustLoad(evaluationId);
  }

  async listEvaluations(filter?: EvaluationFilter): Promise<Evaluation[]> {
    return this.evaluations.list(filter);
  }

  /** Every stored row, including questions still between retries. */
  async results(evaluationId: string): Promise<EvaluationQuestionResult[]> {
    await this.mustLoad(evaluationId);
    return this.resultsOf(evaluationId);
  }

  async report(evaluationId: string): Promise<EvaluationReport> {
    const evaluation = await this.mustLoad(evaluationId);
    const [questions, results] = await Promise.all([
      this.benchmarks.questions(evaluation.benchmarkId),
      this.resultsOf(evaluationId),
    ]);
    return { evaluation, questions, results };
  }

  async listBenchmarks(): Promise<BenchmarkInfo[]> {
    return this.benchmarks.list();
  }

  private resultsOf(evaluationId: string): Promise<EvaluationQuestionResult[]> {
    return this.resultRepo.list(evaluationId);
  }

  private async mustLoad(evaluationId: string): Promise<Evaluation> {
    const evaluation = await this.evaluations.load(evaluationId);
    if (!evaluation) throw new NotFoundError(`Evaluation ${evaluationId} not found`);
    return evaluation;
  }
}

function configErrors(runner: IAgentRunner, config: AgentConfig): string[] {
  return [...validateAgentConfig(config), ...runner.validate(config)];
}

function faultFrom(err: unknown): RunFault {
  if (err instanceof RepositoryUnavailableError) {
    return { reason: 'repository-unavailable', message: err.message, cause: err };
  }
  return {
    reason: 'internal-error',
    message: err instanceof Error ? err.message : String(err),
    cause: err,
  };
}
