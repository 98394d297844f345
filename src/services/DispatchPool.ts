/**
 * Dispatch pool.
 * Runs one question through runner → gateway → parser, retrying failures
 * under the retry policy, and fans questions out over a shared set of request
 * slots. A slot is held only while a request is in flight, never during
 * backoff. Question-level failures come back as settlements, never as
 * exceptions.
 */

import { setTimeout as delay } from 'node:timers/promises';
import pLimit from 'p-limit';
import type { AgentRunnerRegistry } from '../agents/AgentRunnerRegistry.js';
import type { GatewayRequest, GatewayResult, ILLMGateway, RawError } from '../providers/ILLMGateway.js';
import { toRawError } from '../providers/ILLMGateway.js';
import type { DispatchLogEvent, ILogProvider } from '../providers/ILogProvider.js';
import type { AgentConfig, Answer, FailureReason, Question } from '../types/models.js';
import type { FailureClassifier } from './FailureClassifier.js';
import type { RetryPolicy } from './RetryPolicy.js';

export type Settlement =
  | { status: 'succeeded'; answer: Answer; attemptCount: number; latencyMs: number }
  | {
      status: 'failed';
      reason: FailureReason;
      detail: string;
      attemptCount: number;
      latencyMs: number;
    }
  /** The run stopped before the next attempt could start, or the request was aborted. */
  | { status: 'abandoned'; attemptCount: number };

export interface RetryNotice {
  questionId: string;
  attemptCount: number;
  reason: FailureReason;
  detail: string;
  delayMs: number;
  latencyMs: number;
}

/** Runs `fn` once a request slot is free, holding the slot until it settles. */
export type RequestSlots = <R>(fn: () => Promise<R>) => Promise<R>;

export interface DispatchOptions {
  /** Once aborted, no further attempt starts. The attempt in flight still completes. */
  signal?: AbortSignal;
  /** Shared request limiter. Without it every attempt runs immediately. */
  slots?: RequestSlots;
  /** Failure reasons that end the whole run. The question settles failed at once. */
  fatalReasons?: ReadonlySet<FailureReason>;
  /** Called for a fatal failure while its request slot is still held, so no queued attempt starts first. */
  onFatal?: (reason: FailureReason, detail: string) => void;
  /** Aborts the gateway call in flight. Its outcome is then abandoned. */
  requestSignal?: AbortSignal;
  /** Attempts made by earlier runs; numbering continues from here. */
  priorAttempts?: number;
  /** Called before backing off. Exceptions propagate out of dispatch(). */
  onRetry?: (notice: RetryNotice) => Promise<void>;
  /** Log context. */
  evaluationId?: string;
}

export interface RunAllOptions {
  /** Overrides the pool's concurrency for this call. */
  concurrency?: number;
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export interface DispatchPoolOptions {
  gateway: ILLMGateway;
  registry: AgentRunnerRegistry;
  classifier: FailureClassifier;
  retryPolicy: RetryPolicy;
  logger: ILogProvider;
  /** Requests in flight at once. Default: 4. */
  concurrency?: number;
  /** Per-attempt gateway timeout. Default: 60_000. */
  questionTimeoutMs?: number;
  sleep?: Sleep;
  clock?: () => number;
}

type AttemptOutcome =
  | { ok: true; answer: Answer }
  | { ok: false; reason: FailureReason; detail: string; retryAfterMs?: number };

const unlimited: RequestSlots = (fn) => fn();

export const abortableSleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
};

export class DispatchPool {
  readonly concurrency: number;
  private readonly gateway: ILLMGateway;
  private readonly registry: AgentRunnerRegistry;
  private readonly classifier: FailureClassifier;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: ILogProvider;
  private readonly questionTimeoutMs: number;
  private readonly sleep: Sleep;
  private readonly clock: () => number;

  constructor(opts: DispatchPoolOptions) {
    this.gateway = opts.gateway;
    this.registry = opts.registry;
    this.classifier = opts.classifier;
    this.retryPolicy = opts.retryPolicy;
    this.logger = opts.logger;
    this.concurrency = opts.concurrency ?? 4;
    this.questionTimeoutMs = opts.questionTimeoutMs ?? 60_000;
    this.sleep = opts.sleep ?? abortableSleep;
    this.clock = opts.clock ?? Date.now;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError('concurrency must be a positive integer');
    }
  }

  async dispatch(
    question: Question,
    config: AgentConfig,
    options: DispatchOptions = {}
  ): Promise<Settlement> {
    const slots = options.slots ?? unlimited;
    // Latency runs from the first attempt, not from queueing for a slot.
    const timing: { startedAt: number | null } = { startedAt: null };
    let attemptCount = options.priorAttempts ?? 0;
    let malformedCount = 0;

    for (;;) {
      const outcome = await slots(async (): Promise<AttemptOutcome | null> => {
        if (isAborted(options)) return null;
        if (timing.startedAt === null) timing.startedAt = this.clock();
        const result = await this.attempt(question, config, options.requestSignal);
        if (!result.ok && options.fatalReasons?.has(result.reason)) {
          options.onFatal?.(result.reason, result.detail);
        }
        return result;
      });
      if (!outcome) return { status: 'abandoned', attemptCount };

      attemptCount++;
      const finishedAt = this.clock();
      const latencyMs = finishedAt - (timing.startedAt ?? finishedAt);

      if (!outcome.ok && options.fatalReasons?.has(outcome.reason)) {
        return { status: 'failed', reason: outcome.reason, detail: outcome.detail, attemptCount, latencyMs };
      }

      if (options.requestSignal?.aborted) {
        return { status: 'abandoned', attemptCount };
      }

      if (outcome.ok) {
        return { status: 'succeeded', answer: outcome.answer, attemptCount, latencyMs };
      }

      if (outcome.reason === 'malformed-response') malformedCount++;
      const decision = this.retryPolicy.decide(outcome.reason, attemptCount, {
        retryAfterMs: outcome.retryAfterMs,
        malformedCount,
      });

      if (decision.unclassified) {
        const event: DispatchLogEvent = {
          level: 'warn',
          message: 'Unclassified failure',
          evaluationId: options.evaluationId,
          questionId: question.id,
          attempt: attemptCount,
          fields: { detail: outcome.detail },
        };
        this.logger.log(event);
      }

      if (decision.action === 'stop') {
        return {
          status: 'failed',
          reason: outcome.reason,
          detail: outcome.detail,
          attemptCount,
          latencyMs,
        };
      }

      if (options.signal?.aborted) {
        return { status: 'abandoned', attemptCount };
      }

      const event: DispatchLogEvent = {
        level: 'warn',
        message: 'Retrying question',
        evaluationId: options.evaluationId,
        questionId: question.id,
        attempt: attemptCount,
        reason: outcome.reason,
        fields: { delayMs: decision.delayMs },
      };
      this.logger.log(event);

      await options.onRetry?.({
        questionId: question.id,
        attemptCount,
        reason: outcome.reason,
        detail: outcome.detail,
        delayMs: decision.delayMs,
        latencyMs,
      });

      const slept = await this.sleep(decision.delayMs, options.signal);
      if (!slept) {
        return { status: 'abandoned', attemptCount };
      }
    }
  }

  /**
   * Run `worker` over every item. Workers share one set of `concurrency`
   * request slots, to be passed on to dispatch(); slots are handed out in
   * request order, so a retry queues behind attempts already waiting.
   * A worker that throws does not stop the others; the first error is rethrown
   * after every item has settled.
   */
  async runAll<T>(
    items: readonly T[],
    worker: (item: T, slots: RequestSlots) => Promise<void>,
    options: RunAllOptions = {}
  ): Promise<void> {
    const concurrency = options.concurrency ?? this.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError('concurrency must be a positive integer');
    }
    const limit = pLimit(concurrency);
    const slots: RequestSlots = (fn) => limit(fn);

    const settled = await Promise.allSettled(items.map((item) => worker(item, slots)));

    const rejected = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (rejected) throw rejected.reason;
  }

  private async attempt(
    question: Question,
    config: AgentConfig,
    requestSignal: AbortSignal | undefined
  ): Promise<AttemptOutcome> {
    const runner = this.registry.get(config.strategy);
    if (!runner) {
      return failure('invalid-configuration', `Unknown strategy "${config.strategy}"`);
    }

    let request: GatewayRequest;
    try {
      request = runner.buildRequest(question, config);
    } catch (err) {
      return failure('unknown', `Request building failed: ${errorMessage(err)}`);
    }

    let result: GatewayResult;
    try {
      result = await this.gateway.execute(request, {
        timeoutMs: this.questionTimeoutMs,
        signal: requestSignal,
      });
    } catch (err) {
      return this.classified(toRawError(err));
    }

    if (!result.ok) return this.classified(result.error);

    try {
      const parsed = runner.parseAnswer(result.response);
      if (parsed.ok) return { ok: true, answer: parsed.answer };
      return failure('malformed-response', parsed.message);
    } catch (err) {
      return failure('malformed-response', `Answer parsing failed: ${errorMessage(err)}`);
    }
  }

  private classified(error: RawError): AttemptOutcome {
    return {
      ok: false,
      reason: this.classifier.classify(error),
      detail: describeRawError(error),
      retryAfterMs: error.retryAfterMs,
    };
  }
}

function failure(reason: FailureReason, detail: string): AttemptOutcome {
  return { ok: false, reason, detail };
}

function isAborted(options: DispatchOptions): boolean {
  return Boolean(options.signal?.aborted || options.requestSignal?.aborted);
}

function describeRawError(error: RawError): string {
  const parts: string[] = [error.kind];
  if (error.status !== undefined) parts.push(String(error.status));
  if (error.code) parts.push(error.code);
  return `${parts.join(' ')}: ${error.message}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
