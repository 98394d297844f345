/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, repositories are Supabase implementations and the gateway
 * talks to OpenRouter; tests pass in-memory mocks instead.
 */

import type { IBenchmarkStore } from './repositories/IBenchmarkStore.js';
import type { IEvaluationRepository } from './repositories/IEvaluationRepository.js';
import type { IResultRepository } from './repositories/IResultRepository.js';
import type { ILLMGateway } from './providers/ILLMGateway.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import type { AppConfig } from './config.js';
import { AgentRunnerRegistry, createDefaultRegistry } from './agents/AgentRunnerRegistry.js';
import { DispatchPool, type Sleep } from './services/DispatchPool.js';
import { EvaluationOrchestrator } from './services/EvaluationOrchestrator.js';
import { ExportService } from './services/ExportService.js';
import { FailureClassifier } from './services/FailureClassifier.js';
import { RetryPolicy } from './services/RetryPolicy.js';
import { ScoringService } from './services/ScoringService.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  orchestrator: EvaluationOrchestrator;
  exportService: ExportService;
  registry: AgentRunnerRegistry;
  logProvider: ILogProvider;
  authenticate: Middleware;
  errorHandler: Middleware;
  logging: Middleware;
}

export function createContainer(deps: {
  benchmarks: IBenchmarkStore;
  evaluations: IEvaluationRepository;
  results: IResultRepository;
  gateway: ILLMGateway;
  logProvider: ILogProvider;
  run: AppConfig['run'];
  apiKeys: AppConfig['apiKeys'];
  registry?: AgentRunnerRegistry;
  /** Test hooks. */
  sleep?: Sleep;
  now?: () => Date;
  generateId?: () => string;
}): Container {
  const registry = deps.registry ?? createDefaultRegistry();
  const scoring = new ScoringService();

  const pool = new DispatchPool({
    gateway: deps.gateway,
    registry,
    classifier: new FailureClassifier(),
    retryPolicy: new RetryPolicy({
      maxAttempts: deps.run.maxAttempts,
      baseDelayMs: deps.run.retryBaseDelayMs,
      maxDelayMs: deps.run.retryMaxDelayMs,
    }),
    logger: deps.logProvider,
    concurrency: deps.run.concurrency,
    questionTimeoutMs: deps.run.questionTimeoutMs,
    sleep: deps.sleep,
  });

  const orchestrator = new EvaluationOrchestrator(
    {
      benchmarks: deps.benchmarks,
      evaluations: deps.evaluations,
      results: deps.results,
      registry,
      pool,
      scoring,
      logger: deps.logProvider,
    },
    {
      cancelPollIntervalMs: deps.run.cancelPollIntervalMs,
      now: deps.now,
      generateId: deps.generateId,
    }
  );

  return {
    orchestrator,
    exportService: new ExportService(),
    registry,
    logProvider: deps.logProvider,
    authenticate: createAuthMiddleware(deps.apiKeys),
    errorHandler: createErrorHandler(deps.logProvider),
    logging: createLoggingMiddleware(deps.logProvider),
  };
}
