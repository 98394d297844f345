/**
 * Evaluation endpoints.
 * POST /api/v1/evaluations              Create an evaluation
 * GET  /api/v1/evaluations              List evaluations (?state, ?benchmarkId, ?limit)
 * GET  /api/v1/evaluations/:id          Status with result counts
 * POST /api/v1/evaluations/:id/cancel   Request cancellation
 * GET  /api/v1/evaluations/:id/results  Per-question results (?format=json|csv)
 *
 * Runs are started by the CLI worker, not over HTTP: a run outlives a request.
 */

import { pipeline, validateBody, isRecord } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { CreateEvaluationRequest, CreateEvaluationResponse } from '../types/api.js';
import type { AgentParameterValue, EvaluationFilter } from '../types/models.js';
import { createAgentConfig } from '../domain/agent-config.js';
import { EVALUATION_STATES, isEvaluationState } from '../domain/guards.js';
import { ValidationError } from '../errors.js';
import { toEvaluationSummary, toStatusResponse } from '../services/mappers.js';
import { json, resourceId } from './http.js';

const MAX_LIST_LIMIT = 200;

const createSchema: BodySchema = {
  benchmarkId: { type: 'string', required: true, maxLength: 200 },
  agentConfig: {
    type: 'object',
    required: true,
    properties: {
      strategy: { type: 'string', required: true, maxLength: 100 },
      model: { type: 'string', required: true, maxLength: 200 },
      parameters: { type: 'object', required: false },
    },
  },
};

/** Narrow a body that already passed createSchema. */
export function toCreateRequest(body: unknown): CreateEvaluationRequest {
  if (!isRecord(body) || !isRecord(body.agentConfig)) {
    throw new ValidationError('agentConfig is required');
  }
  const { benchmarkId } = body;
  const { strategy, model, parameters } = body.agentConfig;
  if (typeof benchmarkId !== 'string' || typeof strategy !== 'string' || typeof model !== 'string') {
    throw new ValidationError('benchmarkId, agentConfig.strategy and agentConfig.model must be strings');
  }

  const params: Record<string, AgentParameterValue> = {};
  if (parameters !== undefined && parameters !== null) {
    if (!isRecord(parameters)) throw new ValidationError('agentConfig.parameters must be an object');
    for (const [key, value] of Object.entries(parameters)) {
      if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
        throw new ValidationError(`agentConfig.parameters.${key} must be a string, number or boolean`);
      }
      params[key] = value;
    }
  }

  return { benchmarkId, agentConfig: { strategy, model, parameters: params } };
}

export function parseListFilter(url: URL): EvaluationFilter {
  const filter: EvaluationFilter = {};

  const state = url.searchParams.get('state');
  if (state !== null) {
    if (!isEvaluationState(state)) {
      throw new ValidationError(`state must be one of: ${EVALUATION_STATES.join(', ')}`);
    }
    filter.state = state;
  }

  const benchmarkId = url.searchParams.get('benchmarkId');
  if (benchmarkId) filter.benchmarkId = benchmarkId;

  const limit = url.searchParams.get('limit');
  if (limit !== null) {
    const value = Number(limit);
    if (!Number.isInteger(value) || value < 1 || value > MAX_LIST_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
    }
    filter.limit = value;
  }

  return filter;
}

export function createEvaluationHandlers(container: Container) {
  const { orchestrator, exportService } = container;
  const base = pipeline(container.logging, container.errorHandler, container.authenticate);

  const create: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    validateBody(createSchema)
  )(async (req, ctx) => {
    const request = toCreateRequest(await req.json());
    const config = createAgentConfig(
      request.agentConfig.strategy,
      request.agentConfig.model,
      request.agentConfig.parameters
    );

    const id = await orchestrator.createEvaluation(request.benchmarkId, config, ctx.operator);
    const body: CreateEvaluationResponse = { id, state: 'pending' };
    return json(body, 201);
  });

  const list: Handler = base(async (req, _ctx) => {
    const filter = parseListFilter(new URL(req.url));
    const evaluations = await orchestrator.listEvaluations(filter);
    return json({ evaluations: evaluations.map(toEvaluationSummary) });
  });

  const status: Handler = base(async (req, _ctx) => {
    const id = resourceId(req, 'evaluations');
    return json(toStatusResponse(await orchestrator.status(id)));
  });

  const cancel: Handler = base(async (req, _ctx) => {
    const id = resourceId(req, 'evaluations');
    await orchestrator.cancel(id);
    return json(toStatusResponse(await orchestrator.status(id)), 202);
  });

  const results: Handler = base(async (req, _ctx) => {
    const id = resourceId(req, 'evaluations');
    const format = new URL(req.url).searchParams.get('format') ?? 'json';
    if (format !== 'json' && format !== 'csv') {
      throw new ValidationError('format must be json or csv');
    }

    const report = await orchestrator.report(id);
    if (format === 'csv') {
      return new Response(exportService.toCsv(report.evaluation, report.questions, report.results), {
        status: 200,
        headers: {
          'Content-Type': 'text/csv; charset=utf-8',
          'Content-Disposition': `attachment; filename="evaluation-${id}.csv"`,
        },
      });
    }
    return json(exportService.toJson(report.evaluation, report.results));
  });

  return { create, list, status, cancel, results };
}
