/**
 * reasonbench command implementations.
 * Parsing and output are kept apart from process wiring so commands can run
 * against an in-memory container.
 */

import minimist from 'minimist';
import type { Container } from '../container.js';
import { createAgentConfig } from '../domain/agent-config.js';
import {
  FAILURE_REASONS,
  FAILURE_REASON_DESCRIPTIONS,
  describeFailureReason,
} from '../domain/failure-reasons.js';
import { EVALUATION_STATES, isEvaluationState } from '../domain/guards.js';
import { AppError, ConfigError, ValidationError } from '../errors.js';
import type { ProgressInfo } from '../services/EvaluationOrchestrator.js';
import type { AgentParameterValue, EvaluationFilter } from '../types/models.js';

export const USAGE = `
reasonbench: score reasoning strategies against question/answer benchmarks

Usage:
  reasonbench <command> [options]

Commands:
  benchmarks                         List benchmarks
  create --benchmark <id> --strategy <none|chain-of-thought> --model <provider/name>
         [--temperature <n>] [--max-tokens <n>] [--param key=value ...]
                                     Create an evaluation and print its id
  run <id> [--concurrency <n>]       Run (or resume) an evaluation; Ctrl-C cancels
  status <id>                        Show progress counts
  cancel <id>                        Cancel a pending or running evaluation
  list [--state <s>] [--benchmark <id>] [--limit <n>]
                                     List evaluations, newest first
  export <id> [--format csv|json] [--output <file>]
                                     Export per-question results

Options:
  --help                             Show this help message
`.trim();

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 64;
/** A run stopped by a cancel. */
export const EXIT_CANCELLED = 2;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  writeFile(path: string, content: string): Promise<void>;
  /** Register a Ctrl-C handler; returns a function that removes it. */
  onInterrupt(handler: () => void): () => void;
}

export async function runCli(argv: string[], container: Container, io: CliIO): Promise<number> {
  const args = minimist(argv, {
    string: ['benchmark', 'strategy', 'model', 'state', 'format', 'output', 'param'],
    boolean: ['help'],
    alias: { h: 'help', o: 'output' },
  });

  const [command, target] = args._.map(String);

  if (args.help || !command) {
    io.out(USAGE);
    return args.help ? EXIT_OK : EXIT_USAGE;
  }

  try {
    switch (command) {
      case 'benchmarks':
        return await listBenchmarks(container, io);
      case 'create':
        return await create(container, io, args);
      case 'run':
        return await run(container, io, requireId(target), args);
      case 'status':
        return await status(container, io, requireId(target));
      case 'cancel':
        return await cancel(container, io, requireId(target));
      case 'list':
        return await list(container, io, args);
      case 'export':
        return await exportResults(container, io, requireId(target), args);
      default:
        io.err(`Error: unknown command "${command}"`);
        io.out(USAGE);
        return EXIT_USAGE;
    }
  } catch (err) {
    if (err instanceof AppError || err instanceof ConfigError) {
      io.err(`Error: ${err.message}`);
      const errors = err instanceof AppError ? err.details?.errors : undefined;
      if (Array.isArray(errors)) {
        for (const line of errors) io.err(`  - ${String(line)}`);
      }
      return err instanceof ValidationError ? EXIT_USAGE : EXIT_FAILURE;
    }
    throw err;
  } finally {
    await container.logProvider.flush();
  }
}

type Args = minimist.ParsedArgs;

function requireId(target: string | undefined): string {
  if (!target) throw new ValidationError('an evaluation id is required');
  return target;
}

function optionalString(args: Args, name: string): string | undefined {
  const value: unknown = args[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError(`--${name} needs a value`);
  }
  return value;
}

function requiredString(args: Args, name: string): string {
  const value = optionalString(args, name);
  if (value === undefined) throw new ValidationError(`--${name} is required`);
  return value;
}

function optionalNumber(args: Args, name: string): number | undefined {
  const value: unknown = args[name];
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (typeof value === 'boolean' || !Number.isFinite(parsed)) {
    throw new ValidationError(`--${name} must be a number`);
  }
  return parsed;
}

/** `--param key=value`, repeatable; numbers and booleans are coerced. */
function parseParams(args: Args): Record<string, AgentParameterValue> {
  const raw: unknown = args.param;
  const entries = raw === undefined ? [] : Array.isArray(raw) ? raw.map(String) : [String(raw)];
  const params: Record<string, AgentParameterValue> = {};

  for (const entry of entries) {
    const sep = entry.indexOf('=');
    if (sep <= 0) throw new ValidationError(`--param "${entry}" must have the form key=value`);
    const key = entry.slice(0, sep);
    const value = entry.slice(sep + 1);
    if (value === 'true' || value === 'false') params[key] = value === 'true';
    else if (value !== '' && Number.isFinite(Number(value))) params[key] = Number(value);
    else params[key] = value;
  }
  return params;
}

async function listBenchmarks(container: Container, io: CliIO): Promise<number> {
  const benchmarks = await container.orchestrator.listBenchmarks();
  if (benchmarks.length === 0) {
    io.out('No benchmarks found.');
    return EXIT_OK;
  }
  for (const b of benchmarks) {
    io.out(`${b.id}\t${b.name}\t${b.questionCount} questions\t${b.answerComparison}`);
  }
  return EXIT_OK;
}

async function create(container: Container, io: CliIO, args: Args): Promise<number> {
  const parameters = parseParams(args);
  const temperature = optionalNumber(args, 'temperature');
  const maxTokens = optionalNumber(args, 'max-tokens');
  if (temperature !== undefined) parameters.temperature = temperature;
  if (maxTokens !== undefined) parameters.maxTokens = maxTokens;

  const config = createAgentConfig(
    requiredString(args, 'strategy'),
    requiredString(args, 'model'),
    parameters
  );
  const id = await container.orchestrator.createEvaluation(
    requiredString(args, 'benchmark'),
    config,
    'cli'
  );
  io.out(id);
  return EXIT_OK;
}

export function formatProgress(p: ProgressInfo): string {
  const seconds = (p.elapsedMs / 1000).toFixed(1);
  return `[${p.completed}/${p.total}] succeeded=${p.succeeded} failed=${p.failed} (${seconds}s)`;
}

async function run(container: Container, io: CliIO, id: string, args: Args): Promise<number> {
  const concurrency = optionalNumber(args, 'concurrency');
  if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
    throw new ValidationError('--concurrency must be a positive integer');
  }

  const { orchestrator } = container;
  let interrupted = false;
  const removeHandler = io.onInterrupt(() => {
    if (interrupted) return;
    interrupted = true;
    io.err('Cancelling: waiting for in-flight questions to finish...');
    orchestrator.cancel(id).catch((err: unknown) => {
      io.err(`Cancel failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  });

  try {
    const outcome = await orchestrator.run(id, {
      concurrency,
      onProgress: (p) => io.err(formatProgress(p)),
    });

    const { evaluation, aggregate } = outcome;
    if (evaluation.state === 'completed' && aggregate) {
      io.out(`Evaluation ${id} completed`);
      io.out(`  accuracy:  ${(aggregate.accuracy * 100).toFixed(1)}% (${aggregate.correct}/${aggregate.succeeded})`);
      io.out(`  failed:    ${aggregate.failed}/${aggregate.totalQuestions}`);
      for (const reason of FAILURE_REASONS) {
        const count = aggregate.failedByReason[reason];
        if (count > 0) io.out(`    ${reason}: ${count} (${FAILURE_REASON_DESCRIPTIONS[reason]})`);
      }
      return EXIT_OK;
    }

    io.out(`Evaluation ${id} ${evaluation.state}; run it again to resume`);
    return EXIT_CANCELLED;
  } finally {
    removeHandler();
  }
}

async function status(container: Container, io: CliIO, id: string): Promise<number> {
  const s = await container.orchestrator.status(id);
  io.out(`state:     ${s.state}`);
  io.out(`total:     ${s.counts.total}`);
  io.out(`succeeded: ${s.counts.succeeded}`);
  io.out(`failed:    ${s.counts.failed}`);
  io.out(`remaining: ${s.counts.remaining}`);
  if (s.failure) {
    const description = describeFailureReason(s.failure.reason);
    io.out(`failure:   ${s.failure.reason}${description ? ` (${description})` : ''}`);
    io.out(`message:   ${s.failure.message}`);
  }
  return EXIT_OK;
}

async function cancel(container: Container, io: CliIO, id: string): Promise<number> {
  const evaluation = await container.orchestrator.cancel(id);
  io.out(`Evaluation ${id} ${evaluation.state === 'cancelled' ? 'cancelled' : 'cancel requested'}`);
  return EXIT_OK;
}

async function list(container: Container, io: CliIO, args: Args): Promise<number> {
  const filter: EvaluationFilter = {};
  const state = optionalString(args, 'state');
  if (state !== undefined) {
    if (!isEvaluationState(state)) {
      throw new ValidationError(`--state must be one of: ${EVALUATION_STATES.join(', ')}`);
    }
    filter.state = state;
  }
  const benchmark = optionalString(args, 'benchmark');
  if (benchmark !== undefined) filter.benchmarkId = benchmark;
  const limit = optionalNumber(args, 'limit');
  if (limit !== undefined) filter.limit = limit;

  const evaluations = await container.orchestrator.listEvaluations(filter);
  if (evaluations.length === 0) {
    io.out('No evaluations found.');
    return EXIT_OK;
  }
  for (const e of evaluations) {
    const accuracy = e.aggregate ? `${(e.aggregate.accuracy * 100).toFixed(1)}%` : '-';
    io.out(
      `${e.id}\t${e.state}\t${e.benchmarkId}\t${e.agentConfig.strategy}\t${e.agentConfig.model}\t${accuracy}`
    );
  }
  return EXIT_OK;
}

async function exportResults(container: Container, io: CliIO, id: string, args: Args): Promise<number> {
  const format = optionalString(args, 'format') ?? 'csv';
  if (format !== 'csv' && format !== 'json') {
    throw new ValidationError('--format must be csv or json');
  }

  const report = await container.orchestrator.report(id);
  const content =
    format === 'csv'
      ? container.exportService.toCsv(report.evaluation, report.questions, report.results)
      : JSON.stringify(container.exportService.toJson(report.evaluation, report.results), null, 2) + '\n';

  const output = optionalString(args, 'output');
  if (output) {
    await io.writeFile(output, content);
    io.err(`Wrote ${report.results.length} results to ${output}`);
  } else {
    io.out(content.trimEnd());
  }
  return EXIT_OK;
}
