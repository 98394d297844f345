/**
 * Benchmark endpoints.
 * GET /api/v1/benchmarks List ingested benchmarks
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { toBenchmarkResponse } from '../services/mappers.js';
import { json } from './http.js';

export function createBenchmarkHandlers(container: Container) {
  const list: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, _ctx) => {
    const benchmarks = await container.orchestrator.listBenchmarks();
    return json({ benchmarks: benchmarks.map(toBenchmarkResponse) });
  });

  return { list };
}
