/**
 * Read access to ingested benchmarks.
 */

import type { BenchmarkInfo, Question } from '../types/models.js';

export interface IBenchmarkStore {
  describe(benchmarkId: string): Promise<BenchmarkInfo | null>;

  /** Questions in benchmark order. Re-reading has no side effects. */
  questions(benchmarkId: string): Promise<Question[]>;

  list(): Promise<BenchmarkInfo[]>;
}
