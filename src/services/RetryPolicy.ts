/**
 * Retry decisions for per-question failures.
 * Pure: (reason, attemptCount) → retry after a delay, or stop.
 *
 * attemptCount is the number of attempts already made for the question,
 * so the first failure is decided with attemptCount = 1.
 */

import type { FailureReason } from '../types/models.js';

export interface RetryPolicyOptions {
  /** Attempt ceiling for transient failures. Default: 3. */
  maxAttempts?: number;
  /** Delay before the first retry; doubles per attempt. Default: 1000. */
  baseDelayMs?: number;
  /** Upper bound for any delay, including Retry-After hints. Default: 30_000. */
  maxDelayMs?: number;
  /** Ceiling on malformed responses per question, counted apart from other failures. Default: 2 (one retry). */
  malformedResponseMaxAttempts?: number;
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number; unclassified: boolean }
  | { action: 'stop'; unclassified: boolean };

export interface RetryHint {
  retryAfterMs?: number;
  /** Malformed responses seen for the question so far, this one included. Defaults to attemptCount. */
  malformedCount?: number;
}

const TRANSIENT: ReadonlySet<FailureReason> = new Set([
  'rate-limited',
  'transient-network',
  'timeout',
  'unknown',
]);

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly malformedResponseMaxAttempts: number;

  constructor(options?: RetryPolicyOptions) {
    this.maxAttempts = options?.maxAttempts ?? 3;
    this.baseDelayMs = options?.baseDelayMs ?? 1000;
    this.maxDelayMs = options?.maxDelayMs ?? 30_000;
    this.malformedResponseMaxAttempts = options?.malformedResponseMaxAttempts ?? 2;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
  }

  decide(reason: FailureReason, attemptCount: number, hint?: RetryHint): RetryDecision {
    const unclassified = reason === 'unknown';

    if (TRANSIENT.has(reason)) {
      if (attemptCount >= this.maxAttempts) return { action: 'stop', unclassified };
      return { action: 'retry', delayMs: this.delayFor(attemptCount, hint), unclassified };
    }

    if (reason === 'malformed-response') {
      const malformed = hint?.malformedCount ?? attemptCount;
      if (malformed >= this.malformedResponseMaxAttempts) return { action: 'stop', unclassified };
      return { action: 'retry', delayMs: this.delayFor(attemptCount, hint), unclassified };
    }

    // authentication, invalid-configuration: setup defects, never retried
    return { action: 'stop', unclassified };
  }

  private delayFor(attemptCount: number, hint?: RetryHint): number {
    const exponential = this.baseDelayMs * 2 ** Math.max(0, attemptCount - 1);
    const hinted = Math.max(exponential, hint?.retryAfterMs ?? 0);
    return Math.min(hinted, this.maxDelayMs);
  }
}
