import { describe, it, expect } from 'vitest';
import { ScoringService, normalizeAnswer } from '../../src/services/ScoringService.js';
import type { EvaluationQuestionResult } from '../../src/types/models.js';

function row(overrides: Partial<EvaluationQuestionResult>): EvaluationQuestionResult {
  return {
    evaluationId: 'ev-1',
    questionId: 'q',
    status: 'succeeded',
    answer: { text: '4', reasoning: null, raw: '4' },
    isCorrect: true,
    failureReason: null,
    failureDetail: null,
    attemptCount: 1,
    latencyMs: 100,
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

describe('ScoringService', () => {
  const scoring = new ScoringService();

  describe('normalizeAnswer', () => {
    it('should trim, lowercase and collapse whitespace', () => {
      expect(normalizeAnswer('  The   Eiffel\tTower ')).toBe('the eiffel tower');
    });

    it('should keep punctuation', () => {
      expect(normalizeAnswer('Paris.')).toBe('paris.');
    });
  });

  describe('judge', () => {
    it('should compare normalized answers by default', () => {
      expect(scoring.judge('Paris', ' PARIS ')).toBe(true);
      expect(scoring.judge('Paris', 'Paris.')).toBe(false);
      expect(scoring.judge('Paris', 'Lyon')).toBe(false);
    });

    it('should require identical strings under exact', () => {
      expect(scoring.judge('Paris', 'paris', 'exact')).toBe(false);
      expect(scoring.judge('Paris', 'Paris', 'exact')).toBe(true);
    });

    it('should compare numbers under numeric', () => {
      expect(scoring.judge('1,000', '1000', 'numeric')).toBe(true);
      expect(scoring.judge('0.5', '.50', 'numeric')).toBe(true);
      expect(scoring.judge('12', '13', 'numeric')).toBe(false);
    });

    it('should fall back to normalized comparison when numeric parsing fails', () => {
      expect(scoring.judge('twelve', ' Twelve', 'numeric')).toBe(true);
    });

    it('should look for the expected answer inside the actual one under contains', () => {
      expect(scoring.judge('Paris', 'The capital is Paris.', 'contains')).toBe(true);
      expect(scoring.judge('Paris', 'Lyon', 'contains')).toBe(false);
    });
  });

  describe('aggregate', () => {
    it('should count correct answers among succeeded questions only', () => {
      const aggregate = scoring.aggregate(
        [
          row({ questionId: 'q1', isCorrect: true, latencyMs: 100 }),
          row({ questionId: 'q2', isCorrect: false, latencyMs: 200 }),
          row({
            questionId: 'q3',
            status: 'failed',
            answer: null,
            isCorrect: null,
            failureReason: 'rate-limited',
            latencyMs: 300,
          }),
        ],
        3
      );

      expect(aggregate).toEqual({
        totalQuestions: 3,
        succeeded: 2,
        failed: 1,
        failedByReason: {
          'transient-network': 0,
          'rate-limited': 1,
          timeout: 0,
          'malformed-response': 0,
          authentication: 0,
          'invalid-configuration': 0,
          unknown: 0,
        },
        correct: 1,
        incorrect: 1,
        accuracy: 0.5,
        meanLatencyMs: 200,
      });
    });

    it('should report zero accuracy when nothing succeeded', () => {
      const aggregate = scoring.aggregate(
        [row({ status: 'failed', answer: null, isCorrect: null, failureReason: 'timeout' })],
        1
      );
      expect(aggregate.accuracy).toBe(0);
      expect(aggregate.failed).toBe(1);
    });

    it('should ignore pending rows', () => {
      const aggregate = scoring.aggregate([row({ status: 'pending', answer: null, isCorrect: null })], 1);
      expect(aggregate.succeeded + aggregate.failed).toBe(0);
      expect(aggregate.meanLatencyMs).toBe(0);
    });
  });
});
