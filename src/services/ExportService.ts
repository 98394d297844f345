/**
 * Evaluation export.
 * One CSV row per benchmark question, in benchmark order; questions that have
 * no stored result yet are listed with status `not-run`.
 */

import type {
  Evaluation,
  EvaluationQuestionResult,
  Question,
} from '../types/models.js';
import { toEvaluationSummary, toQuestionResult } from './mappers.js';
import type { EvaluationSummaryResponse, QuestionResultResponse } from '../types/api.js';

export const CSV_COLUMNS = [
  'evaluation_id',
  'question_id',
  'question_text',
  'expected_answer',
  'actual_answer',
  'is_correct',
  'status',
  'failure_reason',
  'attempt_count',
  'latency_ms',
] as const;

export interface EvaluationExport {
  evaluation: EvaluationSummaryResponse;
  results: QuestionResultResponse[];
}

export class ExportService {
  toCsv(
    evaluation: Evaluation,
    questions: Question[],
    results: EvaluationQuestionResult[]
  ): string {
    const byQuestion = new Map(results.map((r) => [r.questionId, r]));
    const lines = [CSV_COLUMNS.join(',')];

    for (const question of questions) {
      const result = byQuestion.get(question.id);
      const cells: string[] = [
        evaluation.id,
        question.id,
        question.text,
        question.expectedAnswer,
        result?.answer?.text ?? '',
        result?.isCorrect === null || result?.isCorrect === undefined ? '' : String(result.isCorrect),
        result?.status ?? 'not-run',
        result?.failureReason ?? '',
        String(result?.attemptCount ?? 0),
        String(result?.latencyMs ?? 0),
      ];
      lines.push(cells.map(escapeCsv).join(','));
    }

    return lines.join('\r\n') + '\r\n';
  }

  toJson(evaluation: Evaluation, results: EvaluationQuestionResult[]): EvaluationExport {
    return {
      evaluation: toEvaluationSummary(evaluation),
      results: results.map(toQuestionResult),
    };
  }
}

/** RFC 4180: quote fields containing a comma, quote or line break; double embedded quotes. */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
