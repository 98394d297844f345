/**
 * Chain-of-thought prompting: the model reasons step by step, then states an answer.
 * The reasoning and the final answer are split apart at an answer marker.
 */

import { numericParameter } from '../domain/agent-config.js';
import type { GatewayRequest, RawResponse } from '../providers/ILLMGateway.js';
import type { AgentConfig, Question } from '../types/models.js';
import type { IAgentRunner, ParseResult } from './IAgentRunner.js';

const SYSTEM_PROMPT = 'You are a helpful assistant that thinks step by step.';
const ANSWER_MARKERS = ['Final answer:', 'Answer:', 'Therefore:', 'So the answer is:'];
const MIN_REASONING_TOKENS = 200;

export class ChainOfThoughtRunner implements IAgentRunner {
  readonly strategy = 'chain-of-thought';

  validate(config: AgentConfig): string[] {
    const maxTokens = numericParameter(config, 'maxTokens');
    if (maxTokens !== undefined && maxTokens < MIN_REASONING_TOKENS) {
      return [`chain-of-thought requires maxTokens of at least ${MIN_REASONING_TOKENS}`];
    }
    return [];
  }

  buildRequest(question: Question, config: AgentConfig): GatewayRequest {
    return {
      model: config.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content:
            'Think through this question step by step, then give your answer on a final line ' +
            `starting with "Final answer:".\n\nQuestion: ${question.text}`,
        },
      ],
      temperature: numericParameter(config, 'temperature'),
      maxTokens: numericParameter(config, 'maxTokens'),
    };
  }

  parseAnswer(raw: RawResponse): ParseResult {
    const { reasoning, answer } = splitReasoning(raw.content.trim());

    if (!answer) {
      return { ok: false, message: 'Response contained no answer after reasoning' };
    }

    return { ok: true, answer: { text: answer, reasoning: reasoning || null, raw: raw.content } };
  }
}

function splitReasoning(response: string): { reasoning: string; answer: string } {
  for (const marker of ANSWER_MARKERS) {
    const index = response.indexOf(marker);
    if (index !== -1) {
      return {
        reasoning: response.slice(0, index).trim(),
        answer: response.slice(index + marker.length).trim(),
      };
    }
  }

  // No marker: the last sentence is taken as the answer.
  const sentences = response.split('. ');
  if (sentences.length > 1) {
    return {
      reasoning: sentences.slice(0, -1).join('. ') + '.',
      answer: sentences[sentences.length - 1].trim(),
    };
  }
  return { reasoning: '', answer: response };
}
