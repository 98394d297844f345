/**
 * Direct prompting ("none" strategy): ask for the answer with no reasoning scaffold.
 */

import { numericParameter } from '../domain/agent-config.js';
import type { GatewayRequest, RawResponse } from '../providers/ILLMGateway.js';
import type { AgentConfig, Question } from '../types/models.js';
import type { IAgentRunner, ParseResult } from './IAgentRunner.js';

const SYSTEM_PROMPT = 'You are a helpful assistant that provides direct, concise answers.';
const ANSWER_PREFIXES = ['Final answer:', 'The answer is:', 'Answer:'];

export class DirectAnswerRunner implements IAgentRunner {
  readonly strategy = 'none';

  validate(_config: AgentConfig): string[] {
    return [];
  }

  buildRequest(question: Question, config: AgentConfig): GatewayRequest {
    return {
      model: config.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: `Answer the following question directly:\n\nQuestion: ${question.text}`,
        },
      ],
      temperature: numericParameter(config, 'temperature'),
      maxTokens: numericParameter(config, 'maxTokens'),
    };
  }

  parseAnswer(raw: RawResponse): ParseResult {
    let text = raw.content.trim();
    for (const prefix of ANSWER_PREFIXES) {
      if (text.startsWith(prefix)) {
        text = text.slice(prefix.length).trim();
        break;
      }
    }

    if (!text) {
      return { ok: false, message: 'Response contained no answer' };
    }

    return { ok: true, answer: { text, reasoning: null, raw: raw.content } };
  }
}
