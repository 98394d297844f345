/**
 * Agent runner interface.
 * A runner owns one reasoning strategy: it turns a question into a gateway
 * request and a raw model response back into a structured answer.
 */

import type { GatewayRequest, RawResponse } from '../providers/ILLMGateway.js';
import type { AgentConfig, Answer, Question } from '../types/models.js';

export type ParseResult =
  | { ok: true; answer: Answer }
  | { ok: false; message: string };

export interface IAgentRunner {
  /** Strategy identifier matched against AgentConfig.strategy. */
  readonly strategy: string;

  /** Strategy-specific configuration problems; empty when valid. */
  validate(config: AgentConfig): string[];

  buildRequest(question: Question, config: AgentConfig): GatewayRequest;

  parseAnswer(raw: RawResponse): ParseResult;
}
