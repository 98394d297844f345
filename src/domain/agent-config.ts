/**
 * AgentConfig value-object helpers: construction, equality and generic validation.
 * Strategy-specific rules live in each runner's validate().
 */

import type { AgentConfig, AgentParameterValue } from '../types/models.js';

/** `provider/name`, e.g. "anthropic/claude-3.5-sonnet" or "openai/gpt-4o-mini". */
export const MODEL_ID_PATTERN = /^[a-z0-9][a-z0-9._-]*\/[A-Za-z0-9][A-Za-z0-9._:\/-]*$/;

const MAX_TEMPERATURE = 2;

export function createAgentConfig(
  strategy: string,
  model: string,
  parameters: Record<string, AgentParameterValue> = {}
): AgentConfig {
  return Object.freeze({
    strategy,
    model,
    parameters: Object.freeze({ ...parameters }),
  });
}

/** Canonical string form; parameter order does not matter. */
export function agentConfigKey(config: AgentConfig): string {
  const params = Object.keys(config.parameters)
    .sort()
    .map((key) => [key, config.parameters[key]]);
  return JSON.stringify([config.strategy, config.model, params]);
}

export function sameAgentConfig(a: AgentConfig, b: AgentConfig): boolean {
  return agentConfigKey(a) === agentConfigKey(b);
}

/** Validation shared by every strategy. Returns a list of problems, empty when valid. */
export function validateAgentConfig(config: AgentConfig): string[] {
  const errors: string[] = [];

  if (!MODEL_ID_PATTERN.test(config.model)) {
    errors.push(`model "${config.model}" must have the form provider/name`);
  }

  const temperature = config.parameters.temperature;
  if (temperature !== undefined) {
    if (typeof temperature !== 'number' || temperature < 0 || temperature > MAX_TEMPERATURE) {
      errors.push(`temperature must be a number between 0 and ${MAX_TEMPERATURE}`);
    }
  }

  const maxTokens = config.parameters.maxTokens;
  if (maxTokens !== undefined) {
    if (typeof maxTokens !== 'number' || !Number.isInteger(maxTokens) || maxTokens <= 0) {
      errors.push('maxTokens must be a positive integer');
    }
  }

  return errors;
}

/** Reads a numeric parameter, ignoring values of another type. */
export function numericParameter(config: AgentConfig, name: string): number | undefined {
  const value = config.parameters[name];
  return typeof value === 'number' ? value : undefined;
}
