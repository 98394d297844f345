/**
 * Registry of reasoning strategies, keyed by AgentConfig.strategy.
 */

import type { IAgentRunner } from './IAgentRunner.js';
import { ChainOfThoughtRunner } from './ChainOfThoughtRunner.js';
import { DirectAnswerRunner } from './DirectAnswerRunner.js';

export class AgentRunnerRegistry {
  private runners = new Map<string, IAgentRunner>();

  constructor(runners: IAgentRunner[] = []) {
    for (const runner of runners) this.register(runner);
  }

  register(runner: IAgentRunner): void {
    this.runners.set(runner.strategy, runner);
  }

  get(strategy: string): IAgentRunner | null {
    return this.runners.get(strategy) ?? null;
  }

  strategies(): string[] {
    return [...this.runners.keys()];
  }
}

export function createDefaultRegistry(): AgentRunnerRegistry {
  return new AgentRunnerRegistry([new DirectAnswerRunner(), new ChainOfThoughtRunner()]);
}
