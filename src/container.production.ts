/**
 * Production container: Supabase repositories and the OpenRouter gateway.
 * Logs go to Axiom when configured, to the console otherwise.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { ConfigError } from './errors.js';
import { SupabaseBenchmarkStore } from './repositories/SupabaseBenchmarkStore.js';
import { SupabaseEvaluationRepository } from './repositories/SupabaseEvaluationRepository.js';
import { SupabaseResultRepository } from './repositories/SupabaseResultRepository.js';
import { OpenRouterGateway } from './providers/OpenRouterGateway.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';

let cached: Container | null = null;

export function createLogProvider(config: AppConfig): ILogProvider {
  return config.axiom
    ? new AxiomLogProvider({
        apiToken: config.axiom.apiKey,
        dataset: config.axiom.dataset,
        minLevel: config.logLevel,
      })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel });
}

export function getProductionContainer(config: AppConfig = loadConfig()): Container {
  if (cached) return cached;

  if (!config.supabase) {
    throw new ConfigError('SUPABASE_URL', 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
  }
  if (!config.openRouter.apiKey) {
    throw new ConfigError('OPENROUTER_API_KEY', 'required to dispatch questions');
  }

  const db = getSupabaseClient(config);

  cached = createContainer({
    benchmarks: new SupabaseBenchmarkStore(db),
    evaluations: new SupabaseEvaluationRepository(db),
    results: new SupabaseResultRepository(db),
    gateway: new OpenRouterGateway({
      apiKey: config.openRouter.apiKey,
      baseURL: config.openRouter.baseUrl,
      appName: config.openRouter.appName,
      appUrl: config.openRouter.appUrl ?? undefined,
    }),
    logProvider: createLogProvider(config),
    run: config.run,
    apiKeys: config.apiKeys,
  });

  return cached;
}
