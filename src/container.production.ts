/**
 * Production container: Supabase repositories and real AI providers, built
 * once from the loaded configuration and cached for the process.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { VoyageEmbeddingProvider } from './providers/VoyageEmbeddingProvider.js';
import { OpenRouterCategorizationProvider } from './providers/OpenRouterCategorizationProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { SupabaseUserRepository } from './repositories/SupabaseUserRepository.js';
import { SupabaseIdeaRepository } from './repositories/SupabaseIdeaRepository.js';
import { SupabaseVoteRepository } from './repositories/SupabaseVoteRepository.js';
import { SupabaseCommentRepository } from './repositories/SupabaseCommentRepository.js';
import { SupabaseDocumentIndex } from './repositories/SupabaseDocumentIndex.js';
import { SupabaseProjectRepository } from './repositories/SupabaseProjectRepository.js';
import { SupabaseStrategyRepository } from './repositories/SupabaseStrategyRepository.js';
import { SupabaseFundingRepository } from './repositories/SupabaseFundingRepository.js';
import { InMemoryRateLimitStore } from './stores/InMemoryRateLimitStore.js';

/** Width of the `document_chunks.embedding` column; both providers are asked for it. */
const EMBEDDING_DIMENSIONS = 1024;

let cached: Container | null = null;

export function getProductionContainer(config: AppConfig = loadConfig()): Container {
  if (cached) return cached;

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  cached = createContainer({
    userRepo: new SupabaseUserRepository(db),
    ideaRepo: new SupabaseIdeaRepository(db),
    voteRepo: new SupabaseVoteRepository(db),
    commentRepo: new SupabaseCommentRepository(db),
    documentIndex: new SupabaseDocumentIndex(db),
    projectRepo: new SupabaseProjectRepository(db),
    strategyRepo: new SupabaseStrategyRepository(db),
    fundingRepo: new SupabaseFundingRepository(db),
    embeddingProvider: createEmbeddingProvider(config),
    categorizationProvider: new OpenRouterCategorizationProvider({
      apiKey: config.categorization.apiKey,
      baseUrl: config.categorization.baseUrl,
      model: config.categorization.model,
    }),
    logProvider: createLogProvider(config),
    rateLimitStore: new InMemoryRateLimitStore(),
    adminEmails: config.adminEmails,
    matching: config.matching,
    gaps: config.gaps,
  });

  return cached;
}

function createEmbeddingProvider(config: AppConfig): IEmbeddingProvider {
  const { provider, apiKey } = config.embedding;
  return provider === 'voyage'
    ? new VoyageEmbeddingProvider({ apiKey, dimensions: EMBEDDING_DIMENSIONS })
    : new OpenAIEmbeddingProvider({ apiKey, dimensions: EMBEDDING_DIMENSIONS });
}

// Axiom when configured, console otherwise.
function createLogProvider(config: AppConfig): ILogProvider {
  return config.axiom
    ? new AxiomLogProvider({ apiToken: config.axiom.apiToken, dataset: config.axiom.dataset })
    : new ConsoleLogProvider({ outputToConsole: true });
}
