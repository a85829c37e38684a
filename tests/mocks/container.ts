/**
 * Test container: the real services wired to in-memory mocks. Returns the
 * mocks too so tests can seed and inspect them.
 */

import { createContainer, type Container } from '../../src/container.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { InMemoryRateLimitStore } from '../../src/stores/InMemoryRateLimitStore.js';
import { MockUserRepository } from './MockUserRepository.js';
import { MockIdeaRepository } from './MockIdeaRepository.js';
import { MockVoteRepository } from './MockVoteRepository.js';
import { MockCommentRepository } from './MockCommentRepository.js';
import { MockDocumentIndex } from './MockDocumentIndex.js';
import { MockProjectRepository } from './MockProjectRepository.js';
import { MockStrategyRepository } from './MockStrategyRepository.js';
import { MockFundingRepository } from './MockFundingRepository.js';
import { MockEmbeddingProvider } from './MockEmbeddingProvider.js';
import { MockCategorizationProvider } from './MockCategorizationProvider.js';

export function createTestContainer(adminEmails: string[] = ['admin@example.org']) {
  const mocks = {
    userRepo: new MockUserRepository(),
    ideaRepo: new MockIdeaRepository(),
    voteRepo: new MockVoteRepository(),
    commentRepo: new MockCommentRepository(),
    documentIndex: new MockDocumentIndex(),
    projectRepo: new MockProjectRepository(),
    strategyRepo: new MockStrategyRepository(),
    fundingRepo: new MockFundingRepository(),
    embeddingProvider: new MockEmbeddingProvider(),
    categorizationProvider: new MockCategorizationProvider(),
    logProvider: new ConsoleLogProvider(),
    rateLimitStore: new InMemoryRateLimitStore(),
  };

  const container: Container = createContainer({ ...mocks, adminEmails });
  return { container, ...mocks };
}
