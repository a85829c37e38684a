/**
 * Dependency wiring.
 * Constructs all services and shared middleware from repositories and
 * providers. Production passes Supabase repositories and real AI clients;
 * tests pass the in-memory mocks.
 */

import type { IUserRepository } from './repositories/IUserRepository.js';
import type { IIdeaRepository } from './repositories/IIdeaRepository.js';
import type { IVoteRepository } from './repositories/IVoteRepository.js';
import type { ICommentRepository } from './repositories/ICommentRepository.js';
import type { IDocumentIndex } from './repositories/IDocumentIndex.js';
import type { IProjectRepository } from './repositories/IProjectRepository.js';
import type { IStrategyRepository } from './repositories/IStrategyRepository.js';
import type { IFundingRepository } from './repositories/IFundingRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ICategorizationProvider } from './providers/ICategorizationProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { DEFAULT_GAPS, DEFAULT_MATCHING, type GapConfig, type MatchingConfig } from './config.js';
import { UserService } from './services/UserService.js';
import { IdeaService } from './services/IdeaService.js';
import { VoteService } from './services/VoteService.js';
import { CommentService } from './services/CommentService.js';
import { AnalysisService } from './services/AnalysisService.js';
import { ServiceMatcher } from './services/ServiceMatcher.js';
import { GapAnalyzer } from './services/GapAnalyzer.js';
import { DocumentService } from './services/DocumentService.js';
import { ProjectService } from './services/ProjectService.js';
import { StrategyService } from './services/StrategyService.js';
import { FundingService } from './services/FundingService.js';
import { HealthService } from './services/HealthService.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createErrorHandler } from './middleware/error-handler.js';
import {
  createRateLimitMiddleware,
  RATE_LIMITS,
  type RateLimitName,
} from './middleware/rate-limit.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { bodyLimit, JSON_BODY_LIMIT, UPLOAD_BODY_LIMIT } from './middleware/body-limit.js';

export interface Container {
  userService: UserService;
  ideaService: IdeaService;
  voteService: VoteService;
  commentService: CommentService;
  documentService: DocumentService;
  projectService: ProjectService;
  strategyService: StrategyService;
  fundingService: FundingService;
  healthService: HealthService;
  logProvider: ILogProvider;
  authenticate: Middleware;
  errorHandler: Middleware;
  bodyLimit: Middleware;
  uploadLimit: Middleware;
  logging: Middleware;
  rateLimit: Record<RateLimitName, Middleware>;
}

export interface ContainerDeps {
  userRepo: IUserRepository;
  ideaRepo: IIdeaRepository;
  voteRepo: IVoteRepository;
  commentRepo: ICommentRepository;
  documentIndex: IDocumentIndex;
  projectRepo: IProjectRepository;
  strategyRepo: IStrategyRepository;
  fundingRepo: IFundingRepository;
  embeddingProvider: IEmbeddingProvider;
  categorizationProvider: ICategorizationProvider;
  logProvider: ILogProvider;
  rateLimitStore: IRateLimitStore;
  adminEmails?: string[];
  matching?: MatchingConfig;
  gaps?: GapConfig;
}

export function createContainer(deps: ContainerDeps): Container {
  const userService = new UserService(deps.userRepo, deps.voteRepo, deps.adminEmails);
  const commentService = new CommentService(deps.commentRepo, deps.ideaRepo, deps.userRepo);
  const matcher = new ServiceMatcher(
    deps.documentIndex,
    deps.embeddingProvider,
    deps.matching ?? DEFAULT_MATCHING
  );
  const analysisService = new AnalysisService(
    deps.categorizationProvider,
    matcher,
    deps.logProvider
  );
  const ideaService = new IdeaService({
    ideaRepo: deps.ideaRepo,
    analysisService,
    commentService,
    gapAnalyzer: new GapAnalyzer(deps.gaps ?? DEFAULT_GAPS),
    logProvider: deps.logProvider,
  });
  const voteService = new VoteService(deps.voteRepo, deps.ideaRepo);
  const documentService = new DocumentService(
    deps.documentIndex,
    deps.embeddingProvider,
    deps.logProvider
  );
  const projectService = new ProjectService(deps.projectRepo, deps.ideaRepo);
  const strategyService = new StrategyService(deps.strategyRepo);
  const fundingService = new FundingService(deps.fundingRepo);
  const healthService = new HealthService(
    {
      database: () => deps.ideaRepo.count(),
      documentIndex: () => deps.documentIndex.count(),
    },
    deps.logProvider
  );

  const rateLimit: Record<RateLimitName, Middleware> = {
    register: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.register),
    createIdea: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.createIdea),
    comment: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.comment),
    vote: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.vote),
    upload: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.upload),
    search: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.search),
    analysisBudget: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.analysisBudget),
  };

  return {
    userService,
    ideaService,
    voteService,
    commentService,
    documentService,
    projectService,
    strategyService,
    fundingService,
    healthService,
    logProvider: deps.logProvider,
    authenticate: createAuthMiddleware(userService),
    errorHandler: createErrorHandler(deps.logProvider),
    bodyLimit: bodyLimit(JSON_BODY_LIMIT),
    uploadLimit: bodyLimit(UPLOAD_BODY_LIMIT),
    logging: createLoggingMiddleware(deps.logProvider),
    rateLimit,
  };
}
