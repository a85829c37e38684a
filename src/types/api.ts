/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  AnalysisStatus,
  ChunkMetadata,
  ChunkSourceType,
  DevelopmentImpact,
  FundingCallStatus,
  FundingSource,
  IdeaStatus,
  IdeaType,
  MatchedService,
  Priority,
  ProjectRelationship,
  ProjectStatus,
  ProjectType,
  Sentiment,
  ServiceRecommendation,
  StrategyDocumentType,
  TargetGroup,
  UserRole,
} from './models.js';

// ── Requests ──

export interface CreateUserRequest {
  name: string;
  email: string;
  department?: string;
}

export interface CreateIdeaRequest {
  title: string;
  description: string;
  type: IdeaType;
  targetGroup: TargetGroup;
  tags?: string[];
}

export interface UpdateIdeaRequest {
  title?: string;
  description?: string;
  type?: IdeaType;
  targetGroup?: TargetGroup;
  priority?: Priority;
  category?: string;
  tags?: string[];
}

export interface IdeaListFilters {
  status?: IdeaStatus;
  type?: IdeaType;
  priority?: Priority;
  targetGroup?: TargetGroup;
  category?: string;
  tag?: string;
  search?: string;
}

export interface CreateCommentRequest {
  content: string;
}

export interface UploadTextRequest {
  filename: string;
  text: string;
}

export interface DocumentSearchRequest {
  query: string;
  maxResults?: number;
}

export interface CreateProjectRequest {
  name: string;
  description: string;
  status?: ProjectStatus;
  projectType?: ProjectType;
  plannedStart?: string;
  plannedEnd?: string;
  actualStart?: string;
  actualEnd?: string;
  estimatedBudget?: number;
  fundingSource?: string;
  ownerDepartment?: string;
  contactEmail?: string;
  projectManager?: string;
  ideaIds?: string[];
}

export type UpdateProjectRequest = Partial<Omit<CreateProjectRequest, 'ideaIds'>>;

export interface ProjectListFilters {
  status?: ProjectStatus;
  projectType?: ProjectType;
  department?: string;
  search?: string;
}

export interface LinkIdeaRequest {
  ideaId: string;
  relationshipType?: ProjectRelationship;
  notes?: string;
}

export interface CreateStrategyDocumentRequest {
  title: string;
  description?: string;
  documentType: StrategyDocumentType;
  source?: string;
  externalId?: string;
  externalUrl?: string;
  content?: string;
  parentId?: string;
  level?: number;
  sortOrder?: number;
  responsibleDepartment?: string;
  responsiblePerson?: string;
  timePeriod?: string;
  validFrom?: string;
  validTo?: string;
  isActive?: boolean;
}

export type UpdateStrategyDocumentRequest = Partial<CreateStrategyDocumentRequest>;

export interface StrategyListFilters {
  documentType?: StrategyDocumentType;
  level?: number;
  isActive?: boolean;
  search?: string;
}

export interface CreateFundingCallRequest {
  title: string;
  description?: string;
  source: FundingSource;
  status?: FundingCallStatus;
  externalId?: string;
  externalUrl?: string;
  openDate?: string;
  deadline?: string;
  decisionDate?: string;
  totalBudget?: number;
  minGrant?: number;
  maxGrant?: number;
  coFundingRequirement?: number;
  eligibleApplicants?: string[];
  focusAreas?: string[];
}

export type UpdateFundingCallRequest = Partial<CreateFundingCallRequest>;

export interface FundingListFilters {
  source?: FundingSource;
  status?: FundingCallStatus;
  search?: string;
}

// ── Responses ──

export interface UserResponse {
  id: string;
  name: string;
  email: string;
  department: string | null;
  role: UserRole;
  createdAt: string;
}

export interface CreateUserResponse extends UserResponse {
  /** Shown once; only its hash is stored. */
  apiKey: string;
}

export interface MyVotesResponse {
  ideaIds: string[];
}

export interface AnalysisState {
  status: AnalysisStatus;
  error: string | null;
  analyzedAt: string | null;
}

export interface IdeaResponse {
  id: string;
  title: string;
  description: string;
  type: IdeaType;
  targetGroup: TargetGroup;
  status: IdeaStatus;
  priority: Priority;
  category: string | null;
  tags: string[];
  voteCount: number;
  submitterId: string;
  aiSentiment: Sentiment | null;
  aiConfidence: number | null;
  aiAnalysisNotes: string | null;
  serviceRecommendation: ServiceRecommendation | null;
  serviceConfidence: number | null;
  serviceReasoning: string | null;
  matchingServices: MatchedService[];
  developmentImpact: DevelopmentImpact | null;
  analysis: AnalysisState;
  createdAt: string;
  updatedAt: string;
}

export interface CommentResponse {
  id: string;
  ideaId: string;
  authorId: string;
  authorName: string | null;
  content: string;
  createdAt: string;
}

export interface IdeaDetailResponse extends IdeaResponse {
  comments: CommentResponse[];
}

export interface IdeaStatsResponse {
  total: number;
  byStatus: Record<string, number>;
  byType: Record<string, number>;
  recent: IdeaResponse[];
}

export interface VoteToggleResponse {
  action: 'added' | 'removed';
  voteCount: number;
}

export interface VoteStatusResponse {
  hasVoted: boolean;
  voteCount: number;
}

export interface CategoryResponse {
  name: string;
  description: string;
}

// ── Gap / coverage report ──

export interface IdeaSummary {
  id: string;
  title: string;
}

export interface ServiceDemand {
  serviceName: string;
  category: string | null;
  ideaCount: number;
  avgMatchScore: number;
  sampleIdeas: IdeaSummary[];
}

export interface DevelopmentNeed {
  ideaId: string;
  title: string;
  priority: Priority;
  recommendation: ServiceRecommendation;
  bestMatchScore: number;
  developmentImpact: DevelopmentImpact;
}

export interface ServiceGap {
  areaKeywords: string[];
  ideaCount: number;
  sampleIdeas: IdeaSummary[];
}

export interface GapReport {
  totalIdeasAnalyzed: number;
  overview: Record<ServiceRecommendation, number>;
  topMatchedServices: ServiceDemand[];
  developmentNeeds: DevelopmentNeed[];
  gaps: ServiceGap[];
  aiConfidenceAvg: number;
  serviceConfidenceAvg: number;
}

export interface ReanalyzeResponse {
  total: number;
  analyzed: number;
  failed: number;
}

// ── Documents ──

export interface DocumentUploadResponse {
  filename: string;
  sourceType: ChunkSourceType;
  chunks: number;
}

export interface CatalogUploadResponse {
  filename: string;
  servicesIndexed: number;
  chunks: number;
}

export interface DocumentSearchResult {
  content: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface DocumentFileResponse {
  filename: string;
  fileType: string;
  sourceType: ChunkSourceType;
  serviceName: string | null;
  chunkCount: number;
  firstSeen: string;
}

export interface DocumentStatsResponse {
  totalChunks: number;
  uniqueDocuments: number;
  byFileType: Record<string, number>;
}

export interface DeleteDocumentResponse {
  filename: string;
  deletedChunks: number;
}

export interface ClearDocumentsResponse {
  deletedChunks: number;
}

// ── Projects ──

export interface ProjectResponse {
  id: string;
  name: string;
  description: string;
  status: ProjectStatus;
  projectType: ProjectType;
  plannedStart: string | null;
  plannedEnd: string | null;
  actualStart: string | null;
  actualEnd: string | null;
  estimatedBudget: number | null;
  fundingSource: string | null;
  ownerDepartment: string | null;
  contactEmail: string | null;
  projectManager: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface LinkedIdeaResponse {
  ideaId: string;
  title: string | null;
  status: IdeaStatus | null;
  relationshipType: ProjectRelationship;
  notes: string | null;
  linkedAt: string;
}

export interface ProjectDetailResponse extends ProjectResponse {
  linkedIdeas: LinkedIdeaResponse[];
}

export interface ProjectStatsResponse {
  total: number;
  byStatus: Record<string, number>;
  byType: Record<string, number>;
  totalBudget: number;
  linkedIdeas: number;
}

// ── Strategy ──

export interface StrategyDocumentResponse {
  id: string;
  title: string;
  description: string | null;
  documentType: StrategyDocumentType;
  source: string | null;
  externalId: string | null;
  externalUrl: string | null;
  content: string | null;
  parentId: string | null;
  level: number;
  sortOrder: number;
  responsibleDepartment: string | null;
  responsiblePerson: string | null;
  timePeriod: string | null;
  validFrom: string | null;
  validTo: string | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface StrategyTreeNode extends StrategyDocumentResponse {
  children: StrategyTreeNode[];
}

export interface StrategyStatsResponse {
  total: number;
  byType: Record<string, number>;
  byLevel: Record<string, number>;
  active: number;
}

// ── Funding ──

export interface FundingCallResponse {
  id: string;
  title: string;
  description: string | null;
  source: FundingSource;
  status: FundingCallStatus;
  externalId: string | null;
  externalUrl: string | null;
  openDate: string | null;
  deadline: string | null;
  decisionDate: string | null;
  totalBudget: number | null;
  minGrant: number | null;
  maxGrant: number | null;
  coFundingRequirement: number | null;
  eligibleApplicants: string[];
  focusAreas: string[];
  createdAt: string;
  updatedAt: string;
}

export interface UpcomingDeadlineResponse extends FundingCallResponse {
  daysUntilDeadline: number;
}

export interface FundingStatsResponse {
  total: number;
  bySource: Record<string, number>;
  byStatus: Record<string, number>;
  totalBudget: number;
  open: number;
}

// ── Health ──

export interface HealthResponse {
  status: 'ok' | 'degraded';
  checks?: Record<string, 'ok' | 'error'>;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'PAYLOAD_TOO_LARGE'
  | 'RATE_LIMITED'
  | 'PROVIDER_ERROR'
  | 'ANALYSIS_FAILED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
