/**
 * Domain models — core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Enumerations ──

export const IDEA_TYPES = ['idea', 'problem', 'need', 'improvement'] as const;
export type IdeaType = (typeof IDEA_TYPES)[number];

export const IDEA_STATUSES = [
  'new',
  'under_review',
  'approved',
  'in_development',
  'implemented',
  'rejected',
] as const;
export type IdeaStatus = (typeof IDEA_STATUSES)[number];

export const PRIORITIES = ['low', 'medium', 'high'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const TARGET_GROUPS = [
  'citizens',
  'businesses',
  'employees',
  'other_organizations',
] as const;
export type TargetGroup = (typeof TARGET_GROUPS)[number];

export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const SERVICE_RECOMMENDATIONS = [
  'existing_service',
  'develop_existing',
  'new_service',
] as const;
export type ServiceRecommendation = (typeof SERVICE_RECOMMENDATIONS)[number];

export type DevelopmentImpact = 'low' | 'medium' | 'high';

export type AnalysisStatus = 'pending' | 'analyzed' | 'failed';

export type UserRole = 'member' | 'admin';

// ── Users ──

export interface User {
  id: string;
  name: string;
  email: string;
  department: string | null;
  role: UserRole;
  createdAt: Date;
}

// ── AI analysis ──

/** A catalog service matched against an idea. */
export interface MatchedService {
  name: string;
  description: string;
  category: string | null;
  matchScore: number;
}

/** Output of the service-matching engine for one idea text. */
export interface ServiceMatch {
  recommendation: ServiceRecommendation;
  confidence: number;
  reasoning: string;
  developmentImpact: DevelopmentImpact;
  matchingServices: MatchedService[];
}

/** Structured judgement returned by the categorization provider. */
export interface Categorization {
  category: string;
  priority: Priority;
  sentiment: Sentiment;
  tags: string[];
  confidence: number;
  /** Free-form rationale from the model, kept for transparency. */
  notes: string | null;
}

/** Combined outcome of one analysis run. */
export interface AnalysisOutcome {
  categorization: Categorization;
  match: ServiceMatch;
  notes: string;
}

// ── Document index ──

export type ChunkSourceType = 'service_catalog' | 'document';

export interface ChunkMetadata {
  filename: string;
  fileType: string;
  sourceType: ChunkSourceType;
  chunkIndex: number;
  totalChunks: number;
  timestamp: string;
  serviceName?: string;
  /** Catalog classification, e.g. `municipal_service`. */
  serviceType?: string;
  startDate?: string;
}

// ── Auxiliary entities ──

export const PROJECT_STATUSES = [
  'proposed',
  'planning',
  'in_progress',
  'on_hold',
  'completed',
  'cancelled',
] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const PROJECT_TYPES = [
  'internal',
  'vinnova',
  'eu_funded',
  'external_collaboration',
  'maintenance',
] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export const PROJECT_RELATIONSHIPS = ['implements', 'extends', 'inspires'] as const;
export type ProjectRelationship = (typeof PROJECT_RELATIONSHIPS)[number];

export const STRATEGY_DOCUMENT_TYPES = [
  'strategic_goal',
  'policy',
  'guideline',
  'vision',
  'action_plan',
  'budget_goal',
] as const;
export type StrategyDocumentType = (typeof STRATEGY_DOCUMENT_TYPES)[number];

export const FUNDING_SOURCES = [
  'vinnova',
  'eu_horizon',
  'eu_digital',
  'regional',
  'other',
] as const;
export type FundingSource = (typeof FUNDING_SOURCES)[number];

export const FUNDING_CALL_STATUSES = [
  'upcoming',
  'open',
  'closing_soon',
  'closed',
] as const;
export type FundingCallStatus = (typeof FUNDING_CALL_STATUSES)[number];
