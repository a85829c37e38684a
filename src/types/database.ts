/**
 * Database row types — mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type {
  AnalysisStatus,
  ChunkMetadata,
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

// ── Users ──

export interface UserRow {
  id: string;
  name: string;
  email: string;
  department: string | null;
  role: UserRole;
  api_key_hash: string;
  created_at: string;
}

// ── Ideas ──

export interface IdeaRow {
  id: string;
  title: string;
  description: string;
  type: IdeaType;
  target_group: TargetGroup;
  status: IdeaStatus;
  priority: Priority;
  category: string | null;
  tags: string[];
  vote_count: number;
  submitter_id: string;
  ai_sentiment: Sentiment | null;
  ai_confidence: number | null;
  ai_analysis_notes: string | null;
  service_recommendation: ServiceRecommendation | null;
  service_confidence: number | null;
  service_reasoning: string | null;
  matching_services: MatchedService[];
  development_impact: DevelopmentImpact | null;
  analysis_status: AnalysisStatus;
  analysis_error: string | null;
  analyzed_at: string | null;
  created_at: string;
  updated_at: string;
}

/** Columns the caller supplies when inserting an idea. */
export type NewIdeaRow = Pick<
  IdeaRow,
  'title' | 'description' | 'type' | 'target_group' | 'tags' | 'submitter_id'
>;

export interface VoteRow {
  idea_id: string;
  user_id: string;
  created_at: string;
}

export interface CommentRow {
  id: string;
  idea_id: string;
  author_id: string;
  content: string;
  created_at: string;
}

// ── Document index ──

export interface DocumentChunkRow {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  embedding: string; // pgvector serialized
  /** Insertion order; kept when a chunk is replaced. */
  seq: number;
  created_at: string;
}

export interface ScoredChunkRow {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  similarity: number;
}

// ── Projects ──

export interface ProjectRow {
  id: string;
  name: string;
  description: string;
  status: ProjectStatus;
  project_type: ProjectType;
  planned_start: string | null;
  planned_end: string | null;
  actual_start: string | null;
  actual_end: string | null;
  estimated_budget: number | null;
  funding_source: string | null;
  owner_department: string | null;
  contact_email: string | null;
  project_manager: string | null;
  created_at: string;
  updated_at: string;
}

export interface ProjectIdeaRow {
  project_id: string;
  idea_id: string;
  relationship_type: ProjectRelationship;
  notes: string | null;
  created_at: string;
}

// ── Strategy ──

export interface StrategyDocumentRow {
  id: string;
  title: string;
  description: string | null;
  document_type: StrategyDocumentType;
  source: string | null;
  external_id: string | null;
  external_url: string | null;
  content: string | null;
  parent_id: string | null;
  level: number;
  sort_order: number;
  responsible_department: string | null;
  responsible_person: string | null;
  time_period: string | null;
  valid_from: string | null;
  valid_to: string | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

// ── Funding ──

export interface FundingCallRow {
  id: string;
  title: string;
  description: string | null;
  source: FundingSource;
  status: FundingCallStatus;
  external_id: string | null;
  external_url: string | null;
  open_date: string | null;
  deadline: string | null;
  decision_date: string | null;
  total_budget: number | null;
  min_grant: number | null;
  max_grant: number | null;
  co_funding_requirement: number | null;
  eligible_applicants: string[];
  focus_areas: string[];
  created_at: string;
  updated_at: string;
}
