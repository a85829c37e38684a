/**
 * Row builders for tests that need fully-populated rows without going through
 * a service.
 */

import type { IdeaRow } from '../../src/types/database.js';
import type { MatchedService } from '../../src/types/models.js';

export function ideaRow(overrides: Partial<IdeaRow> = {}): IdeaRow {
  return {
    id: 'idea-x',
    title: 'Untitled idea',
    description: 'An idea used in tests',
    type: 'idea',
    target_group: 'citizens',
    status: 'new',
    priority: 'medium',
    category: null,
    tags: [],
    vote_count: 0,
    submitter_id: 'user-1',
    ai_sentiment: null,
    ai_confidence: null,
    ai_analysis_notes: null,
    service_recommendation: null,
    service_confidence: null,
    service_reasoning: null,
    matching_services: [],
    development_impact: null,
    analysis_status: 'pending',
    analysis_error: null,
    analyzed_at: null,
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/** An analyzed idea with the given recommendation and service matches. */
export function analyzedIdea(
  id: string,
  overrides: Partial<IdeaRow> = {}
): IdeaRow {
  return ideaRow({
    id,
    title: `Idea ${id}`,
    analysis_status: 'analyzed',
    service_recommendation: 'existing_service',
    service_confidence: 0.75,
    ai_confidence: 0.75,
    development_impact: 'low',
    analyzed_at: '2026-01-02T00:00:00.000Z',
    ...overrides,
  });
}

export function matched(name: string, matchScore: number): MatchedService {
  return { name, description: `Service: ${name}`, category: 'municipal_service', matchScore };
}
