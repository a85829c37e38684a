/**
 * Service-matching engine.
 * Embeds an idea, looks up the nearest service-catalog chunks and turns the
 * best similarity into a recommendation:
 *
 *   top >= existingThreshold          → existing_service (impact low)
 *   developThreshold <= top < existing → develop_existing (impact medium)
 *   top < developThreshold            → new_service      (impact high)
 *
 * Single attempt; a provider failure propagates as ProviderError.
 */

import type { IDocumentIndex, ScoredChunk } from '../repositories/IDocumentIndex.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type {
  DevelopmentImpact,
  MatchedService,
  ServiceMatch,
  ServiceRecommendation,
} from '../types/models.js';
import { DEFAULT_MATCHING, type MatchingConfig } from '../config.js';

const DESCRIPTION_PREVIEW = 200;

/** The text embedded for an idea. */
export function ideaText(title: string, description: string): string {
  return `${title}. ${description}`;
}

export function impactFor(recommendation: ServiceRecommendation): DevelopmentImpact {
  switch (recommendation) {
    case 'existing_service':
      return 'low';
    case 'develop_existing':
      return 'medium';
    case 'new_service':
      return 'high';
    default: {
      const unreachable: never = recommendation;
      throw new Error(`Unknown recommendation: ${String(unreachable)}`);
    }
  }
}

export class ServiceMatcher {
  constructor(
    private readonly index: IDocumentIndex,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly config: MatchingConfig = DEFAULT_MATCHING
  ) {}

  async match(title: string, description: string): Promise<ServiceMatch> {
    return this.matchText(ideaText(title, description));
  }

  async matchText(text: string): Promise<ServiceMatch> {
    const embedding = await this.embeddingProvider.generate(text);
    const hits = await this.index.query(embedding, {
      k: this.config.topK,
      sourceType: 'service_catalog',
    });

    const services = aggregateByService(hits);

    if (services.length === 0) {
      return {
        recommendation: 'new_service',
        confidence: 0,
        reasoning: 'No services available for matching - a new service is likely needed.',
        developmentImpact: 'high',
        matchingServices: [],
      };
    }

    const best = services[0];
    const recommendation = this.recommend(best.matchScore);

    return {
      recommendation,
      confidence: best.matchScore,
      reasoning: reasoningFor(recommendation, best),
      developmentImpact: impactFor(recommendation),
      matchingServices: services.slice(0, this.config.maxServices),
    };
  }

  recommend(score: number): ServiceRecommendation {
    if (score >= this.config.existingThreshold) return 'existing_service';
    if (score >= this.config.developThreshold) return 'develop_existing';
    return 'new_service';
  }
}

/**
 * One entry per service, keeping its best chunk. Sorted by score descending;
 * Array.prototype.sort is stable, so equal scores keep index order.
 */
export function aggregateByService(hits: ScoredChunk[]): MatchedService[] {
  const byName = new Map<string, MatchedService>();

  for (const hit of hits) {
    const name = hit.metadata.serviceName ?? hit.metadata.filename;
    const score = clamp01(hit.score);
    const existing = byName.get(name);

    if (!existing) {
      byName.set(name, {
        name,
        description: hit.content.slice(0, DESCRIPTION_PREVIEW),
        category: hit.metadata.serviceType ?? null,
        matchScore: score,
      });
    } else if (score > existing.matchScore) {
      existing.matchScore = score;
      existing.description = hit.content.slice(0, DESCRIPTION_PREVIEW);
    }
  }

  return [...byName.values()].sort((a, b) => b.matchScore - a.matchScore);
}

function reasoningFor(recommendation: ServiceRecommendation, best: MatchedService): string {
  const pct = Math.floor(best.matchScore * 100);
  switch (recommendation) {
    case 'existing_service':
      return `Strong match (${pct}%) with existing service: ${best.name}`;
    case 'develop_existing':
      return `Moderate match (${pct}%) - existing service can be developed: ${best.name}`;
    case 'new_service':
      return `Weak match (${pct}%) - a new service is likely needed.`;
    default: {
      const unreachable: never = recommendation;
      throw new Error(`Unknown recommendation: ${String(unreachable)}`);
    }
  }
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
