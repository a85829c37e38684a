/**
 * Coverage and gap report over analyzed ideas.
 * Pure function of the stored rows: the same ideas always give the same report.
 */

import type { IdeaRow } from '../types/database.js';
import type {
  DevelopmentNeed,
  GapReport,
  IdeaSummary,
  ServiceDemand,
  ServiceGap,
} from '../types/api.js';
import type { DevelopmentImpact, Priority, ServiceRecommendation } from '../types/models.js';
import { DEFAULT_GAPS, type GapConfig } from '../config.js';
import { impactFor } from './ServiceMatcher.js';

const TOP_SERVICES = 10;
const SERVICE_SAMPLES = 5;
const DEVELOPMENT_NEEDS = 50;
const GAP_SAMPLES = 3;
const MIN_GAP_IDEAS = 2;
const UNCATEGORIZED = 'uncategorized';

const PRIORITY_RANK: Record<Priority, number> = { high: 0, medium: 1, low: 2 };
const IMPACT_RANK: Record<DevelopmentImpact, number> = { high: 0, medium: 1, low: 2 };

type AnalyzedIdea = IdeaRow & { service_recommendation: ServiceRecommendation };

export class GapAnalyzer {
  constructor(private readonly config: GapConfig = DEFAULT_GAPS) {}

  analyze(ideas: IdeaRow[]): GapReport {
    const analyzed = ideas.filter(isAnalyzed);

    return {
      totalIdeasAnalyzed: analyzed.length,
      overview: this.overview(analyzed),
      topMatchedServices: this.topMatchedServices(analyzed),
      developmentNeeds: this.developmentNeeds(analyzed),
      gaps: this.gaps(analyzed),
      aiConfidenceAvg: mean(analyzed.map((i) => i.ai_confidence)),
      serviceConfidenceAvg: mean(analyzed.map((i) => i.service_confidence)),
    };
  }

  // ── Sections ──

  private overview(ideas: AnalyzedIdea[]): Record<ServiceRecommendation, number> {
    const counts: Record<ServiceRecommendation, number> = {
      existing_service: 0,
      develop_existing: 0,
      new_service: 0,
    };
    for (const idea of ideas) counts[idea.service_recommendation]++;
    return counts;
  }

  private topMatchedServices(ideas: AnalyzedIdea[]): ServiceDemand[] {
    const demand = new Map<string, ServiceDemand & { scoreSum: number }>();

    for (const idea of ideas) {
      const seen = new Set<string>();
      for (const service of idea.matching_services) {
        if (seen.has(service.name)) continue;
        seen.add(service.name);

        let entry = demand.get(service.name);
        if (!entry) {
          entry = {
            serviceName: service.name,
            category: service.category,
            ideaCount: 0,
            avgMatchScore: 0,
            sampleIdeas: [],
            scoreSum: 0,
          };
          demand.set(service.name, entry);
        }

        entry.ideaCount++;
        entry.scoreSum += service.matchScore;
        if (entry.sampleIdeas.length < SERVICE_SAMPLES) entry.sampleIdeas.push(summary(idea));
      }
    }

    return [...demand.values()]
      .sort((a, b) => b.ideaCount - a.ideaCount || compareText(a.serviceName, b.serviceName))
      .slice(0, TOP_SERVICES)
      .map(({ scoreSum, ...entry }) => ({ ...entry, avgMatchScore: scoreSum / entry.ideaCount }));
  }

  private developmentNeeds(ideas: AnalyzedIdea[]): DevelopmentNeed[] {
    return ideas
      .map((idea) => ({
        ideaId: idea.id,
        title: idea.title,
        priority: idea.priority,
        recommendation: idea.service_recommendation,
        bestMatchScore: idea.matching_services[0]?.matchScore ?? 0,
        developmentImpact: idea.development_impact ?? impactFor(idea.service_recommendation),
      }))
      .sort(
        (a, b) =>
          PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
          IMPACT_RANK[a.developmentImpact] - IMPACT_RANK[b.developmentImpact]
      )
      .slice(0, DEVELOPMENT_NEEDS);
  }

  /**
   * Areas where ideas found no good service: grouped by tag (or category for
   * untagged ideas); an idea with several tags counts towards each.
   */
  private gaps(ideas: AnalyzedIdea[]): ServiceGap[] {
    const groups = new Map<string, AnalyzedIdea[]>();

    for (const idea of ideas) {
      const uncovered =
        idea.service_recommendation === 'new_service' ||
        (idea.service_confidence ?? 0) < this.config.lowConfidence;
      if (!uncovered) continue;

      const keywords = idea.tags.length > 0 ? idea.tags : [idea.category ?? UNCATEGORIZED];
      for (const keyword of new Set(keywords)) {
        const group = groups.get(keyword) ?? [];
        group.push(idea);
        groups.set(keyword, group);
      }
    }

    return [...groups.entries()]
      .filter(([, group]) => group.length >= MIN_GAP_IDEAS)
      .sort(([ka, a], [kb, b]) => b.length - a.length || compareText(ka, kb))
      .slice(0, this.config.limit)
      .map(([keyword, group]) => ({
        areaKeywords: [keyword],
        ideaCount: group.length,
        sampleIdeas: group.slice(0, GAP_SAMPLES).map(summary),
      }));
  }
}

function isAnalyzed(idea: IdeaRow): idea is AnalyzedIdea {
  return idea.analysis_status === 'analyzed' && idea.service_recommendation !== null;
}

function summary(idea: IdeaRow): IdeaSummary {
  return { id: idea.id, title: idea.title };
}

function mean(values: Array<number | null>): number {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return 0;
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
