/**
 * Runs the AI analysis of one idea: categorization, then service matching,
 * then the human-readable notes that summarise both.
 */

import type {
  CategorizationInput,
  ICategorizationProvider,
} from '../providers/ICategorizationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AnalysisOutcome,
  Categorization,
  ServiceMatch,
  ServiceRecommendation,
} from '../types/models.js';
import type { ServiceMatcher } from './ServiceMatcher.js';

export class AnalysisService {
  constructor(
    private readonly categorizer: ICategorizationProvider,
    private readonly matcher: ServiceMatcher,
    private readonly logProvider: ILogProvider
  ) {}

  async analyze(input: CategorizationInput): Promise<AnalysisOutcome> {
    const categorization = await this.categorizer.analyze(input);
    const match = await this.matcher.match(input.title, input.description);

    this.logProvider.debug('Idea analysis complete', {
      category: categorization.category,
      priority: categorization.priority,
      recommendation: match.recommendation,
      serviceConfidence: match.confidence,
    });

    return {
      categorization,
      match,
      notes: buildAnalysisNotes(categorization, match),
    };
  }
}

export function buildAnalysisNotes(categorization: Categorization, match: ServiceMatch): string {
  const notes = [
    `Category: ${categorization.category}`,
    `Priority: ${categorization.priority}`,
    `Sentiment: ${categorization.sentiment}`,
  ];

  if (categorization.tags.length > 0) {
    notes.push(`Tags: ${categorization.tags.join(', ')}`);
  }

  notes.push(`Service need: ${serviceNeedText(match.recommendation)}`);
  notes.push(`AI confidence: ${Math.floor(categorization.confidence * 100)}%`);

  return notes.join(' | ');
}

function serviceNeedText(recommendation: ServiceRecommendation): string {
  switch (recommendation) {
    case 'existing_service':
      return 'Existing service can be used';
    case 'develop_existing':
      return 'Existing service can be developed';
    case 'new_service':
      return 'New service needed';
    default: {
      const unreachable: never = recommendation;
      throw new Error(`Unknown recommendation: ${String(unreachable)}`);
    }
  }
}
