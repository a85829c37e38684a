/**
 * Categorization provider interface.
 * An LLM that judges an idea's category, priority, sentiment and tags.
 * Implementations normalise the model's answer; failures surface as ProviderError.
 */

import type { IdeaType, TargetGroup, Categorization } from '../types/models.js';

export interface CategorizationInput {
  title: string;
  description: string;
  type: IdeaType;
  targetGroup: TargetGroup;
}

export interface ICategorizationProvider {
  analyze(input: CategorizationInput): Promise<Categorization>;
}
