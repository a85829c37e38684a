/**
 * Mock categorization provider. Returns a fixed categorization (overridable
 * per test) and records every input it was asked about.
 */

import type {
  CategorizationInput,
  ICategorizationProvider,
} from '../../src/providers/ICategorizationProvider.js';
import type { Categorization } from '../../src/types/models.js';

export const DEFAULT_CATEGORIZATION: Categorization = {
  category: 'Digital transformation',
  priority: 'high',
  sentiment: 'positive',
  tags: ['digital', 'e-service'],
  confidence: 0.75,
  notes: null,
};

export class MockCategorizationProvider implements ICategorizationProvider {
  public calls: CategorizationInput[] = [];
  public result: Categorization = { ...DEFAULT_CATEGORIZATION };
  /** When set, every call rejects with this error. */
  public failWith: Error | null = null;

  async analyze(input: CategorizationInput): Promise<Categorization> {
    this.calls.push(input);
    if (this.failWith) throw this.failWith;
    return { ...this.result, tags: [...this.result.tags] };
  }
}
