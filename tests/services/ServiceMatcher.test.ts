import { describe, it, expect, beforeEach } from 'vitest';
import {
  ServiceMatcher,
  aggregateByService,
  ideaText,
  impactFor,
} from '../../src/services/ServiceMatcher.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockDocumentIndex } from '../mocks/MockDocumentIndex.js';
import { FixedScoreIndex, serviceHit } from '../mocks/FixedScoreIndex.js';
import { ProviderError } from '../../src/errors.js';
import type { ChunkMetadata } from '../../src/types/models.js';

describe('ServiceMatcher', () => {
  let embeddingProvider: MockEmbeddingProvider;

  beforeEach(() => {
    embeddingProvider = new MockEmbeddingProvider();
  });

  function matcherWith(...hits: ReturnType<typeof serviceHit>[]) {
    const index = new FixedScoreIndex(hits);
    return { index, matcher: new ServiceMatcher(index, embeddingProvider) };
  }

  // ── Recommendation thresholds ──

  describe('match', () => {
    it('should recommend the existing service on a strong match', async () => {
      const { matcher } = matcherWith(serviceHit('Parking permits', 0.75));

      const result = await matcher.match('Parking app', 'Pay for parking from the phone');

      expect(result.recommendation).toBe('existing_service');
      expect(result.confidence).toBe(0.75);
      expect(result.developmentImpact).toBe('low');
      expect(result.reasoning).toBe('Strong match (75%) with existing service: Parking permits');
    });

    it('should recommend developing a service on a moderate match', async () => {
      const { matcher } = matcherWith(serviceHit('Library loans', 0.45));

      const result = await matcher.match('E-books', 'Borrow e-books through the library');

      expect(result.recommendation).toBe('develop_existing');
      expect(result.developmentImpact).toBe('medium');
      expect(result.reasoning).toBe(
        'Moderate match (45%) - existing service can be developed: Library loans'
      );
    });

    it('should recommend a new service on a weak match', async () => {
      const { matcher } = matcherWith(serviceHit('Waste collection', 0.25));

      const result = await matcher.match('Drone deliveries', 'Deliver medicine by drone');

      expect(result.recommendation).toBe('new_service');
      expect(result.developmentImpact).toBe('high');
      expect(result.reasoning).toBe('Weak match (25%) - a new service is likely needed.');
    });

    it('should treat scores on a threshold as meeting it', () => {
      const { matcher } = matcherWith();

      expect(matcher.recommend(0.6)).toBe('existing_service');
      expect(matcher.recommend(0.3)).toBe('develop_existing');
      expect(matcher.recommend(0.29)).toBe('new_service');
    });

    it('should recommend a new service just below the develop threshold', async () => {
      const { matcher } = matcherWith(serviceHit('Waste collection', 0.2999));

      const result = await matcher.match('Drone deliveries', 'Deliver medicine by drone');

      expect(result.recommendation).toBe('new_service');
      expect(result.confidence).toBe(0.2999);
      expect(result.reasoning).toBe('Weak match (29%) - a new service is likely needed.');
    });

    it('should recommend developing a service just below the existing threshold', () => {
      const { matcher } = matcherWith();

      expect(matcher.recommend(0.5999)).toBe('develop_existing');
    });

    it('should recommend a new service when the catalog is empty', async () => {
      const { matcher } = matcherWith();

      const result = await matcher.match('Anything', 'Anything at all goes here');

      expect(result).toEqual({
        recommendation: 'new_service',
        confidence: 0,
        reasoning: 'No services available for matching - a new service is likely needed.',
        developmentImpact: 'high',
        matchingServices: [],
      });
    });

    it('should only query service catalog chunks', async () => {
      const { index, matcher } = matcherWith(serviceHit('Parking permits', 0.5));

      await matcher.match('Parking', 'Parking for residents');

      expect(index.lastQuery).toEqual({ k: 10, sourceType: 'service_catalog' });
    });

    it('should embed title and description together', async () => {
      const { matcher } = matcherWith();
      let embedded = '';
      embeddingProvider.generate = async (text: string) => {
        embedded = text;
        return [1];
      };

      await matcher.match('Parking app', 'Pay from the phone');

      expect(embedded).toBe('Parking app. Pay from the phone');
    });

    it('should cap the matching services at five', async () => {
      const { matcher } = matcherWith(
        serviceHit('A', 0.75),
        serviceHit('B', 0.7),
        serviceHit('C', 0.65),
        serviceHit('D', 0.5),
        serviceHit('E', 0.45),
        serviceHit('F', 0.25)
      );

      const result = await matcher.match('Title', 'Description text');

      expect(result.matchingServices.map((s) => s.name)).toEqual(['A', 'B', 'C', 'D', 'E']);
    });

    it('should respect custom thresholds', async () => {
      const index = new FixedScoreIndex([serviceHit('Parking permits', 0.5)]);
      const matcher = new ServiceMatcher(index, embeddingProvider, {
        topK: 3,
        maxServices: 2,
        existingThreshold: 0.45,
        developThreshold: 0.25,
      });

      const result = await matcher.match('Parking', 'Parking for residents');

      expect(result.recommendation).toBe('existing_service');
      expect(index.lastQuery?.k).toBe(3);
    });

    it('should propagate provider failures', async () => {
      const { matcher } = matcherWith(serviceHit('Parking permits', 0.75));
      embeddingProvider.failWith = new ProviderError('openai', 'unavailable', 'down');

      await expect(matcher.match('Parking', 'Parking for residents')).rejects.toThrow(
        ProviderError
      );
    });

    it('should find the closest catalog service by embedding similarity', async () => {
      const index = new MockDocumentIndex();
      const parking = serviceHit('Parking permits', 0, 'Service: Parking permits residents parking');
      const library = serviceHit('Library loans', 0, 'Service: Library loans books borrow');
      await index.upsert([
        {
          ...parking,
          embedding: embeddingProvider.textToVector(parking.content),
        },
        {
          ...library,
          embedding: embeddingProvider.textToVector(library.content),
        },
      ]);

      const result = await new ServiceMatcher(index, embeddingProvider).matchText(
        'borrow library books'
      );

      expect(result.matchingServices[0].name).toBe('Library loans');
    });
  });

  // ── aggregateByService ──

  describe('aggregateByService', () => {
    it('should keep the best chunk per service', () => {
      const services = aggregateByService([
        serviceHit('Parking permits', 0.5, 'first chunk'),
        serviceHit('Library loans', 0.45),
        serviceHit('Parking permits', 0.75, 'better chunk'),
      ]);

      expect(services).toEqual([
        {
          name: 'Parking permits',
          description: 'better chunk',
          category: 'municipal_service',
          matchScore: 0.75,
        },
        {
          name: 'Library loans',
          description: 'Service: Library loans',
          category: 'municipal_service',
          matchScore: 0.45,
        },
      ]);
    });

    it('should keep index order for equal scores', () => {
      const services = aggregateByService([
        serviceHit('Second', 0.5),
        serviceHit('First', 0.5),
      ]);

      expect(services.map((s) => s.name)).toEqual(['Second', 'First']);
    });

    it('should clamp scores into [0, 1]', () => {
      const services = aggregateByService([
        serviceHit('Over', 1.5),
        serviceHit('Under', -0.25),
        serviceHit('Broken', Number.NaN),
      ]);

      expect(services.map((s) => s.matchScore)).toEqual([1, 0, 0]);
    });

    it('should fall back to the filename when a chunk has no service name', () => {
      const metadata: ChunkMetadata = {
        filename: 'catalog.html',
        fileType: 'html',
        sourceType: 'service_catalog',
        chunkIndex: 0,
        totalChunks: 1,
        timestamp: '2026-01-01T00:00:00.000Z',
      };

      const services = aggregateByService([
        { id: 'catalog.html#0', content: 'text', metadata, score: 0.5 },
      ]);

      expect(services).toEqual([
        { name: 'catalog.html', description: 'text', category: null, matchScore: 0.5 },
      ]);
    });

    it('should truncate descriptions to 200 characters', () => {
      const [service] = aggregateByService([serviceHit('Long', 0.5, 'x'.repeat(250))]);

      expect(service.description).toHaveLength(200);
    });
  });

  describe('helpers', () => {
    it('should map recommendations to impact', () => {
      expect(impactFor('existing_service')).toBe('low');
      expect(impactFor('develop_existing')).toBe('medium');
      expect(impactFor('new_service')).toBe('high');
    });

    it('should join title and description for embedding', () => {
      expect(ideaText('Title', 'Body')).toBe('Title. Body');
    });
  });
});
