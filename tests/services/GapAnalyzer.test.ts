import { describe, it, expect } from 'vitest';
import { GapAnalyzer } from '../../src/services/GapAnalyzer.js';
import { analyzedIdea, ideaRow, matched } from '../mocks/fixtures.js';

describe('GapAnalyzer', () => {
  const analyzer = new GapAnalyzer();

  it('should return an empty report when nothing is analyzed', () => {
    const report = analyzer.analyze([ideaRow({ id: 'pending' })]);

    expect(report).toEqual({
      totalIdeasAnalyzed: 0,
      overview: { existing_service: 0, develop_existing: 0, new_service: 0 },
      topMatchedServices: [],
      developmentNeeds: [],
      gaps: [],
      aiConfidenceAvg: 0,
      serviceConfidenceAvg: 0,
    });
  });

  it('should ignore failed and pending ideas', () => {
    const report = analyzer.analyze([
      analyzedIdea('a'),
      ideaRow({ id: 'b', analysis_status: 'failed' }),
      ideaRow({ id: 'c' }),
    ]);

    expect(report.totalIdeasAnalyzed).toBe(1);
  });

  it('should count recommendations in the overview', () => {
    const report = analyzer.analyze([
      analyzedIdea('a'),
      analyzedIdea('b', { service_recommendation: 'develop_existing' }),
      analyzedIdea('c', { service_recommendation: 'new_service' }),
      analyzedIdea('d', { service_recommendation: 'new_service' }),
    ]);

    expect(report.overview).toEqual({
      existing_service: 1,
      develop_existing: 1,
      new_service: 2,
    });
  });

  it('should average confidences over analyzed ideas', () => {
    const report = analyzer.analyze([
      analyzedIdea('a', { ai_confidence: 0.75, service_confidence: 0.75 }),
      analyzedIdea('b', { ai_confidence: 0.25, service_confidence: 0.25 }),
    ]);

    expect(report.aiConfidenceAvg).toBe(0.5);
    expect(report.serviceConfidenceAvg).toBe(0.5);
  });

  // ── Top matched services ──

  describe('topMatchedServices', () => {
    it('should rank services by the number of ideas matching them', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', { matching_services: [matched('Parking', 0.75), matched('Library', 0.5)] }),
        analyzedIdea('b', { matching_services: [matched('Parking', 0.25)] }),
      ]);

      expect(report.topMatchedServices).toEqual([
        {
          serviceName: 'Parking',
          category: 'municipal_service',
          ideaCount: 2,
          avgMatchScore: 0.5,
          sampleIdeas: [
            { id: 'a', title: 'Idea a' },
            { id: 'b', title: 'Idea b' },
          ],
        },
        {
          serviceName: 'Library',
          category: 'municipal_service',
          ideaCount: 1,
          avgMatchScore: 0.5,
          sampleIdeas: [{ id: 'a', title: 'Idea a' }],
        },
      ]);
    });

    it('should break ties by service name', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', { matching_services: [matched('Waste', 0.5), matched('Buses', 0.5)] }),
      ]);

      expect(report.topMatchedServices.map((s) => s.serviceName)).toEqual(['Buses', 'Waste']);
    });

    it('should count a service once per idea', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', { matching_services: [matched('Parking', 0.75), matched('Parking', 0.25)] }),
      ]);

      expect(report.topMatchedServices[0].ideaCount).toBe(1);
      expect(report.topMatchedServices[0].avgMatchScore).toBe(0.75);
    });

    it('should keep at most ten services and five samples', () => {
      const services = Array.from({ length: 12 }, (_, i) => matched(`Service ${i}`, 0.5));
      const ideas = Array.from({ length: 7 }, (_, i) =>
        analyzedIdea(`i${i}`, { matching_services: services })
      );

      const report = analyzer.analyze(ideas);

      expect(report.topMatchedServices).toHaveLength(10);
      expect(report.topMatchedServices[0].sampleIdeas).toHaveLength(5);
      expect(report.topMatchedServices[0].ideaCount).toBe(7);
    });
  });

  // ── Development needs ──

  describe('developmentNeeds', () => {
    it('should order by priority, then by impact', () => {
      const report = analyzer.analyze([
        analyzedIdea('low-prio', { priority: 'low', development_impact: 'high' }),
        analyzedIdea('high-low', { priority: 'high', development_impact: 'low' }),
        analyzedIdea('high-high', { priority: 'high', development_impact: 'high' }),
        analyzedIdea('medium', { priority: 'medium', development_impact: 'medium' }),
      ]);

      expect(report.developmentNeeds.map((n) => n.ideaId)).toEqual([
        'high-high',
        'high-low',
        'medium',
        'low-prio',
      ]);
    });

    it('should derive the impact from the recommendation when it is missing', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', {
          service_recommendation: 'develop_existing',
          development_impact: null,
          matching_services: [matched('Parking', 0.45)],
        }),
      ]);

      expect(report.developmentNeeds).toEqual([
        {
          ideaId: 'a',
          title: 'Idea a',
          priority: 'medium',
          recommendation: 'develop_existing',
          bestMatchScore: 0.45,
          developmentImpact: 'medium',
        },
      ]);
    });

    it('should use 0 as the best score of an idea without matches', () => {
      const report = analyzer.analyze([analyzedIdea('a')]);

      expect(report.developmentNeeds[0].bestMatchScore).toBe(0);
    });
  });

  // ── Gaps ──

  describe('gaps', () => {
    it('should group uncovered ideas by tag', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', { service_recommendation: 'new_service', tags: ['drones', 'health'] }),
        analyzedIdea('b', { service_recommendation: 'new_service', tags: ['drones'] }),
        analyzedIdea('c', { service_recommendation: 'new_service', tags: ['health'] }),
        analyzedIdea('d', { service_recommendation: 'new_service', tags: ['drones'] }),
      ]);

      expect(report.gaps).toEqual([
        {
          areaKeywords: ['drones'],
          ideaCount: 3,
          sampleIdeas: [
            { id: 'a', title: 'Idea a' },
            { id: 'b', title: 'Idea b' },
            { id: 'd', title: 'Idea d' },
          ],
        },
        {
          areaKeywords: ['health'],
          ideaCount: 2,
          sampleIdeas: [
            { id: 'a', title: 'Idea a' },
            { id: 'c', title: 'Idea c' },
          ],
        },
      ]);
    });

    it('should treat low service confidence as uncovered', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', { service_confidence: 0.25, tags: ['schools'] }),
        analyzedIdea('b', { service_confidence: 0.25, tags: ['schools'] }),
        analyzedIdea('c', { service_confidence: 0.75, tags: ['schools'] }),
      ]);

      expect(report.gaps).toEqual([
        {
          areaKeywords: ['schools'],
          ideaCount: 2,
          sampleIdeas: [
            { id: 'a', title: 'Idea a' },
            { id: 'b', title: 'Idea b' },
          ],
        },
      ]);
    });

    it('should fall back to the category, then to "uncategorized"', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', { service_recommendation: 'new_service', category: 'Environment' }),
        analyzedIdea('b', { service_recommendation: 'new_service', category: 'Environment' }),
        analyzedIdea('c', { service_recommendation: 'new_service' }),
        analyzedIdea('d', { service_recommendation: 'new_service' }),
      ]);

      expect(report.gaps.map((g) => g.areaKeywords)).toEqual([['Environment'], ['uncategorized']]);
    });

    it('should drop areas with a single idea', () => {
      const report = analyzer.analyze([
        analyzedIdea('a', { service_recommendation: 'new_service', tags: ['drones'] }),
      ]);

      expect(report.gaps).toEqual([]);
    });

    it('should honour the configured gap limit', () => {
      const limited = new GapAnalyzer({ lowConfidence: 0.3, limit: 1 });
      const ideas = ['a', 'b'].flatMap((tag) => [
        analyzedIdea(`${tag}1`, { service_recommendation: 'new_service', tags: [tag] }),
        analyzedIdea(`${tag}2`, { service_recommendation: 'new_service', tags: [tag] }),
      ]);

      expect(limited.analyze(ideas).gaps.map((g) => g.areaKeywords)).toEqual([['a']]);
    });
  });

  it('should give the same report for the same input', () => {
    const ideas = [
      analyzedIdea('a', { service_recommendation: 'new_service', tags: ['x'] }),
      analyzedIdea('b', { service_recommendation: 'new_service', tags: ['x'] }),
    ];

    expect(analyzer.analyze(ideas)).toEqual(analyzer.analyze(ideas));
  });
});
