import { describe, expect, it } from 'vitest';

import { IncompleteAssessmentError } from '@siteline/core';

import { makeAssessment } from './__fixtures__/sites.js';
import { buildComparison, describeAssessment, formatBalance, formatCost, recommendSite } from './comparison.js';

describe('recommendSite', () => {
  it('prefers higher viability before every other criterion', () => {
    const recommendation = recommendSite([
      makeAssessment('North', { viability: 'high', estimatedCost: 900000, lawsuitsFound: true }),
      makeAssessment('South', { viability: 'moderate', estimatedCost: 1000 })
    ]);

    expect(recommendation).toEqual({
      site: 'North',
      index: 0,
      decidedBy: 'viability',
      rationale: 'North has high viability versus moderate at South.'
    });
  });

  it('falls back to the cheaper grid connection', () => {
    const recommendation = recommendSite([
      makeAssessment('North', { estimatedCost: 90000 }),
      makeAssessment('South', { estimatedCost: 40000 })
    ]);

    expect(recommendation).toEqual({
      site: 'South',
      index: 1,
      decidedBy: 'grid-cost',
      rationale: 'South connects to the grid for 40,000 versus 90,000 at North.'
    });
  });

  it('then prefers the easier land acquisition', () => {
    const recommendation = recommendSite([
      makeAssessment('North', { acquisitionDifficulty: 'low' }),
      makeAssessment('South', { acquisitionDifficulty: 'high' })
    ]);

    expect(recommendation.site).toBe('North');
    expect(recommendation.decidedBy).toBe('acquisition-difficulty');
    expect(recommendation.rationale).toBe('North has low acquisition difficulty versus high at South.');
  });

  it('then prefers the better sentiment balance', () => {
    const recommendation = recommendSite([
      makeAssessment('North', { positive: 1, negative: 1 }),
      makeAssessment('South', { positive: 3, negative: 1 })
    ]);

    expect(recommendation.site).toBe('South');
    expect(recommendation.decidedBy).toBe('sentiment-balance');
    expect(recommendation.rationale).toBe('South has a sentiment balance of +2 versus 0 at North.');
  });

  it('then prefers the site without lawsuits', () => {
    const recommendation = recommendSite([
      makeAssessment('North', { lawsuitsFound: true }),
      makeAssessment('South', { lawsuitsFound: false })
    ]);

    expect(recommendation.site).toBe('South');
    expect(recommendation.decidedBy).toBe('lawsuits');
    expect(recommendation.rationale).toBe('No lawsuits were found for South, unlike North.');
  });

  it('recommends the first site when everything ties', () => {
    expect(recommendSite([makeAssessment('North'), makeAssessment('South')])).toEqual({
      site: 'North',
      index: 0,
      decidedBy: 'tie',
      rationale: 'North and South tie on every criterion; North is listed first.'
    });
  });
});

describe('buildComparison', () => {
  it('lays the dimensions out side by side', () => {
    const comparison = buildComparison([
      makeAssessment('North'),
      makeAssessment('South', { viability: 'moderate', positive: 0, negative: 2, lawsuitsFound: true })
    ]);

    expect(comparison.sites).toEqual(['North', 'South']);
    expect(comparison.dimensions.map((dimension) => [dimension.id, ...dimension.values])).toEqual([
      ['coordinates', '10.0000, 20.0000', '10.0000, 20.0000'],
      ['viability', 'high', 'moderate'],
      ['images-analyzed', '1/1', '1/1'],
      ['sentiment-tally', 'positive 1, neutral 0, negative 1', 'positive 0, neutral 0, negative 2'],
      ['sentiment-balance', '0', '-2'],
      ['lawsuits', 'no', 'yes'],
      ['ownership', 'private', 'private'],
      ['acquisition-difficulty', 'moderate', 'moderate'],
      ['key-findings', 'Low water usage', 'Low water usage'],
      ['grid-distance', '5', '5'],
      ['grid-cost', '50,000', '50,000']
    ]);
    expect(Object.isFrozen(comparison)).toBe(true);
  });

  it('raises IncompleteAssessment when a required stage failed', () => {
    const failed = makeAssessment('South', {
      stages: {
        grid: {
          status: 'failed',
          error: { code: 'CollaboratorTimeout', message: 'gridInfrastructure.nearestHub did not respond within 5ms.' }
        }
      }
    });

    expect(() => buildComparison([makeAssessment('North'), failed])).toThrow(IncompleteAssessmentError);
    expect(() => buildComparison([makeAssessment('North'), failed])).toThrow(
      'Assessment for South is missing grid: gridInfrastructure.nearestHub did not respond within 5ms.'
    );
  });

  it('names the geocode failure before the stages that depend on it', () => {
    const unresolved = makeAssessment('Nowhere', {
      stages: {
        geocode: { status: 'failed', error: { code: 'NotFound', message: 'Location "Nowhere" could not be resolved.' } },
        imagery: {
          status: 'failed',
          error: {
            code: 'InputUnavailable',
            message: 'Imagery assessor needs coordinates, but geocoding did not produce any.'
          }
        }
      }
    });

    expect(() => buildComparison([makeAssessment('North'), unresolved])).toThrow(
      'Assessment for Nowhere is missing geocode: Location "Nowhere" could not be resolved.'
    );
  });

  it('lists sentiment labels beyond the known three in the tally', () => {
    const comparison = buildComparison([
      makeAssessment('North'),
      makeAssessment('South', {
        stages: {
          sentiment: {
            status: 'ok',
            value: {
              posts: [],
              tally: { positive: 1, neutral: 0, negative: 1, mixed: 3 },
              balance: 0,
              lawsuitsFound: false
            }
          }
        }
      })
    ]);

    expect(comparison.dimensions.find((dimension) => dimension.id === 'sentiment-tally')?.values).toEqual([
      'positive 1, neutral 0, negative 1',
      'positive 1, neutral 0, negative 1, mixed 3'
    ]);
  });

  it('still compares when only the environmental stage failed', () => {
    const comparison = buildComparison([
      makeAssessment('North'),
      makeAssessment('South', {
        stages: {
          environmental: {
            status: 'failed',
            error: { code: 'InputUnavailable', message: 'No environmental report was supplied for South.' }
          }
        }
      })
    ]);

    expect(comparison.dimensions.find((dimension) => dimension.id === 'key-findings')?.values).toEqual([
      'Low water usage',
      'unavailable (No environmental report was supplied for South.)'
    ]);
    expect(comparison.recommendation.decidedBy).toBe('tie');
  });
});

describe('describeAssessment', () => {
  it('reports none when no key findings were extracted', () => {
    const values = describeAssessment(
      makeAssessment('North', { stages: { environmental: { status: 'ok', value: { keyFindings: [] } } } })
    );

    expect(values.find((value) => value.id === 'key-findings')?.value).toBe('none');
  });
});

describe('formatting helpers', () => {
  it('formats costs and balances', () => {
    expect(formatCost(1234567.891)).toBe('1,234,567.89');
    expect(formatBalance(3)).toBe('+3');
    expect(formatBalance(-1)).toBe('-1');
    expect(formatBalance(0)).toBe('0');
  });
});
