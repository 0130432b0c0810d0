import { describe, expect, it } from 'vitest';

import { assessSentiment, sentimentBalance, tallySentiment } from './sentiment.js';

describe('tallySentiment', () => {
  it('counts every label, including absent ones', () => {
    const tally = tallySentiment([
      { sentiment: 'negative', text: 'noise' },
      { sentiment: 'positive', text: 'renewable' }
    ]);

    expect(tally).toEqual({ positive: 1, neutral: 0, negative: 1 });
    expect(sentimentBalance(tally)).toBe(0);
  });

  it('counts labels outside the known three without changing the balance', () => {
    const tally = tallySentiment([
      { sentiment: 'mixed', text: 'wind yes, pylons no' },
      { sentiment: 'positive', text: 'jobs' },
      { sentiment: 'mixed', text: 'depends on the road' }
    ]);

    expect(tally).toEqual({ positive: 1, neutral: 0, negative: 0, mixed: 2 });
    expect(sentimentBalance(tally)).toBe(1);
  });

  it('returns zero counts for no posts', () => {
    expect(tallySentiment([])).toEqual({ positive: 0, neutral: 0, negative: 0 });
  });
});

describe('assessSentiment', () => {
  it('keeps posts in order and reports lawsuits', async () => {
    const result = await assessSentiment('Site A', {
      socialSearch: {
        search: () =>
          Promise.resolve([
            { sentiment: 'negative', text: 'noise' },
            { sentiment: 'positive', text: 'renewable' },
            { sentiment: 'positive', text: 'jobs' }
          ])
      },
      legalSearch: { hasLawsuits: () => Promise.resolve(true) }
    });

    expect(result.posts.map((post) => post.text)).toEqual(['noise', 'renewable', 'jobs']);
    expect(result.tally).toEqual({ positive: 2, neutral: 0, negative: 1 });
    expect(result.balance).toBe(1);
    expect(result.lawsuitsFound).toBe(true);
  });

  it('passes posts with unfamiliar labels through unchanged', async () => {
    const posts = [
      { sentiment: 'Mixed ', text: 'wind yes, pylons no' },
      { sentiment: 'negative', text: 'noise' }
    ];

    const result = await assessSentiment('Site A', {
      socialSearch: { search: () => Promise.resolve(posts) },
      legalSearch: { hasLawsuits: () => Promise.resolve(false) }
    });

    expect(result.posts).toEqual(posts);
    expect(result.tally).toEqual({ positive: 0, neutral: 0, negative: 1, 'Mixed ': 1 });
    expect(result.balance).toBe(-1);
    expect(result.lawsuitsFound).toBe(false);
  });

  it('propagates search failures to the caller', async () => {
    await expect(
      assessSentiment('Site A', {
        socialSearch: { search: () => Promise.reject(new Error('rate limited')) },
        legalSearch: { hasLawsuits: () => Promise.resolve(false) }
      })
    ).rejects.toThrow('rate limited');
  });
});
