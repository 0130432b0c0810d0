import {
  SocialPostListSchema,
  type KnownSentimentLabel,
  type SentimentAssessment,
  type SentimentTally,
  type SocialPost
} from '@siteline/core';
import type { SiteCollaborators } from '@siteline/collaborators';
import { z } from 'zod';

import { parseCollaboratorPayload } from './payload.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS, withTimeout } from './timeout.js';

export const tallySentiment = (posts: readonly SocialPost[]): SentimentTally => {
  const tally: Record<KnownSentimentLabel, number> & Record<string, number> = {
    positive: 0,
    neutral: 0,
    negative: 0
  };
  for (const post of posts) {
    tally[post.sentiment] = (tally[post.sentiment] ?? 0) + 1;
  }
  return tally;
};

export const sentimentBalance = (tally: SentimentTally): number => tally.positive - tally.negative;

export const assessSentiment = async (
  location: string,
  collaborators: Pick<SiteCollaborators, 'socialSearch' | 'legalSearch'>,
  options: { readonly timeoutMs?: number } = {}
): Promise<SentimentAssessment> => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;

  const searched = await withTimeout(() => collaborators.socialSearch.search(location), {
    operation: 'socialSearch.search',
    timeoutMs
  });
  const posts = parseCollaboratorPayload(SocialPostListSchema, searched, 'socialSearch.search');

  const lawsuits = await withTimeout(() => collaborators.legalSearch.hasLawsuits(location), {
    operation: 'legalSearch.hasLawsuits',
    timeoutMs
  });
  const lawsuitsFound = parseCollaboratorPayload(z.boolean(), lawsuits, 'legalSearch.hasLawsuits');

  const tally = tallySentiment(posts);
  return {
    posts,
    tally,
    balance: sentimentBalance(tally),
    lawsuitsFound
  };
};
