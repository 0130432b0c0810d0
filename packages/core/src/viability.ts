import type { Viability } from './schemas.js';

export interface ViabilityKeywords {
  readonly high: readonly string[];
  readonly moderate: readonly string[];
}

export const DEFAULT_VIABILITY_KEYWORDS: ViabilityKeywords = Object.freeze({
  high: Object.freeze(['suitable', 'terrain']),
  moderate: Object.freeze(['some', 'moderate'])
});

const VIABILITY_RANK: Readonly<Record<Viability, number>> = {
  high: 3,
  moderate: 2,
  low: 1
};

const normalizeKeywords = (keywords: readonly string[]): string[] =>
  keywords.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0);

const containsAny = (haystack: string, keywords: readonly string[]): boolean =>
  normalizeKeywords(keywords).some((keyword) => haystack.includes(keyword));

/**
 * Classifies free text into a viability level. High keywords are checked first,
 * then moderate ones; anything else is `low`. Matching is case-insensitive and
 * works on substrings, so the order of the text does not matter.
 */
export const classifyViability = (
  text: string,
  keywords: ViabilityKeywords = DEFAULT_VIABILITY_KEYWORDS
): Viability => {
  const haystack = text.toLowerCase();
  if (containsAny(haystack, keywords.high)) {
    return 'high';
  }
  if (containsAny(haystack, keywords.moderate)) {
    return 'moderate';
  }
  return 'low';
};

export const rankViability = (viability: Viability): number => VIABILITY_RANK[viability];
