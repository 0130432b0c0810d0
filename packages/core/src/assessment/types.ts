import type { SiteAssessmentErrorCode } from '../errors.js';
import type {
  AcquisitionDifficulty,
  Coordinates,
  KnownSentimentLabel,
  Ownership,
  SocialPost,
  Viability
} from '../schemas.js';

export const STAGE_IDS = ['geocode', 'imagery', 'sentiment', 'land', 'environmental', 'grid'] as const;

export type StageId = (typeof STAGE_IDS)[number];

export interface StageFailure {
  readonly code: SiteAssessmentErrorCode;
  readonly message: string;
}

export type StageOutcome<TValue> =
  | { readonly status: 'ok'; readonly value: TValue }
  | { readonly status: 'failed'; readonly error: StageFailure };

export interface ImageAnalysis {
  readonly imageRef: string;
  readonly status: 'analyzed' | 'failed';
  readonly text: string;
}

export interface ImageryAssessment {
  readonly viability: Viability;
  readonly analysis: string;
  readonly images: readonly ImageAnalysis[];
}

/** Always carries the three known labels; other labels appear once seen. */
export type SentimentTally = Readonly<Record<KnownSentimentLabel, number> & Record<string, number>>;

export interface SentimentAssessment {
  readonly posts: readonly SocialPost[];
  readonly tally: SentimentTally;
  readonly balance: number;
  readonly lawsuitsFound: boolean;
}

export interface LandAssessment {
  readonly ownership: Ownership;
  readonly acquisitionDifficulty: AcquisitionDifficulty;
}

export interface EnvironmentalAssessment {
  readonly keyFindings: readonly string[];
}

export interface GridAssessment {
  readonly distance: number;
  readonly estimatedCost: number;
}

export interface StageValueMap {
  readonly geocode: Coordinates;
  readonly imagery: ImageryAssessment;
  readonly sentiment: SentimentAssessment;
  readonly land: LandAssessment;
  readonly environmental: EnvironmentalAssessment;
  readonly grid: GridAssessment;
}

export type StageOutcomes = {
  readonly [TStage in StageId]: StageOutcome<StageValueMap[TStage]>;
};

export interface SiteAssessment {
  readonly site: string;
  readonly stages: StageOutcomes;
}

export type ComparisonCriterion =
  | 'viability'
  | 'grid-cost'
  | 'acquisition-difficulty'
  | 'sentiment-balance'
  | 'lawsuits';

export type ComparisonDimensionId =
  | 'coordinates'
  | 'viability'
  | 'images-analyzed'
  | 'sentiment-tally'
  | 'sentiment-balance'
  | 'lawsuits'
  | 'ownership'
  | 'acquisition-difficulty'
  | 'key-findings'
  | 'grid-distance'
  | 'grid-cost';

export type SitePair<T> = readonly [T, T];

export interface ComparisonDimension {
  readonly id: ComparisonDimensionId;
  readonly label: string;
  readonly values: SitePair<string>;
}

export interface SiteRecommendation {
  readonly site: string;
  readonly index: 0 | 1;
  readonly decidedBy: ComparisonCriterion | 'tie';
  readonly rationale: string;
}

export interface SiteComparison {
  readonly sites: SitePair<string>;
  readonly dimensions: readonly ComparisonDimension[];
  readonly recommendation: SiteRecommendation;
}

export interface ComparisonRun {
  readonly assessments: SitePair<SiteAssessment>;
  readonly comparison: SiteComparison;
}
