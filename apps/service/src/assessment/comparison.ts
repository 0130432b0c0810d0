import {
  IncompleteAssessmentError,
  STAGE_IDS,
  rankViability,
  type AcquisitionDifficulty,
  type ComparisonCriterion,
  type ComparisonDimension,
  type ComparisonDimensionId,
  type Coordinates,
  type SiteAssessment,
  type SiteComparison,
  type SitePair,
  type SiteRecommendation,
  type StageId,
  type StageOutcome
} from '@siteline/core';

const DIFFICULTY_RANK: Readonly<Record<AcquisitionDifficulty, number>> = {
  low: 1,
  moderate: 2,
  high: 3
};

export const formatCoordinates = ({ latitude, longitude }: Coordinates): string =>
  `${latitude.toFixed(4)}, ${longitude.toFixed(4)}`;

export const formatCost = (amount: number): string =>
  amount.toLocaleString('en-US', { maximumFractionDigits: 2 });

export const formatBalance = (balance: number): string => (balance > 0 ? `+${balance}` : `${balance}`);

const describeOutcome = <TValue>(
  outcome: StageOutcome<TValue>,
  render: (value: TValue) => string
): string => (outcome.status === 'ok' ? render(outcome.value) : `unavailable (${outcome.error.message})`);

interface DimensionDefinition {
  readonly id: ComparisonDimensionId;
  readonly label: string;
  readonly render: (assessment: SiteAssessment) => string;
}

const DIMENSIONS: readonly DimensionDefinition[] = [
  {
    id: 'coordinates',
    label: 'Coordinates',
    render: ({ stages }) => describeOutcome(stages.geocode, formatCoordinates)
  },
  {
    id: 'viability',
    label: 'Viability',
    render: ({ stages }) => describeOutcome(stages.imagery, (imagery) => imagery.viability)
  },
  {
    id: 'images-analyzed',
    label: 'Images analyzed',
    render: ({ stages }) =>
      describeOutcome(stages.imagery, (imagery) => {
        const analyzed = imagery.images.filter((image) => image.status === 'analyzed').length;
        return `${analyzed}/${imagery.images.length}`;
      })
  },
  {
    id: 'sentiment-tally',
    label: 'Sentiment tally',
    render: ({ stages }) =>
      describeOutcome(stages.sentiment, ({ tally }) =>
        Object.entries(tally)
          .map(([label, count]) => `${label} ${count}`)
          .join(', ')
      )
  },
  {
    id: 'sentiment-balance',
    label: 'Sentiment balance',
    render: ({ stages }) => describeOutcome(stages.sentiment, ({ balance }) => formatBalance(balance))
  },
  {
    id: 'lawsuits',
    label: 'Lawsuits found',
    render: ({ stages }) => describeOutcome(stages.sentiment, ({ lawsuitsFound }) => (lawsuitsFound ? 'yes' : 'no'))
  },
  {
    id: 'ownership',
    label: 'Ownership',
    render: ({ stages }) => describeOutcome(stages.land, (land) => land.ownership)
  },
  {
    id: 'acquisition-difficulty',
    label: 'Acquisition difficulty',
    render: ({ stages }) => describeOutcome(stages.land, (land) => land.acquisitionDifficulty)
  },
  {
    id: 'key-findings',
    label: 'Key findings',
    render: ({ stages }) =>
      describeOutcome(stages.environmental, ({ keyFindings }) =>
        keyFindings.length > 0 ? keyFindings.join('; ') : 'none'
      )
  },
  {
    id: 'grid-distance',
    label: 'Grid distance (km)',
    render: ({ stages }) => describeOutcome(stages.grid, (grid) => `${grid.distance}`)
  },
  {
    id: 'grid-cost',
    label: 'Grid connection cost',
    render: ({ stages }) => describeOutcome(stages.grid, (grid) => formatCost(grid.estimatedCost))
  }
];

export interface DimensionValue {
  readonly id: ComparisonDimensionId;
  readonly label: string;
  readonly value: string;
}

export const describeAssessment = (assessment: SiteAssessment): readonly DimensionValue[] =>
  DIMENSIONS.map((dimension) => ({
    id: dimension.id,
    label: dimension.label,
    value: dimension.render(assessment)
  }));

const assertStagesPresent = (assessment: SiteAssessment): void => {
  for (const stageId of STAGE_IDS) {
    if (assessment.stages[stageId] === undefined) {
      throw new IncompleteAssessmentError(assessment.site, stageId, 'stage did not run');
    }
  }
};

const requireValue = <TValue>(site: string, stage: StageId, outcome: StageOutcome<TValue>): TValue => {
  if (outcome.status === 'failed') {
    throw new IncompleteAssessmentError(site, stage, outcome.error.message);
  }
  return outcome.value;
};

interface RecommendationInputs {
  readonly site: string;
  readonly viability: number;
  readonly viabilityLabel: string;
  readonly gridCost: number;
  readonly difficulty: number;
  readonly difficultyLabel: AcquisitionDifficulty;
  readonly balance: number;
  readonly lawsuitsFound: boolean;
}

const collectInputs = (assessment: SiteAssessment): RecommendationInputs => {
  const { site, stages } = assessment;
  requireValue(site, 'geocode', stages.geocode);
  const imagery = requireValue(site, 'imagery', stages.imagery);
  const sentiment = requireValue(site, 'sentiment', stages.sentiment);
  const land = requireValue(site, 'land', stages.land);
  const grid = requireValue(site, 'grid', stages.grid);

  return {
    site,
    viability: rankViability(imagery.viability),
    viabilityLabel: imagery.viability,
    gridCost: grid.estimatedCost,
    difficulty: DIFFICULTY_RANK[land.acquisitionDifficulty],
    difficultyLabel: land.acquisitionDifficulty,
    balance: sentiment.balance,
    lawsuitsFound: sentiment.lawsuitsFound
  };
};

interface Criterion {
  readonly id: ComparisonCriterion;
  /** Positive when the first site is preferred, negative for the second, zero on a tie. */
  readonly compare: (first: RecommendationInputs, second: RecommendationInputs) => number;
  readonly explain: (winner: RecommendationInputs, loser: RecommendationInputs) => string;
}

/** Evaluated in order; the first criterion that separates the sites decides. */
export const RECOMMENDATION_CRITERIA: readonly Criterion[] = [
  {
    id: 'viability',
    compare: (first, second) => first.viability - second.viability,
    explain: (winner, loser) =>
      `${winner.site} has ${winner.viabilityLabel} viability versus ${loser.viabilityLabel} at ${loser.site}.`
  },
  {
    id: 'grid-cost',
    compare: (first, second) => second.gridCost - first.gridCost,
    explain: (winner, loser) =>
      `${winner.site} connects to the grid for ${formatCost(winner.gridCost)} versus ${formatCost(loser.gridCost)} at ${loser.site}.`
  },
  {
    id: 'acquisition-difficulty',
    compare: (first, second) => second.difficulty - first.difficulty,
    explain: (winner, loser) =>
      `${winner.site} has ${winner.difficultyLabel} acquisition difficulty versus ${loser.difficultyLabel} at ${loser.site}.`
  },
  {
    id: 'sentiment-balance',
    compare: (first, second) => first.balance - second.balance,
    explain: (winner, loser) =>
      `${winner.site} has a sentiment balance of ${formatBalance(winner.balance)} versus ${formatBalance(loser.balance)} at ${loser.site}.`
  },
  {
    id: 'lawsuits',
    compare: (first, second) => Number(second.lawsuitsFound) - Number(first.lawsuitsFound),
    explain: (winner, loser) => `No lawsuits were found for ${winner.site}, unlike ${loser.site}.`
  }
];

export const recommendSite = (assessments: SitePair<SiteAssessment>): SiteRecommendation => {
  const first = collectInputs(assessments[0]);
  const second = collectInputs(assessments[1]);

  for (const criterion of RECOMMENDATION_CRITERIA) {
    const score = criterion.compare(first, second);
    if (score > 0) {
      return { site: first.site, index: 0, decidedBy: criterion.id, rationale: criterion.explain(first, second) };
    }
    if (score < 0) {
      return { site: second.site, index: 1, decidedBy: criterion.id, rationale: criterion.explain(second, first) };
    }
  }

  return {
    site: first.site,
    index: 0,
    decidedBy: 'tie',
    rationale: `${first.site} and ${second.site} tie on every criterion; ${first.site} is listed first.`
  };
};

export const buildComparison = (assessments: SitePair<SiteAssessment>): SiteComparison => {
  assessments.forEach(assertStagesPresent);
  const recommendation = recommendSite(assessments);

  const firstValues = describeAssessment(assessments[0]);
  const secondValues = describeAssessment(assessments[1]);
  const dimensions = firstValues.map((entry, index): ComparisonDimension => ({
    id: entry.id,
    label: entry.label,
    values: [entry.value, secondValues[index].value]
  }));

  const comparison: SiteComparison = {
    sites: [assessments[0].site, assessments[1].site],
    dimensions,
    recommendation
  };
  return Object.freeze(comparison);
};
