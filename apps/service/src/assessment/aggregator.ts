import {
  IncompleteAssessmentError,
  STAGE_IDS,
  describeError,
  isSiteAssessmentError,
  type CandidateSite,
  type ComparisonRun,
  type SiteAssessment,
  type SitePair,
  type StageFailure,
  type StageId,
  type StageOutcome,
  type StageOutcomes,
  type StageValueMap
} from '@siteline/core';
import type { SiteCollaborators } from '@siteline/collaborators';

import { createLogger, type SitelineLogger } from '../logger.js';
import { buildComparison } from './comparison.js';
import type { ImageryOptions } from './imagery.js';
import {
  ASSESSMENT_STAGES,
  type AssessmentStage,
  type StageContext
} from './stages.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS } from './timeout.js';

export interface AssessmentOptions {
  readonly collaborators: SiteCollaborators;
  readonly timeoutMs?: number;
  readonly imagery?: Omit<ImageryOptions, 'timeoutMs'>;
  readonly logger?: SitelineLogger;
}

type PartialOutcomes = { -readonly [TStage in StageId]?: StageOutcome<StageValueMap[TStage]> };

export const toStageFailure = (error: unknown): StageFailure =>
  isSiteAssessmentError(error)
    ? { code: error.code, message: error.message }
    : { code: 'CollaboratorFailure', message: describeError(error) };

const executeStage = async <TStage extends StageId>(
  stage: AssessmentStage<TStage>,
  context: StageContext,
  logger: SitelineLogger
): Promise<StageOutcome<StageValueMap[TStage]>> => {
  logger.debug(`${stage.label} started`, { site: context.site.name, stage: stage.id });
  try {
    const value = await stage.run(context);
    logger.debug(`${stage.label} finished`, { site: context.site.name, stage: stage.id });
    return { status: 'ok', value };
  } catch (error) {
    const failure = toStageFailure(error);
    logger.warn(`${stage.label} failed for ${context.site.name}: ${failure.message}`, {
      site: context.site.name,
      stage: stage.id,
      code: failure.code
    });
    return { status: 'failed', error: failure };
  }
};

const recordStage = async <TStage extends StageId>(
  stage: AssessmentStage<TStage>,
  context: StageContext,
  outcomes: PartialOutcomes,
  logger: SitelineLogger
): Promise<void> => {
  outcomes[stage.id] = await executeStage(stage, context, logger);
};

const isComplete = (outcomes: PartialOutcomes): outcomes is StageOutcomes =>
  STAGE_IDS.every((stageId) => outcomes[stageId] !== undefined);

const resolvedCoordinates = (outcomes: PartialOutcomes): StageContext['coordinates'] => {
  const geocode = outcomes.geocode;
  return geocode && geocode.status === 'ok' ? geocode.value : undefined;
};

/**
 * Runs every stage for one site in order. A failing stage is recorded on the
 * assessment and the remaining stages still run with whatever inputs are left.
 */
export const assessSite = async (
  site: CandidateSite,
  options: AssessmentOptions
): Promise<SiteAssessment> => {
  const logger = options.logger ?? createLogger();
  const outcomes: PartialOutcomes = {};

  for (const stage of ASSESSMENT_STAGES) {
    const context: StageContext = {
      site,
      coordinates: resolvedCoordinates(outcomes),
      collaborators: options.collaborators,
      timeoutMs: options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS,
      imagery: options.imagery ?? {}
    };
    await recordStage(stage, context, outcomes, logger);
  }

  if (!isComplete(outcomes)) {
    const missing = STAGE_IDS.filter((stageId) => outcomes[stageId] === undefined);
    throw new IncompleteAssessmentError(site.name, missing.join(', '), 'stage did not run');
  }

  const failed = STAGE_IDS.filter((stageId) => outcomes[stageId].status === 'failed');
  logger.info(`Assessed ${site.name}`, { site: site.name, failedStages: failed });

  return Object.freeze({
    site: site.name,
    stages: Object.freeze({
      geocode: outcomes.geocode,
      imagery: outcomes.imagery,
      sentiment: outcomes.sentiment,
      land: outcomes.land,
      environmental: outcomes.environmental,
      grid: outcomes.grid
    })
  });
};

/**
 * Assesses both sites one after the other, then compares them. Fails with
 * IncompleteAssessment when a dimension the recommendation needs is missing.
 */
export const compareSites = async (
  sites: SitePair<CandidateSite>,
  options: AssessmentOptions
): Promise<ComparisonRun> => {
  const logger = options.logger ?? createLogger();
  const [first, second] = sites;

  const firstAssessment = await assessSite(first, { ...options, logger });
  const secondAssessment = await assessSite(second, { ...options, logger });
  const assessments: SitePair<SiteAssessment> = [firstAssessment, secondAssessment];

  const comparison = buildComparison(assessments);
  logger.info(`Recommended ${comparison.recommendation.site}`, {
    sites: comparison.sites,
    decidedBy: comparison.recommendation.decidedBy
  });

  return { assessments, comparison };
};
