import {
  CoordinatesSchema,
  GridConnectionSchema,
  InputUnavailableError,
  KeyFindingsSchema,
  LandRecordSchema,
  type CandidateSite,
  type Coordinates,
  type StageId,
  type StageValueMap
} from '@siteline/core';
import type { SiteCollaborators } from '@siteline/collaborators';

import { assessImagery, type ImageryOptions } from './imagery.js';
import { parseCollaboratorPayload } from './payload.js';
import { assessSentiment } from './sentiment.js';
import { withTimeout } from './timeout.js';

export interface StageContext {
  readonly site: CandidateSite;
  readonly coordinates: Coordinates | undefined;
  readonly collaborators: SiteCollaborators;
  readonly timeoutMs: number;
  readonly imagery: Omit<ImageryOptions, 'timeoutMs'>;
}

export interface AssessmentStage<TStage extends StageId> {
  readonly id: TStage;
  readonly label: string;
  run(context: StageContext): Promise<StageValueMap[TStage]>;
}

export type AnyAssessmentStage = { [TStage in StageId]: AssessmentStage<TStage> }[StageId];

const requireCoordinates = (context: StageContext, label: string): Coordinates => {
  if (!context.coordinates) {
    throw new InputUnavailableError(`${label} needs coordinates, but geocoding did not produce any.`);
  }
  return context.coordinates;
};

export const geocodeStage: AssessmentStage<'geocode'> = {
  id: 'geocode',
  label: 'Geocoder',
  async run({ site, collaborators, timeoutMs }) {
    const operation = 'geocoder.resolve';
    const resolved = await withTimeout(() => collaborators.geocoder.resolve(site.name), {
      operation,
      timeoutMs
    });
    return parseCollaboratorPayload(CoordinatesSchema, resolved, operation);
  }
};

export const imageryStage: AssessmentStage<'imagery'> = {
  id: 'imagery',
  label: 'Imagery assessor',
  run(context) {
    const coordinates = requireCoordinates(context, 'Imagery assessor');
    return assessImagery(coordinates, context.collaborators, {
      ...context.imagery,
      timeoutMs: context.timeoutMs
    });
  }
};

export const sentimentStage: AssessmentStage<'sentiment'> = {
  id: 'sentiment',
  label: 'Sentiment assessor',
  run({ site, collaborators, timeoutMs }) {
    return assessSentiment(site.name, collaborators, { timeoutMs });
  }
};

export const landStage: AssessmentStage<'land'> = {
  id: 'land',
  label: 'Land assessor',
  async run(context) {
    const { latitude, longitude } = requireCoordinates(context, 'Land assessor');
    const operation = 'landRegistry.lookup';
    const record = await withTimeout(
      () => context.collaborators.landRegistry.lookup(latitude, longitude),
      { operation, timeoutMs: context.timeoutMs }
    );
    return parseCollaboratorPayload(LandRecordSchema, record, operation);
  }
};

export const environmentalStage: AssessmentStage<'environmental'> = {
  id: 'environmental',
  label: 'Environmental assessor',
  async run({ site, collaborators, timeoutMs }) {
    const report = site.environmentalReport.trim();
    if (report.length === 0) {
      throw new InputUnavailableError(`No environmental report was supplied for ${site.name}.`);
    }
    const operation = 'reportAnalysis.extractFindings';
    const findings = await withTimeout((signal) => collaborators.reportAnalysis.extractFindings(report, signal), {
      operation,
      timeoutMs
    });
    return { keyFindings: parseCollaboratorPayload(KeyFindingsSchema, findings, operation) };
  }
};

export const gridStage: AssessmentStage<'grid'> = {
  id: 'grid',
  label: 'Grid assessor',
  async run(context) {
    const { latitude, longitude } = requireCoordinates(context, 'Grid assessor');
    const operation = 'gridInfrastructure.nearestHub';
    const hub = await withTimeout(
      () => context.collaborators.gridInfrastructure.nearestHub(latitude, longitude),
      { operation, timeoutMs: context.timeoutMs }
    );
    return parseCollaboratorPayload(GridConnectionSchema, hub, operation);
  }
};

export const ASSESSMENT_STAGES: readonly AnyAssessmentStage[] = Object.freeze([
  geocodeStage,
  imageryStage,
  sentimentStage,
  landStage,
  environmentalStage,
  gridStage
]);
