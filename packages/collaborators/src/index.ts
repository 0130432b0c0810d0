import {
  ClassificationError,
  NotFoundError,
  type Coordinates,
  type GridConnection,
  type LandRecord,
  type SocialPost
} from '@siteline/core';
import { loadSiteSurvey, type SiteSurvey, type SurveySite } from '@siteline/fixtures';

import type { RecordedCollaborators, ToolUsageEntry } from './types.js';

export type * from './types.js';

const cloneInput = (input: unknown): unknown => {
  if (input === undefined || input === null) {
    return input;
  }

  try {
    return JSON.parse(JSON.stringify(input));
  } catch {
    return input;
  }
};

export const createUsageRecorder = (now: () => number = Date.now) => {
  const entries: ToolUsageEntry[] = [];
  let counter = 0;

  const record = (tool: string, input: unknown) => {
    counter += 1;
    entries.push({
      id: `${tool}#${counter}`,
      tool,
      input: cloneInput(input),
      timestamp: now()
    });
  };

  const getUsageLog = (): readonly ToolUsageEntry[] => entries.map((entry) => ({ ...entry }));

  const resetUsageLog = () => {
    entries.length = 0;
    counter = 0;
  };

  return { record, getUsageLog, resetUsageLog };
};

const normalizeName = (value: string): string => value.trim().toLowerCase();

const COORDINATE_TOLERANCE = 1e-6;

const sameCoordinates = (left: Coordinates, latitude: number, longitude: number): boolean =>
  Math.abs(left.latitude - latitude) <= COORDINATE_TOLERANCE &&
  Math.abs(left.longitude - longitude) <= COORDINATE_TOLERANCE;

const splitSentences = (text: string): string[] =>
  text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim().replace(/[.!?]+$/, ''))
    .filter((sentence) => sentence.length > 0);

export interface SurveyCollaboratorOptions {
  readonly survey?: SiteSurvey;
  readonly now?: () => number;
}

/**
 * Deterministic collaborators answering from a site survey. Location lookups
 * are case-insensitive; coordinate lookups match a surveyed site within a
 * micro-degree. Coordinates outside the survey yield no images, `unknown`
 * ownership and a rejected grid lookup.
 */
export const createSurveyCollaborators = (
  options: SurveyCollaboratorOptions = {}
): RecordedCollaborators => {
  const survey = options.survey ?? loadSiteSurvey();
  const usage = createUsageRecorder(options.now);

  const byName = new Map(survey.sites.map((site) => [normalizeName(site.name), site]));
  const imageLookup = new Map(
    survey.sites.flatMap((site) => site.images.map((image) => [image.ref, image] as const))
  );
  const reportLookup = new Map(
    survey.sites.map((site) => [site.environmentalReport.trim(), site.keyFindings] as const)
  );

  const findByCoordinates = (latitude: number, longitude: number): SurveySite | undefined =>
    survey.sites.find((site) => sameCoordinates(site.coordinates, latitude, longitude));

  return {
    geocoder: {
      resolve(location: string): Promise<Coordinates> {
        usage.record('geocoder.resolve', { location });
        const site = byName.get(normalizeName(location));
        if (!site) {
          return Promise.reject(new NotFoundError(location));
        }
        return Promise.resolve({ ...site.coordinates });
      }
    },
    imageSource: {
      listImages(latitude: number, longitude: number): Promise<readonly string[]> {
        usage.record('imageSource.listImages', { latitude, longitude });
        const site = findByCoordinates(latitude, longitude);
        return Promise.resolve(site ? site.images.map((image) => image.ref) : []);
      }
    },
    imageClassifier: {
      classify(imageRef: string, prompt: string): Promise<string> {
        usage.record('imageClassifier.classify', { imageRef, prompt });
        const image = imageLookup.get(imageRef);
        if (!image) {
          return Promise.reject(new ClassificationError(imageRef, `No survey analysis for ${imageRef}`));
        }
        if (image.failure !== undefined) {
          return Promise.reject(new ClassificationError(imageRef, image.failure));
        }
        return Promise.resolve(image.analysis ?? '');
      }
    },
    socialSearch: {
      search(location: string): Promise<readonly SocialPost[]> {
        usage.record('socialSearch.search', { location });
        const site = byName.get(normalizeName(location));
        return Promise.resolve(site ? site.posts.map((post) => ({ ...post })) : []);
      }
    },
    legalSearch: {
      hasLawsuits(location: string): Promise<boolean> {
        usage.record('legalSearch.hasLawsuits', { location });
        return Promise.resolve(byName.get(normalizeName(location))?.lawsuitsFound ?? false);
      }
    },
    landRegistry: {
      lookup(latitude: number, longitude: number): Promise<LandRecord> {
        usage.record('landRegistry.lookup', { latitude, longitude });
        const site = findByCoordinates(latitude, longitude);
        return Promise.resolve(
          site ? { ...site.land } : { ownership: 'unknown', acquisitionDifficulty: 'high' }
        );
      }
    },
    reportAnalysis: {
      extractFindings(reportText: string): Promise<readonly string[]> {
        usage.record('reportAnalysis.extractFindings', { length: reportText.length });
        const known = reportLookup.get(reportText.trim());
        return Promise.resolve(known ? [...known] : splitSentences(reportText));
      }
    },
    gridInfrastructure: {
      nearestHub(latitude: number, longitude: number): Promise<GridConnection> {
        usage.record('gridInfrastructure.nearestHub', { latitude, longitude });
        const site = findByCoordinates(latitude, longitude);
        if (!site) {
          return Promise.reject(
            new Error(`No grid hub surveyed near ${latitude.toFixed(4)}, ${longitude.toFixed(4)}`)
          );
        }
        return Promise.resolve({ ...site.grid });
      }
    },
    getUsageLog: () => usage.getUsageLog(),
    resetUsageLog: () => usage.resetUsageLog()
  };
};
