import {
  ClassificationError,
  NotFoundError,
  type CandidateSite,
  type Coordinates,
  type EnvironmentalAssessment,
  type GridAssessment,
  type GridConnection,
  type ImageryAssessment,
  type LandAssessment,
  type LandRecord,
  type SentimentAssessment,
  type SiteAssessment,
  type SocialPost,
  type StageOutcome,
  type StageOutcomes
} from '@siteline/core';
import type { SiteCollaborators } from '@siteline/collaborators';

export interface FakeImage {
  readonly ref: string;
  readonly text?: string;
  readonly error?: string;
}

export interface FakeSite {
  readonly coordinates: Coordinates;
  readonly images: readonly FakeImage[];
  readonly posts: readonly SocialPost[];
  readonly lawsuitsFound: boolean;
  readonly land: LandRecord;
  readonly findings: readonly string[];
  readonly grid: GridConnection;
}

export const SITE_A: FakeSite = {
  coordinates: { latitude: 10, longitude: 20 },
  images: [{ ref: 'img://site-a/1', text: 'Open plain with suitable terrain.' }],
  posts: [
    { sentiment: 'negative', text: 'noise' },
    { sentiment: 'positive', text: 'renewable' }
  ],
  lawsuitsFound: false,
  land: { ownership: 'private', acquisitionDifficulty: 'high' },
  findings: ['No endangered species'],
  grid: { distance: 5, estimatedCost: 50000 }
};

export const SITE_B: FakeSite = {
  coordinates: { latitude: 11, longitude: 21 },
  images: [{ ref: 'img://site-b/1', text: 'Coastal strip with some moderate concerns.' }],
  posts: [{ sentiment: 'neutral', text: 'meeting' }],
  lawsuitsFound: true,
  land: { ownership: 'public', acquisitionDifficulty: 'moderate' },
  findings: ['Wetlands nearby'],
  grid: { distance: 12, estimatedCost: 180000 }
};

export const DEFAULT_FAKE_SITES: Readonly<Record<string, FakeSite>> = {
  'Site A': SITE_A,
  'Site B': SITE_B
};

export const candidate = (name: string, environmentalReport = `${name} survey report.`): CandidateSite => ({
  name,
  environmentalReport
});

export interface FakeCollaborators {
  readonly collaborators: SiteCollaborators;
  readonly calls: readonly string[];
}

export const createFakeCollaborators = (
  sites: Readonly<Record<string, FakeSite>> = DEFAULT_FAKE_SITES,
  overrides: Partial<SiteCollaborators> = {}
): FakeCollaborators => {
  const calls: string[] = [];
  const entries = Object.values(sites);
  const atCoordinates = (latitude: number, longitude: number) =>
    entries.find(
      (site) => site.coordinates.latitude === latitude && site.coordinates.longitude === longitude
    );

  const collaborators: SiteCollaborators = {
    geocoder: {
      resolve(location) {
        calls.push('geocoder.resolve');
        const site = sites[location];
        return site ? Promise.resolve(site.coordinates) : Promise.reject(new NotFoundError(location));
      }
    },
    imageSource: {
      listImages(latitude, longitude) {
        calls.push('imageSource.listImages');
        return Promise.resolve(atCoordinates(latitude, longitude)?.images.map((image) => image.ref) ?? []);
      }
    },
    imageClassifier: {
      classify(imageRef) {
        calls.push('imageClassifier.classify');
        const image = entries.flatMap((site) => site.images).find((candidateImage) => candidateImage.ref === imageRef);
        if (!image || image.error !== undefined) {
          return Promise.reject(new ClassificationError(imageRef, image?.error ?? 'unknown image'));
        }
        return Promise.resolve(image.text ?? '');
      }
    },
    socialSearch: {
      search(location) {
        calls.push('socialSearch.search');
        return Promise.resolve(sites[location]?.posts ?? []);
      }
    },
    legalSearch: {
      hasLawsuits(location) {
        calls.push('legalSearch.hasLawsuits');
        return Promise.resolve(sites[location]?.lawsuitsFound ?? false);
      }
    },
    landRegistry: {
      lookup(latitude, longitude) {
        calls.push('landRegistry.lookup');
        const site = atCoordinates(latitude, longitude);
        return site ? Promise.resolve(site.land) : Promise.reject(new Error('parcel not registered'));
      }
    },
    reportAnalysis: {
      extractFindings(reportText) {
        calls.push('reportAnalysis.extractFindings');
        const site = Object.entries(sites).find(([name]) => reportText.startsWith(name))?.[1];
        return Promise.resolve(site?.findings ?? []);
      }
    },
    gridInfrastructure: {
      nearestHub(latitude, longitude) {
        calls.push('gridInfrastructure.nearestHub');
        const site = atCoordinates(latitude, longitude);
        return site ? Promise.resolve(site.grid) : Promise.reject(new Error('no hub in range'));
      }
    },
    ...overrides
  };

  return { collaborators, calls };
};

const ok = <TValue>(value: TValue): StageOutcome<TValue> => ({ status: 'ok', value });

export interface AssessmentOverrides {
  readonly viability?: ImageryAssessment['viability'];
  readonly estimatedCost?: number;
  readonly acquisitionDifficulty?: LandRecord['acquisitionDifficulty'];
  readonly positive?: number;
  readonly negative?: number;
  readonly lawsuitsFound?: boolean;
  readonly stages?: Partial<StageOutcomes>;
}

/** Builds a complete assessment directly, bypassing the stages. */
export const makeAssessment = (site: string, overrides: AssessmentOverrides = {}): SiteAssessment => {
  const positive = overrides.positive ?? 1;
  const negative = overrides.negative ?? 1;
  const stages: StageOutcomes = {
    geocode: ok<Coordinates>({ latitude: 10, longitude: 20 }),
    imagery: ok<ImageryAssessment>({
      viability: overrides.viability ?? 'high',
      analysis: 'suitable terrain',
      images: [{ imageRef: 'img://1', status: 'analyzed', text: 'suitable terrain' }]
    }),
    sentiment: ok<SentimentAssessment>({
      posts: [],
      tally: { positive, neutral: 0, negative },
      balance: positive - negative,
      lawsuitsFound: overrides.lawsuitsFound ?? false
    }),
    land: ok<LandAssessment>({ ownership: 'private', acquisitionDifficulty: overrides.acquisitionDifficulty ?? 'moderate' }),
    environmental: ok<EnvironmentalAssessment>({ keyFindings: ['Low water usage'] }),
    grid: ok<GridAssessment>({ distance: 5, estimatedCost: overrides.estimatedCost ?? 50000 }),
    ...overrides.stages
  };
  return { site, stages };
};
