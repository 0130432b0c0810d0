import type { Coordinates, GridConnection, LandRecord, SocialPost } from '@siteline/core';

export interface GeocodingCollaborator {
  resolve(location: string): Promise<Coordinates>;
}

export interface ImageSourceCollaborator {
  listImages(latitude: number, longitude: number): Promise<readonly string[]>;
}

/** Collaborators that call a model may stop work once `signal` aborts. */
export interface ImageClassificationCollaborator {
  classify(imageRef: string, prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface SocialSearchCollaborator {
  search(location: string): Promise<readonly SocialPost[]>;
}

export interface LegalSearchCollaborator {
  hasLawsuits(location: string): Promise<boolean>;
}

export interface LandRegistryCollaborator {
  lookup(latitude: number, longitude: number): Promise<LandRecord>;
}

export interface ReportAnalysisCollaborator {
  extractFindings(reportText: string, signal?: AbortSignal): Promise<readonly string[]>;
}

export interface GridInfrastructureCollaborator {
  nearestHub(latitude: number, longitude: number): Promise<GridConnection>;
}

export interface SiteCollaborators {
  readonly geocoder: GeocodingCollaborator;
  readonly imageSource: ImageSourceCollaborator;
  readonly imageClassifier: ImageClassificationCollaborator;
  readonly socialSearch: SocialSearchCollaborator;
  readonly legalSearch: LegalSearchCollaborator;
  readonly landRegistry: LandRegistryCollaborator;
  readonly reportAnalysis: ReportAnalysisCollaborator;
  readonly gridInfrastructure: GridInfrastructureCollaborator;
}

export interface ToolUsageEntry<TInput = unknown> {
  readonly id: string;
  readonly tool: string;
  readonly input: TInput;
  readonly timestamp: number;
}

export interface RecordedCollaborators extends SiteCollaborators {
  readonly getUsageLog: () => readonly ToolUsageEntry[];
  readonly resetUsageLog: () => void;
}
