import type { SiteCollaborators } from '@siteline/collaborators';
import { CandidateSiteSchema, type CandidateSite, type Coordinates } from '@siteline/core';
import type { ComparisonRun, SiteAssessment } from '@siteline/core/assessment';
import { findSurveySite, loadSiteSurvey, type SiteSurvey } from '@siteline/fixtures';

import { assessSite, compareSites, type AssessmentOptions } from '../assessment/aggregator.js';
import type { ImageryOptions } from '../assessment/imagery.js';
import { renderComparisonRunReport, renderSiteReport } from '../assessment/report.js';
import type { SitelineLogger } from '../logger.js';

export interface SiteComparisonServiceOptions {
  readonly collaborators: SiteCollaborators;
  readonly survey?: SiteSurvey;
  readonly timeoutMs?: number;
  readonly imagery?: Omit<ImageryOptions, 'timeoutMs'>;
  readonly logger?: SitelineLogger;
}

export interface SiteRequest {
  readonly name: string;
  /** Falls back to the surveyed report for the site, then to an empty report. */
  readonly environmentalReport?: string;
}

export interface SiteSummary {
  readonly name: string;
  readonly coordinates: Coordinates;
  readonly imageCount: number;
  readonly hasEnvironmentalReport: boolean;
}

export interface AssessSiteResult {
  readonly assessment: SiteAssessment;
  readonly report: string;
}

export interface CompareSitesResult {
  readonly run: ComparisonRun;
  readonly report: string;
}

export class SiteComparisonService {
  private readonly survey: SiteSurvey;
  private readonly assessment: AssessmentOptions;

  constructor(options: SiteComparisonServiceOptions) {
    this.survey = options.survey ?? loadSiteSurvey();
    this.assessment = {
      collaborators: options.collaborators,
      timeoutMs: options.timeoutMs,
      imagery: options.imagery,
      logger: options.logger
    };
  }

  listSites(): SiteSummary[] {
    return this.survey.sites.map((site) => ({
      name: site.name,
      coordinates: { ...site.coordinates },
      imageCount: site.images.length,
      hasEnvironmentalReport: site.environmentalReport.trim().length > 0
    }));
  }

  resolveCandidate(request: SiteRequest): CandidateSite {
    const environmentalReport =
      request.environmentalReport ?? findSurveySite(request.name, this.survey)?.environmentalReport ?? '';
    return CandidateSiteSchema.parse({ name: request.name, environmentalReport });
  }

  async assess(request: SiteRequest): Promise<AssessSiteResult> {
    const assessment = await assessSite(this.resolveCandidate(request), this.assessment);
    return { assessment, report: renderSiteReport(assessment) };
  }

  async compare(first: SiteRequest, second: SiteRequest): Promise<CompareSitesResult> {
    const run = await compareSites([this.resolveCandidate(first), this.resolveCandidate(second)], this.assessment);
    return { run, report: renderComparisonRunReport(run) };
  }
}
