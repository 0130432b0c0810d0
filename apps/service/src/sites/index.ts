export { SiteComparisonService } from './service.js';
export type {
  AssessSiteResult,
  CompareSitesResult,
  SiteComparisonServiceOptions,
  SiteRequest,
  SiteSummary
} from './service.js';
export { createSiteCollaborators, createSiteComparisonService } from './setup.js';
export type { CreateSiteCollaboratorsOptions, CreateSiteComparisonServiceOptions } from './setup.js';
