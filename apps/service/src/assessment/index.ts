export { assessSite, compareSites, toStageFailure } from './aggregator.js';
export type { AssessmentOptions } from './aggregator.js';
export {
  RECOMMENDATION_CRITERIA,
  buildComparison,
  describeAssessment,
  formatBalance,
  formatCoordinates,
  formatCost,
  recommendSite
} from './comparison.js';
export type { DimensionValue } from './comparison.js';
export { IMAGERY_PROMPT, analyzeImages, assessImagery } from './imagery.js';
export type { ImageryOptions } from './imagery.js';
export { renderComparisonReport, renderComparisonRunReport, renderSiteReport } from './report.js';
export { assessSentiment, sentimentBalance, tallySentiment } from './sentiment.js';
export { ASSESSMENT_STAGES } from './stages.js';
export type { AnyAssessmentStage, AssessmentStage, StageContext } from './stages.js';
export { DEFAULT_COLLABORATOR_TIMEOUT_MS, withTimeout } from './timeout.js';
