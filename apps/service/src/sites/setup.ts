import { createSurveyCollaborators, type RecordedCollaborators } from '@siteline/collaborators';
import type { SiteSurvey } from '@siteline/fixtures';

import { loadConfig, type SitelineConfig } from '../config.js';
import { createLogger, type SitelineLogger } from '../logger.js';
import { imageryAnalystAgent } from '../mastra/agents/imagery-analyst-agent.js';
import { reportAnalystAgent } from '../mastra/agents/report-analyst-agent.js';
import {
  createAgentImageClassifier,
  createAgentReportAnalysis,
  respondWith
} from '../mastra/services/agent-collaborators.js';
import { SiteComparisonService } from './service.js';

export interface CreateSiteCollaboratorsOptions {
  readonly survey?: SiteSurvey;
}

/**
 * Survey-backed collaborators, with image classification and report analysis
 * handed to the analyst agents when the configuration asks for them.
 */
export const createSiteCollaborators = (
  config: SitelineConfig,
  options: CreateSiteCollaboratorsOptions = {}
): RecordedCollaborators => {
  const survey = createSurveyCollaborators({ survey: options.survey });
  if (config.collaboratorMode === 'fixture') {
    return survey;
  }

  return {
    ...survey,
    imageClassifier: createAgentImageClassifier(respondWith(imageryAnalystAgent)),
    reportAnalysis: createAgentReportAnalysis(respondWith(reportAnalystAgent))
  };
};

export interface CreateSiteComparisonServiceOptions {
  readonly config?: SitelineConfig;
  readonly survey?: SiteSurvey;
  readonly logger?: SitelineLogger;
}

export const createSiteComparisonService = (
  options: CreateSiteComparisonServiceOptions = {}
): SiteComparisonService => {
  const config = options.config ?? loadConfig();
  return new SiteComparisonService({
    collaborators: createSiteCollaborators(config, { survey: options.survey }),
    survey: options.survey,
    timeoutMs: config.stageTimeoutMs,
    logger: options.logger ?? createLogger({ level: config.logLevel })
  });
};
