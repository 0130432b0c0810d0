import { createStep, createWorkflow } from '@mastra/core/workflows';
import { CandidateSiteSchema } from '@siteline/core';
import type { SiteAssessment, SiteComparison } from '@siteline/core/assessment';
import { z } from 'zod';

import { assessSite, type AssessmentOptions } from '../../assessment/aggregator.js';
import { buildComparison } from '../../assessment/comparison.js';
import { renderComparisonRunReport } from '../../assessment/report.js';
import { loadConfig } from '../../config.js';
import { createLogger } from '../../logger.js';
import { createSiteCollaborators } from '../../sites/setup.js';

const assessmentSchema = z.custom<SiteAssessment>(
  (value) => typeof value === 'object' && value !== null && 'site' in value && 'stages' in value,
  { message: 'Expected a site assessment' }
);

const comparisonSchema = z.custom<SiteComparison>(
  (value) => typeof value === 'object' && value !== null && 'recommendation' in value,
  { message: 'Expected a site comparison' }
);

const workflowInputSchema = z.object({
  first: CandidateSiteSchema,
  second: CandidateSiteSchema
});

const firstAssessedSchema = z.object({
  first: assessmentSchema,
  second: CandidateSiteSchema
});

const bothAssessedSchema = z.object({
  assessments: z.tuple([assessmentSchema, assessmentSchema])
});

const comparedSchema = z.object({
  assessments: z.tuple([assessmentSchema, assessmentSchema]),
  comparison: comparisonSchema
});

const workflowOutputSchema = z.object({
  comparison: comparisonSchema,
  report: z.string()
});

/**
 * Builds the four-step comparison workflow. The second site is only assessed
 * after the first one has finished.
 */
export const createSiteComparisonWorkflow = (options: AssessmentOptions) => {
  const assessFirstSiteStep = createStep({
    id: 'assess-first-site',
    description: 'Run every assessment stage for the first candidate site.',
    inputSchema: workflowInputSchema,
    outputSchema: firstAssessedSchema,
    execute: async ({ inputData }) => ({
      first: await assessSite(inputData.first, options),
      second: inputData.second
    })
  });

  const assessSecondSiteStep = createStep({
    id: 'assess-second-site',
    description: 'Run every assessment stage for the second candidate site.',
    inputSchema: firstAssessedSchema,
    outputSchema: bothAssessedSchema,
    execute: async ({ inputData }) => {
      const assessments: [SiteAssessment, SiteAssessment] = [
        inputData.first,
        await assessSite(inputData.second, options)
      ];
      return { assessments };
    }
  });

  const compareSitesStep = createStep({
    id: 'compare-sites',
    description: 'Lay both assessments side by side and recommend one site.',
    inputSchema: bothAssessedSchema,
    outputSchema: comparedSchema,
    execute: async ({ inputData }) => ({
      assessments: inputData.assessments,
      comparison: buildComparison(inputData.assessments)
    })
  });

  const renderReportStep = createStep({
    id: 'render-report',
    description: 'Render the per-site reports and the comparison as Markdown.',
    inputSchema: comparedSchema,
    outputSchema: workflowOutputSchema,
    execute: async ({ inputData }) => ({
      comparison: inputData.comparison,
      report: renderComparisonRunReport(inputData)
    })
  });

  return createWorkflow({
    id: 'site-comparison-workflow',
    description: 'Assess two candidate wind-farm sites in turn, compare them and report a recommendation.',
    inputSchema: workflowInputSchema,
    outputSchema: workflowOutputSchema,
    steps: [assessFirstSiteStep, assessSecondSiteStep, compareSitesStep, renderReportStep]
  })
    .then(assessFirstSiteStep)
    .then(assessSecondSiteStep)
    .then(compareSitesStep)
    .then(renderReportStep)
    .commit();
};

const config = loadConfig();

export const siteComparisonWorkflow = createSiteComparisonWorkflow({
  collaborators: createSiteCollaborators(config),
  timeoutMs: config.stageTimeoutMs,
  logger: createLogger({ name: 'SitelineWorkflow', level: config.logLevel })
});
