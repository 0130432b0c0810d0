import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

import type { ToolUsageEntry } from '@siteline/collaborators';
import {
  AcquisitionDifficultySchema,
  CandidateSiteSchema,
  CoordinatesSchema,
  LocationNameSchema,
  OwnershipSchema,
  ViabilitySchema,
  type CandidateSite,
  type Coordinates,
  type StageId
} from '@siteline/core';

import { compareSites, type AssessmentOptions } from '../../assessment/aggregator.js';
import { renderComparisonRunReport } from '../../assessment/report.js';
import {
  environmentalStage,
  geocodeStage,
  gridStage,
  imageryStage,
  landStage,
  sentimentStage,
  type AssessmentStage
} from '../../assessment/stages.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS } from '../../assessment/timeout.js';
import { loadConfig } from '../../config.js';
import { createLogger } from '../../logger.js';
import { createSiteCollaborators } from '../../sites/setup.js';

const coordinatesInputSchema = CoordinatesSchema.describe(
  'Coordinates of the candidate site in decimal degrees, as returned by geocode_location.'
);

const imageryOutputSchema = z.object({
  viability: ViabilitySchema,
  analysis: z.string(),
  images: z.array(
    z.object({
      imageRef: z.string(),
      status: z.enum(['analyzed', 'failed']),
      text: z.string()
    })
  )
});

const sentimentOutputSchema = z.object({
  posts: z.array(z.object({ sentiment: z.string(), text: z.string() })),
  tally: z.object({ positive: z.number(), neutral: z.number(), negative: z.number() }).catchall(z.number()),
  balance: z.number(),
  lawsuitsFound: z.boolean()
});

const landOutputSchema = z.object({
  ownership: OwnershipSchema,
  acquisitionDifficulty: AcquisitionDifficultySchema
});

const gridOutputSchema = z.object({
  distance: z.number(),
  estimatedCost: z.number()
});

const comparisonOutputSchema = z.object({
  recommendation: z.object({
    site: z.string(),
    decidedBy: z.string(),
    rationale: z.string()
  }),
  report: z.string()
});

const UNNAMED_SITE = 'the requested site';

/**
 * Wraps the assessment stages as Mastra tools so an agent can drive the
 * pipeline one step at a time. Each tool applies the same timeouts and payload
 * validation as a full assessment run.
 */
export const createSiteTools = (options: AssessmentOptions) => {
  const runStage = <TStage extends StageId>(
    stage: AssessmentStage<TStage>,
    site: Partial<CandidateSite>,
    coordinates?: Coordinates
  ) =>
    stage.run({
      site: { name: site.name ?? UNNAMED_SITE, environmentalReport: site.environmentalReport ?? '' },
      coordinates,
      collaborators: options.collaborators,
      timeoutMs: options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS,
      imagery: options.imagery ?? {}
    });

  const geocodeLocationTool = createTool({
    id: 'geocode-location',
    description: 'Resolves a candidate site name to latitude and longitude.',
    inputSchema: z.object({
      location: LocationNameSchema.describe('Name of the candidate site, for example "Cedar Ridge".')
    }),
    outputSchema: CoordinatesSchema,
    async execute({ context }) {
      return runStage(geocodeStage, { name: context.location });
    }
  });

  const assessSiteImageryTool = createTool({
    id: 'assess-site-imagery',
    description:
      'Lists satellite images near the coordinates, classifies each one and rates wind-farm viability as high, moderate or low.',
    inputSchema: coordinatesInputSchema,
    outputSchema: imageryOutputSchema,
    async execute({ context }) {
      const result = await runStage(imageryStage, {}, context);
      return {
        ...result,
        images: result.images.map((image) => ({ ...image }))
      };
    }
  });

  const assessSiteSentimentTool = createTool({
    id: 'assess-site-sentiment',
    description: 'Tallies social media sentiment about a site and checks for related lawsuits.',
    inputSchema: z.object({
      location: LocationNameSchema.describe('Name of the candidate site.')
    }),
    outputSchema: sentimentOutputSchema,
    async execute({ context }) {
      const result = await runStage(sentimentStage, { name: context.location });
      return {
        ...result,
        posts: result.posts.map((post) => ({ ...post })),
        tally: { ...result.tally }
      };
    }
  });

  const lookupLandRecordTool = createTool({
    id: 'lookup-land-record',
    description: 'Looks up land ownership and how hard the parcel would be to acquire.',
    inputSchema: coordinatesInputSchema,
    outputSchema: landOutputSchema,
    async execute({ context }) {
      return runStage(landStage, {}, context);
    }
  });

  const extractReportFindingsTool = createTool({
    id: 'extract-report-findings',
    description: 'Extracts the key findings from an environmental impact report, in report order.',
    inputSchema: z.object({
      site: LocationNameSchema.optional().describe('Site the report belongs to.'),
      reportText: z.string().describe('Full text of the environmental report.')
    }),
    outputSchema: z.object({ keyFindings: z.array(z.string()) }),
    async execute({ context }) {
      const result = await runStage(environmentalStage, {
        name: context.site,
        environmentalReport: context.reportText
      });
      return { keyFindings: Array.from(result.keyFindings) };
    }
  });

  const findGridHubTool = createTool({
    id: 'find-grid-hub',
    description: 'Finds the nearest grid connection point and estimates the connection cost.',
    inputSchema: coordinatesInputSchema,
    outputSchema: gridOutputSchema,
    async execute({ context }) {
      return runStage(gridStage, {}, context);
    }
  });

  const compareSitesTool = createTool({
    id: 'compare-sites',
    description:
      'Runs the full assessment for two sites one after the other and recommends one of them with a rationale.',
    inputSchema: z.object({
      first: CandidateSiteSchema.describe('First candidate site and its environmental report.'),
      second: CandidateSiteSchema.describe('Second candidate site and its environmental report.')
    }),
    outputSchema: comparisonOutputSchema,
    async execute({ context }) {
      const run = await compareSites([context.first, context.second], options);
      const { recommendation } = run.comparison;
      return {
        recommendation: {
          site: recommendation.site,
          decidedBy: recommendation.decidedBy,
          rationale: recommendation.rationale
        },
        report: renderComparisonRunReport(run)
      };
    }
  });

  return {
    geocode_location: geocodeLocationTool,
    assess_site_imagery: assessSiteImageryTool,
    assess_site_sentiment: assessSiteSentimentTool,
    lookup_land_record: lookupLandRecordTool,
    extract_report_findings: extractReportFindingsTool,
    find_grid_hub: findGridHubTool,
    compare_sites: compareSitesTool
  };
};

const config = loadConfig();
const siteCollaborators = createSiteCollaborators(config);

export const siteTools = createSiteTools({
  collaborators: siteCollaborators,
  timeoutMs: config.stageTimeoutMs,
  logger: createLogger({ name: 'SitelineTools', level: config.logLevel })
});

export const resetSiteToolUsage = (): void => {
  siteCollaborators.resetUsageLog();
};

export const getSiteToolUsage = (): readonly ToolUsageEntry[] => siteCollaborators.getUsageLog();
