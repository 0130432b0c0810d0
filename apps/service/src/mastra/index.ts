import { Mastra } from '@mastra/core/mastra';

import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { imageryAnalystAgent } from './agents/imagery-analyst-agent.js';
import { reportAnalystAgent } from './agents/report-analyst-agent.js';
import { siteAdvisorAgent } from './agents/site-advisor-agent.js';
import { storage } from './stores.js';
import { siteComparisonWorkflow } from './workflows/site-comparison-workflow.js';

const config = loadConfig();

export const mastra = new Mastra({
  agents: {
    imageryAnalystAgent,
    reportAnalystAgent,
    siteAdvisorAgent
  },
  workflows: {
    siteComparisonWorkflow
  },
  storage,
  telemetry: {
    enabled: false,
    disableLocalExport: true
  },
  logger: createLogger({ name: 'SitelineMastra', level: config.logLevel })
} satisfies ConstructorParameters<typeof Mastra>[0]);

export type SitelineMastra = typeof mastra;
export default mastra;
