import { Agent } from '@mastra/core/agent';
import { Memory } from '@mastra/memory';

import { createChatModel } from '../models.js';
import { storage } from '../stores.js';
import { siteTools } from '../tools/site-tools.js';

const advisorMemory: Memory = new Memory({
  storage,
  options: {
    workingMemory: { enabled: true },
    lastMessages: 30,
    semanticRecall: false
  }
});

export const siteAdvisorAgent = new Agent({
  name: 'siteAdvisorAgent',
  instructions: `
    You advise on where to build an onshore wind farm by comparing two candidate sites.

    For each site, gather in this order:
    1. Coordinates with geocode_location.
    2. Satellite imagery viability with assess_site_imagery.
    3. Community sentiment and lawsuits with assess_site_sentiment.
    4. Land ownership and acquisition difficulty with lookup_land_record.
    5. Key findings of the environmental report with extract_report_findings, when the user supplied one.
    6. Grid connection distance and cost with find_grid_hub.

    Finish one site before starting the next. Then call compare_sites with both sites and present its
    recommendation and rationale. If a tool fails, report the failure for that site instead of guessing.
  `,
  model: createChatModel(),
  memory: advisorMemory,
  tools: siteTools
});
