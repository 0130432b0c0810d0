import { Agent } from '@mastra/core/agent';

import { createChatModel } from '../models.js';

export const reportAnalystAgent = new Agent({
  name: 'reportAnalystAgent',
  instructions: `
    You read environmental impact reports for candidate wind-farm sites and pull out the key findings.
    Keep each finding short, factual and in the order it appears in the report.
    Reply with one finding per line, without commentary.
  `,
  model: createChatModel()
});
