import { Agent } from '@mastra/core/agent';

import { createChatModel } from '../models.js';

export const imageryAnalystAgent = new Agent({
  name: 'imageryAnalystAgent',
  instructions: `
    You review satellite images of candidate onshore wind-farm sites.

    For each image describe terrain, vegetation, existing infrastructure and likely environmental impact.
    Say plainly whether the terrain is suitable, and mention any moderate concerns you see.
    Answer in two or three sentences of plain text.
  `,
  model: createChatModel()
});
