import { openai } from '@ai-sdk/openai';

import { loadConfig } from '../config.js';

export const createChatModel = (modelId: string = loadConfig().openaiModel) => openai(modelId);
