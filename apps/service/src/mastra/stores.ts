import { LibSQLStore } from '@mastra/libsql';

import { loadConfig } from '../config.js';

const config = loadConfig();

export const storage = new LibSQLStore({
  url: config.databaseUrl,
  authToken: config.databaseAuthToken
});
