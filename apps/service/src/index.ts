export * from './assessment/index.js';
export { createCli } from './cli/index.js';
export type { CreateCliOptions } from './cli/index.js';
export { DEFAULT_DATABASE_URL, DEFAULT_OPENAI_MODEL, loadConfig } from './config.js';
export type { CollaboratorMode, SitelineConfig } from './config.js';
export { createServer } from './http/server.js';
export type { CreateServerOptions } from './http/server.js';
export { createLogger } from './logger.js';
export type { CreateLoggerOptions, SitelineLogLevel, SitelineLogger } from './logger.js';
export * from './sites/index.js';
