import { z } from 'zod';

import { DEFAULT_COLLABORATOR_TIMEOUT_MS } from './assessment/timeout.js';
import type { SitelineLogLevel } from './logger.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_DATABASE_URL = 'file:./siteline.db';

const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const optionalSetting = <TSchema extends z.ZodTypeAny>(schema: TSchema) => z.preprocess(blankAsUnset, schema);

const EnvironmentSchema = z.object({
  SITELINE_STAGE_TIMEOUT_MS: optionalSetting(
    z.coerce.number().int().nonnegative().default(DEFAULT_COLLABORATOR_TIMEOUT_MS)
  ),
  SITELINE_LOG_LEVEL: optionalSetting(z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  SITELINE_COLLABORATORS: optionalSetting(z.enum(['fixture', 'agent']).default('fixture')),
  SITELINE_HTTP_HOST: optionalSetting(z.string().trim().default('127.0.0.1')),
  SITELINE_HTTP_PORT: optionalSetting(z.coerce.number().int().min(0).max(65535).default(3000)),
  SITELINE_OPENAI_MODEL: optionalSetting(z.string().trim().default(DEFAULT_OPENAI_MODEL)),
  DATABASE_URL: optionalSetting(z.string().trim().default(DEFAULT_DATABASE_URL)),
  DATABASE_AUTH_TOKEN: optionalSetting(z.string().optional())
});

export type CollaboratorMode = 'fixture' | 'agent';

export interface SitelineConfig {
  readonly stageTimeoutMs: number;
  readonly logLevel: SitelineLogLevel;
  readonly collaboratorMode: CollaboratorMode;
  readonly httpHost: string;
  readonly httpPort: number;
  readonly openaiModel: string;
  readonly databaseUrl: string;
  readonly databaseAuthToken?: string;
}

/**
 * Reads configuration from the environment. Blank variables count as unset,
 * so the defaults apply. A timeout of 0 disables collaborator timeouts.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): SitelineConfig => {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const settings = parsed.data;
  return {
    stageTimeoutMs: settings.SITELINE_STAGE_TIMEOUT_MS,
    logLevel: settings.SITELINE_LOG_LEVEL,
    collaboratorMode: settings.SITELINE_COLLABORATORS,
    httpHost: settings.SITELINE_HTTP_HOST,
    httpPort: settings.SITELINE_HTTP_PORT,
    openaiModel: settings.SITELINE_OPENAI_MODEL,
    databaseUrl: settings.DATABASE_URL,
    databaseAuthToken: settings.DATABASE_AUTH_TOKEN
  };
};
