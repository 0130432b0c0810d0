import { PinoLogger } from '@mastra/loggers';
import type { IMastraLogger } from '@mastra/core/logger';

export type SitelineLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SitelineLogger = Pick<IMastraLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface CreateLoggerOptions {
  readonly name?: string;
  readonly level?: SitelineLogLevel;
}

export const createLogger = (options: CreateLoggerOptions = {}): PinoLogger =>
  new PinoLogger({
    name: options.name ?? 'Siteline',
    level: options.level ?? 'info'
  });
