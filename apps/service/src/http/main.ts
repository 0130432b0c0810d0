import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createSiteComparisonService } from '../sites/setup.js';
import { createServer } from './server.js';

const config = loadConfig();
const logger = createLogger({ name: 'SitelineHttp', level: config.logLevel });
const server = createServer({ service: createSiteComparisonService({ config, logger }) });

server
  .listen({ host: config.httpHost, port: config.httpPort })
  .then((address) => {
    logger.info(`Listening on ${address}`);
  })
  .catch((error: unknown) => {
    logger.error('Server failed to start', { error });
    process.exitCode = 1;
  });
