import { createSiteComparisonService } from '../sites/setup.js';
import { createCli } from './index.js';

const cli = createCli({ service: createSiteComparisonService() });

cli.parseAsync(process.argv).catch(() => {
  process.exitCode = 1;
});
