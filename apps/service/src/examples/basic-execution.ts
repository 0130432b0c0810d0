import { RuntimeContext } from '@mastra/core/runtime-context';
import { loadSiteSurvey } from '@siteline/fixtures';

import { mastra } from '../mastra/index.js';
import type { siteComparisonWorkflow } from '../mastra/workflows/site-comparison-workflow.js';

type SiteComparisonWorkflow = typeof siteComparisonWorkflow;
type SiteComparisonRun = Awaited<ReturnType<SiteComparisonWorkflow['createRunAsync']>>;
type SiteComparisonRunResult = Awaited<ReturnType<SiteComparisonRun['start']>>;

export async function runBasicExample() {
  const [first, second] = loadSiteSurvey().sites;
  if (!first || !second) {
    throw new Error('The site survey needs at least two sites for a comparison.');
  }

  const runtimeContext = new RuntimeContext();
  const workflow: SiteComparisonWorkflow = mastra.getWorkflow('siteComparisonWorkflow');
  const run: SiteComparisonRun = await workflow.createRunAsync();

  const result: SiteComparisonRunResult = await run.start({
    inputData: {
      first: { name: first.name, environmentalReport: first.environmentalReport },
      second: { name: second.name, environmentalReport: second.environmentalReport }
    },
    runtimeContext
  });

  if (result.status === 'success') {
    console.warn(result.result.report);
  } else {
    console.warn('Workflow execution status:', result.status);
  }
}

const invokedDirectly =
  typeof process !== 'undefined' &&
  Array.isArray(process.argv) &&
  typeof process.argv[1] === 'string' &&
  import.meta.url === new URL(`file://${process.argv[1]}`).href;

if (invokedDirectly) {
  runBasicExample().catch((error) => {
    console.error('Workflow example failed:', error);
    process.exit(1);
  });
}
