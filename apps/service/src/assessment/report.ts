import type { ComparisonRun, SiteAssessment, SiteComparison } from '@siteline/core';

import { describeAssessment } from './comparison.js';
import { ASSESSMENT_STAGES } from './stages.js';

const escapeCell = (value: string): string => value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');

export const renderSiteReport = (assessment: SiteAssessment): string => {
  const lines = [`## ${assessment.site}`, ''];
  for (const dimension of describeAssessment(assessment)) {
    lines.push(`- ${dimension.label}: ${dimension.value}`);
  }

  const failures = ASSESSMENT_STAGES.flatMap((stage) => {
    const outcome = assessment.stages[stage.id];
    return outcome.status === 'failed'
      ? [`- ${stage.label} (${outcome.error.code}): ${outcome.error.message}`]
      : [];
  });
  if (failures.length > 0) {
    lines.push('', '### Stage failures', '', ...failures);
  }

  return lines.join('\n');
};

export const renderComparisonReport = (comparison: SiteComparison): string => {
  const [first, second] = comparison.sites;
  const lines = [
    `# Site comparison: ${first} vs ${second}`,
    '',
    `| Dimension | ${escapeCell(first)} | ${escapeCell(second)} |`,
    '| --- | --- | --- |'
  ];
  for (const dimension of comparison.dimensions) {
    const [left, right] = dimension.values;
    lines.push(`| ${dimension.label} | ${escapeCell(left)} | ${escapeCell(right)} |`);
  }

  const { recommendation } = comparison;
  const decidedBy = recommendation.decidedBy === 'tie' ? 'tie' : `decided by ${recommendation.decidedBy}`;
  lines.push('', `**Recommendation:** ${recommendation.site} (${decidedBy}). ${recommendation.rationale}`);

  return lines.join('\n');
};

export const renderComparisonRunReport = (run: ComparisonRun): string =>
  [...run.assessments.map(renderSiteReport), renderComparisonReport(run.comparison)].join('\n\n');
