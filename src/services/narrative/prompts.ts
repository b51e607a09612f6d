/**
 * Prompt templates for the run narrative
 */

import type { ResultRecord, RiskLevel, RunSummary } from '../../types/index.js';

export const NARRATIVE_SYSTEM_PROMPT = [
  'You are a senior QA automation lead reviewing the API test results of a CI build.',
  'Write a short markdown summary for the team: overall health, the failing areas,',
  'likely blockers and concrete next steps. Be direct and technical, quote the numbers',
  'you are given and do not invent tests that are not listed. Keep it under 300 words.',
].join(' ');

const MAX_ERROR_LENGTH = 300;

function failureLine(record: ResultRecord): string {
  const row = record.exampleIndex === undefined ? '' : ` [example ${record.exampleIndex + 1}]`;
  const tags = record.tags.size > 0 ? ` (tags: ${[...record.tags].join(', ')})` : '';
  const error = (record.errorMessage ?? 'no error message').replace(/\s+/g, ' ').slice(0, MAX_ERROR_LENGTH);
  return `- ${record.featureName} / ${record.scenarioName}${row}${tags}: ${error}`;
}

export function buildNarrativePrompt(
  summary: RunSummary,
  failing: readonly ResultRecord[],
  riskLevel: RiskLevel,
  maxFailures: number
): string {
  const lines = [
    'Run results:',
    `- Total: ${summary.total}`,
    `- Passed: ${summary.passed}`,
    `- Failed: ${summary.failed}`,
    `- Pass rate: ${summary.passRate.toFixed(2)}%`,
    `- Duration: ${(summary.totalDurationMs / 1000).toFixed(1)}s`,
    `- Risk level: ${riskLevel}`,
  ];

  const tags = Object.entries(summary.perTag);
  if (tags.length > 0) {
    lines.push('', 'Per tag (passed/total):');
    for (const [tag, bucket] of tags) {
      lines.push(`- ${tag}: ${bucket.passed}/${bucket.total}`);
    }
  }

  if (failing.length > 0) {
    lines.push('', 'Failing tests:');
    lines.push(...failing.slice(0, maxFailures).map(failureLine));
    if (failing.length > maxFailures) {
      lines.push(`- ...and ${failing.length - maxFailures} more`);
    }
  }

  return lines.join('\n');
}
