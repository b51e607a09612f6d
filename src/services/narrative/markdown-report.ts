/**
 * Markdown rendering of a run: the narrative used when no LLM is configured,
 * and the full report written by `--report`
 */

import type { PipelineReport, ResultRecord, RiskLevel, RunSummary } from '../../types/index.js';

const RISK_BADGES: Record<RiskLevel, string> = {
  LOW: '🟢 LOW',
  MEDIUM: '🟡 MEDIUM',
  CRITICAL: '🔴 CRITICAL',
};

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s+/g, ' ').trim();
}

export function renderFallbackNarrative(
  summary: RunSummary,
  failing: readonly ResultRecord[],
  riskLevel: RiskLevel
): string {
  const lines = [
    '# Test Execution Summary',
    '',
    `**Risk:** ${RISK_BADGES[riskLevel]}`,
    `**Pass rate:** ${summary.passRate.toFixed(2)}% (${summary.passed}/${summary.total})`,
    `**Duration:** ${(summary.totalDurationMs / 1000).toFixed(1)}s`,
  ];

  if (failing.length === 0) {
    lines.push('', 'All tests passed.');
    return lines.join('\n');
  }

  lines.push('', `## Failures (${failing.length})`);
  for (const record of failing) {
    lines.push(`- **${record.featureName}** / ${record.scenarioName}: ${record.errorMessage ?? 'failed'}`);
  }
  if (summary.failedFeatures.length > 0) {
    lines.push('', `Affected features: ${summary.failedFeatures.join(', ')}`);
  }
  return lines.join('\n');
}

export function renderMarkdownReport(report: PipelineReport): string {
  const { counts, summary } = report;
  const lines = [
    `# Sync report ${report.executionId}`,
    '',
    `**Risk:** ${RISK_BADGES[report.riskLevel]}`,
    `**Pass rate:** ${summary.passRate.toFixed(2)}% (${summary.passed}/${summary.total})`,
  ];

  if (report.run) {
    lines.push(`**Run:** [${report.run.name}](${report.run.url})`);
  }
  if (report.gate) {
    lines.push(`**Quality gate:** ${report.gate.passed ? 'passed' : 'failed'} (max ${report.gate.maxRisk})`);
  }

  lines.push(
    '',
    '| parsed | reconciled | submitted | unsynced | errors |',
    '| --- | --- | --- | --- | --- |',
    `| ${counts.parsed} | ${counts.reconciled} | ${counts.submitted} | ${counts.unsynced} | ${counts.errors} |`
  );

  const tags = Object.entries(summary.perTag);
  if (tags.length > 0) {
    lines.push('', '## Tags', '', '| tag | passed | total |', '| --- | --- | --- |');
    for (const [tag, bucket] of tags) {
      lines.push(`| ${escapeCell(tag)} | ${bucket.passed} | ${bucket.total} |`);
    }
  }

  if (report.unsynced.length > 0) {
    lines.push('', '## Unsynced', '', '| key | stage | reason |', '| --- | --- | --- |');
    for (const record of report.unsynced) {
      lines.push(`| ${escapeCell(record.automationKey)} | ${record.stage} | ${escapeCell(record.reason)} |`);
    }
  }

  const flaky = Object.entries(report.flakiness)
    .filter(([, score]) => score > 0)
    .sort(([, a], [, b]) => b - a);
  if (flaky.length > 0) {
    lines.push('', '## Flaky', '');
    for (const [key, score] of flaky) {
      lines.push(`- ${key}: ${(score * 100).toFixed(0)}%`);
    }
  }

  if (report.warnings.length > 0) {
    lines.push('', '## Warnings', '');
    lines.push(...report.warnings.map((warning) => `- ${warning}`));
  }

  if (report.narrative) {
    lines.push('', '## Narrative', '', report.narrative);
  }

  return lines.join('\n');
}
