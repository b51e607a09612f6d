/**
 * Run name, description and result formatting for TestRail
 */

import type { BuildInfo } from '../../config/pipeline-config.js';
import type { ResultRecord, RiskLevel, RunSummary } from '../../types/index.js';

export function runName(build: BuildInfo): string {
  return `Build #${build.buildNumber} - ${build.branch}`;
}

export function runDescription(build: BuildInfo, summary: RunSummary, riskLevel?: RiskLevel): string {
  const lines = [
    `Build: ${build.buildNumber}`,
    `Branch: ${build.branch}`,
    `Environment: ${build.environment}`,
  ];
  if (build.commitSha) {
    lines.push(`Commit: ${build.commitSha}`);
  }
  if (build.commitMessage) {
    lines.push(`Message: ${build.commitMessage}`);
  }
  if (build.jiraIssue) {
    lines.push(`Jira: ${build.jiraIssue}`);
  }
  if (build.actor) {
    lines.push(`Triggered by: ${build.actor}`);
  }
  if (build.prNumber !== undefined) {
    lines.push(`Pull request: #${build.prNumber}`);
  }
  lines.push('', `Results: ${summary.passed}/${summary.total} passed (${summary.passRate.toFixed(2)}%)`);
  if (riskLevel) {
    lines.push(`Risk: ${riskLevel}`);
  }
  return lines.join('\n');
}

/**
 * TestRail timespan ("5s", "1m 5s", "1h 2m"). Sub-second runs round up to 1s;
 * zero yields undefined so the field is left out.
 */
export function formatElapsed(durationMs: number): string | undefined {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return undefined;
  }

  const totalSeconds = Math.max(1, Math.round(durationMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (hours > 0) {
    parts.push(`${hours}h`);
  }
  if (minutes > 0) {
    parts.push(`${minutes}m`);
  }
  if (seconds > 0) {
    parts.push(`${seconds}s`);
  }
  return parts.join(' ');
}

export function resultComment(record: ResultRecord): string {
  const row = record.exampleIndex === undefined ? '' : ` (example ${record.exampleIndex + 1})`;
  const header = `${record.featureName} / ${record.scenarioName}${row}`;
  if (record.status === 'passed') {
    return `${header}\nPassed in ${(record.durationMs / 1000).toFixed(2)}s`;
  }
  return `${header}\nFailed: ${record.errorMessage ?? 'unknown error'}`;
}
