/**
 * Human-readable content of a remote case, built from the first record of its key
 */

import type { AutomationKey, ResultRecord, StepRecord } from '../../types/index.js';
import type { CasePriority, NewCase } from '../test-management/types.js';

const CRITICAL_MARKERS = ['critical', 'smoke'];
const LOW_MARKERS = ['error', 'negative'];

// Karate assertion steps
const ASSERTION_PATTERN = /^(match|status|assert)\b/i;

// Jira-style issue keys used as tags, e.g. @PAY-123
const ISSUE_KEY_PATTERN = /^[A-Z][A-Z0-9]+-\d+$/;

/**
 * Scenario name, plus the 1-based row number for outline rows
 */
export function caseTitle(record: Pick<ResultRecord, 'scenarioName' | 'exampleIndex'>): string {
  return record.exampleIndex === undefined
    ? record.scenarioName
    : `${record.scenarioName} [example ${record.exampleIndex + 1}]`;
}

export function inferPriority(record: Pick<ResultRecord, 'scenarioName' | 'tags'>): CasePriority {
  const labels = [record.scenarioName, ...record.tags].map((label) => label.toLowerCase());
  const mentions = (markers: string[]) => labels.some((label) => markers.some((m) => label.includes(m)));

  if (mentions(CRITICAL_MARKERS)) {
    return 5;
  }
  if (mentions(LOW_MARKERS)) {
    return 2;
  }
  return 3;
}

function stepLine(step: StepRecord): string {
  return `${step.keyword.trim()} ${step.text}`.trim();
}

function numbered(lines: string[]): string {
  return lines.map((line, index) => `${index + 1}. ${line}`).join('\n');
}

export function buildPreconditions(record: ResultRecord): string {
  return numbered(record.backgroundSteps.map(stepLine));
}

export function buildSteps(record: ResultRecord): string {
  return numbered(record.steps.map(stepLine));
}

export function buildExpectedResult(record: ResultRecord): string {
  const assertions = record.steps.filter((step) => ASSERTION_PATTERN.test(step.text.trim()));
  if (assertions.length === 0) {
    return 'All steps pass';
  }
  return assertions.map((step) => `- ${step.text.trim()}`).join('\n');
}

export function issueRefs(record: Pick<ResultRecord, 'tags'>): string | undefined {
  const refs = [...record.tags].filter((tag) => ISSUE_KEY_PATTERN.test(tag));
  return refs.length > 0 ? refs.join(',') : undefined;
}

export function buildNewCase(record: ResultRecord, automationKey: AutomationKey): NewCase {
  return {
    title: caseTitle(record),
    automationKey,
    priority: inferPriority(record),
    preconditions: buildPreconditions(record),
    steps: buildSteps(record),
    expectedResult: buildExpectedResult(record),
    refs: issueRefs(record),
  };
}
