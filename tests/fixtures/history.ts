/**
 * History entry builders
 */

import type { AutomationKey, HistoryEntry, ResultStatus } from '../../src/types/index.js';
import { deriveAutomationKey } from '../../src/services/automation-key/index.js';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

const DAY_MS = 24 * 60 * 60 * 1000;

export function keyOf(scenarioName: string, featureName: string = 'Users API'): AutomationKey {
  return deriveAutomationKey(featureName, scenarioName);
}

let sequence = 0;

/**
 * One stored run `daysAgo` before NOW with the given scenario outcomes
 */
export function historyEntry(
  daysAgo: number,
  outcomes: Record<string, ResultStatus>,
  branch: string = 'main'
): HistoryEntry {
  sequence++;
  const results = Object.entries(outcomes).map(([scenarioName, status]) => ({
    automationKey: keyOf(scenarioName),
    featureName: 'Users API',
    scenarioName,
    status,
    durationMs: 25,
    tags: [],
    errorMessage: status === 'failed' ? `assertion failed in ${scenarioName}` : undefined,
  }));
  const passed = results.filter((r) => r.status === 'passed').length;

  return {
    branch,
    timestamp: new Date(NOW.getTime() - daysAgo * DAY_MS),
    executionId: `exec-${sequence}`,
    summary: {
      total: results.length,
      passed,
      failed: results.length - passed,
      passRate: results.length === 0 ? 0 : Math.round((10000 * passed) / results.length) / 100,
      totalDurationMs: 25 * results.length,
      perTag: {},
      failedFeatures: passed === results.length ? [] : ['Users API'],
    },
    riskLevel: passed === results.length ? 'LOW' : 'CRITICAL',
    results,
  };
}

/**
 * Entries one day apart, newest first, for one scenario's status series
 */
export function seriesHistory(scenarioName: string, statuses: ResultStatus[]): HistoryEntry[] {
  return statuses.map((status, index) => historyEntry(index, { [scenarioName]: status }));
}
