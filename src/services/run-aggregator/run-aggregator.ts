/**
 * Run Aggregator
 * Batch statistics, rolling flakiness and risk classification. Pure functions.
 */

import type {
  AutomationKey,
  HistoryEntry,
  HistoryWindow,
  ResultRecord,
  ResultStatus,
  RiskLevel,
  RunSummary,
  TagBreakdown,
} from '../../types/index.js';
import type { RiskThresholds } from '../../config/pipeline-config.js';

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = {
  low: 95,
  medium: 80,
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const RISK_ORDER: Record<RiskLevel, number> = {
  LOW: 0,
  MEDIUM: 1,
  CRITICAL: 2,
};

function roundTwo(value: number): number {
  return Math.round(value * 100) / 100;
}

export function passRate(passed: number, total: number): number {
  return total === 0 ? 0 : roundTwo((100 * passed) / total);
}

export function aggregate(records: readonly ResultRecord[]): RunSummary {
  // Tags are free-form; a Map keeps names like `constructor` or `__proto__` ordinary keys
  const perTag = new Map<string, TagBreakdown>();
  const failedFeatures: string[] = [];
  let passed = 0;
  let totalDurationMs = 0;

  for (const record of records) {
    const ok = record.status === 'passed';
    if (ok) {
      passed++;
    } else if (!failedFeatures.includes(record.featureName)) {
      failedFeatures.push(record.featureName);
    }
    totalDurationMs += record.durationMs;

    for (const tag of record.tags) {
      const bucket = perTag.get(tag) ?? { total: 0, passed: 0 };
      bucket.total++;
      if (ok) {
        bucket.passed++;
      }
      perTag.set(tag, bucket);
    }
  }

  return {
    total: records.length,
    passed,
    failed: records.length - passed,
    passRate: passRate(passed, records.length),
    totalDurationMs: roundTwo(totalDurationMs),
    perTag: Object.fromEntries(perTag),
    failedFeatures,
  };
}

export function hasCriticalFailure(records: readonly ResultRecord[]): boolean {
  return records.some(
    (record) =>
      record.status === 'failed' && [...record.tags].some((tag) => tag.toLowerCase() === 'critical')
  );
}

/**
 * A failed record tagged critical forces CRITICAL; otherwise the pass rate decides
 */
export function classifyRisk(
  records: readonly ResultRecord[],
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
  summary: Pick<RunSummary, 'passRate'> = aggregate(records)
): RiskLevel {
  if (hasCriticalFailure(records)) {
    return 'CRITICAL';
  }
  if (summary.passRate >= thresholds.low) {
    return 'LOW';
  }
  if (summary.passRate >= thresholds.medium) {
    return 'MEDIUM';
  }
  return 'CRITICAL';
}

export function exceedsRisk(level: RiskLevel, maxRisk: RiskLevel): boolean {
  return RISK_ORDER[level] > RISK_ORDER[maxRisk];
}

/**
 * Entries inside the window, newest first
 */
export function applyWindow(history: readonly HistoryEntry[], window: HistoryWindow = {}): HistoryEntry[] {
  const now = (window.now ?? new Date()).getTime();
  const cutoff = window.days !== undefined ? now - window.days * DAY_MS : undefined;

  const inWindow = [...history]
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .filter((entry) => cutoff === undefined || entry.timestamp.getTime() >= cutoff);

  return window.maxEntries !== undefined ? inWindow.slice(0, window.maxEntries) : inWindow;
}

/**
 * Statuses of one key inside the window, newest first
 */
export function statusSeries(
  history: readonly HistoryEntry[],
  key: AutomationKey,
  window: HistoryWindow = {}
): ResultStatus[] {
  const series: ResultStatus[] = [];
  for (const entry of applyWindow(history, window)) {
    const result = entry.results.find((r) => r.automationKey === key);
    if (result) {
      series.push(result.status);
    }
  }
  return series;
}

/**
 * Fraction of statuses disagreeing with the window's majority (ties count passed
 * as the majority). Fewer than two points is no evidence: 0.
 */
export function flakinessOf(series: readonly ResultStatus[]): number {
  if (series.length < 2) {
    return 0;
  }
  const passed = series.filter((status) => status === 'passed').length;
  const failed = series.length - passed;
  const minority = passed >= failed ? failed : passed;
  return minority / series.length;
}

export function flakiness(
  history: readonly HistoryEntry[],
  key: AutomationKey,
  window: HistoryWindow = {}
): number {
  return flakinessOf(statusSeries(history, key, window));
}

export interface FlakyTest {
  automationKey: AutomationKey;
  featureName: string;
  scenarioName: string;
  flakiness: number;
  runs: number;
  failures: number;
  lastStatus: ResultStatus;
}

/**
 * Every key at or above `minFlakiness`, most flaky first
 */
export function findFlakyTests(
  history: readonly HistoryEntry[],
  minFlakiness: number,
  window: HistoryWindow = {}
): FlakyTest[] {
  const windowed = applyWindow(history, window);
  const seen = new Map<AutomationKey, { featureName: string; scenarioName: string; series: ResultStatus[] }>();

  for (const entry of windowed) {
    for (const result of entry.results) {
      const known = seen.get(result.automationKey);
      if (known) {
        known.series.push(result.status);
      } else {
        seen.set(result.automationKey, {
          featureName: result.featureName,
          scenarioName: result.scenarioName,
          series: [result.status],
        });
      }
    }
  }

  const flaky: FlakyTest[] = [];
  for (const [automationKey, { featureName, scenarioName, series }] of seen) {
    const score = flakinessOf(series);
    const [lastStatus] = series;
    if (score > 0 && score >= minFlakiness && lastStatus) {
      flaky.push({
        automationKey,
        featureName,
        scenarioName,
        flakiness: roundTwo(score),
        runs: series.length,
        failures: series.filter((status) => status === 'failed').length,
        lastStatus,
      });
    }
  }

  return flaky.sort((a, b) => b.flakiness - a.flakiness || a.automationKey.localeCompare(b.automationKey));
}
