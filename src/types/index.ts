/**
 * Core type definitions for the QA result sync pipeline
 */

/**
 * Outcome of a single scenario (or example row). Anything that is not a pass is a failure.
 */
export type ResultStatus = 'passed' | 'failed';

/**
 * Stable identifier linking a logical test to its remote case across runs
 */
export type AutomationKey = string & { readonly __brand: 'AutomationKey' };

export interface StepRecord {
  /**
   * Gherkin keyword including trailing space as reported ("Given ", "And ")
   */
  keyword: string;

  /**
   * Step text
   */
  text: string;

  /**
   * Raw runner status (passed, failed, skipped, pending, undefined, ...)
   */
  status: string;

  durationMs: number;

  errorMessage?: string;
}

/**
 * One executed scenario, or one expanded example row of a Scenario Outline
 */
export interface ResultRecord {
  featureName: string;

  scenarioName: string;

  /**
   * 0-based ordinal of the example row for Scenario Outlines
   */
  exampleIndex?: number;

  /**
   * Tag names without the leading "@"
   */
  tags: ReadonlySet<string>;

  status: ResultStatus;

  durationMs: number;

  /**
   * Present iff status is "failed"
   */
  errorMessage?: string;

  steps: StepRecord[];

  /**
   * Steps of the feature's Background that ran before this scenario
   */
  backgroundSteps: StepRecord[];

  /**
   * Feature file the record came from, when the runner reports it
   */
  sourceUri?: string;

  description?: string;
}

export interface TagBreakdown {
  total: number;
  passed: number;
}

/**
 * Batch statistics over a set of result records
 */
export interface RunSummary {
  total: number;
  passed: number;
  failed: number;

  /**
   * 0-100, rounded to two decimals
   */
  passRate: number;

  totalDurationMs: number;

  perTag: Record<string, TagBreakdown>;

  /**
   * Distinct feature names with at least one failure, in first-seen order
   */
  failedFeatures: string[];
}

export type RiskLevel = 'LOW' | 'MEDIUM' | 'CRITICAL';

/**
 * A case known to the remote test-management system
 */
export interface RemoteCase {
  remoteId: number;
  automationKey?: string;
  title: string;
  sectionId: number;
}

/**
 * Record that could not be synced, with the stage that rejected it
 */
export interface UnsyncedRecord {
  automationKey: AutomationKey;
  featureName: string;
  scenarioName: string;
  stage: 'reconcile' | 'submit';
  reason: string;
}

/**
 * Handle to the remote run created for one pipeline invocation
 */
export interface RemoteRunHandle {
  runId: number;
  name: string;
  url: string;
  submitted: AutomationKey[];
  failed: UnsyncedRecord[];
  skipped: UnsyncedRecord[];
}

/**
 * Per-test outcome as stored in history
 */
export interface HistoryResult {
  automationKey: AutomationKey;
  featureName: string;
  scenarioName: string;
  exampleIndex?: number;
  status: ResultStatus;
  durationMs: number;
  tags: string[];
  errorMessage?: string;
}

/**
 * Immutable append-only record of one pipeline invocation
 */
export interface HistoryEntry {
  id?: number;
  branch: string;
  timestamp: Date;
  executionId: string;
  runId?: number;
  commitSha?: string;
  summary: RunSummary;
  riskLevel: RiskLevel;
  results: HistoryResult[];
}

/**
 * Rolling window applied to history: newest entries first, bounded by count and/or age
 */
export interface HistoryWindow {
  maxEntries?: number;
  days?: number;

  /**
   * Reference time for the day span (defaults to now)
   */
  now?: Date;
}

export interface PipelineCounts {
  parsed: number;
  reconciled: number;
  submitted: number;
  unsynced: number;
  errors: number;
}

export interface QualityGateResult {
  maxRisk: RiskLevel;
  passed: boolean;
}

/**
 * Everything one invocation produced, reported to the invoker
 */
export interface PipelineReport {
  executionId: string;
  counts: PipelineCounts;
  summary: RunSummary;
  riskLevel: RiskLevel;
  run?: RemoteRunHandle;
  unsynced: UnsyncedRecord[];
  warnings: string[];
  flakiness: Record<string, number>;
  narrative?: string;
  gate?: QualityGateResult;
}
