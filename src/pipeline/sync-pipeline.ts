/**
 * Sync Pipeline
 *
 * Composes one invocation: parse the runner output, reconcile cases, aggregate,
 * submit the run, then the optional collaborators (history, narrative, notifier).
 * Fatal errors propagate to the caller; collaborator failures end up as warnings.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AutomationKey,
  HistoryEntry,
  PipelineReport,
  ResultRecord,
  RiskLevel,
  RunSummary,
  UnsyncedRecord,
} from '../types/index.js';
import type { PipelineConfig, TestRailSettings } from '../config/pipeline-config.js';
import { requireTestRail } from '../config/pipeline-config.js';
import { CollaboratorUnavailableError, errorMessage } from '../errors.js';
import { parseResultDocuments } from '../services/result-parser/index.js';
import type { ResultDocument } from '../services/result-parser/index.js';
import { automationKeyOf } from '../services/automation-key/index.js';
import { CaseReconciler } from '../services/case-reconciler/index.js';
import { ResultSubmitter } from '../services/result-submitter/index.js';
import { aggregate, classifyRisk, exceedsRisk } from '../services/run-aggregator/index.js';
import { HistoryService } from '../services/history/index.js';
import type { HistoryStore } from '../services/history/index.js';
import { renderFallbackNarrative } from '../services/narrative/index.js';
import type { NarrativeSummarizer } from '../services/narrative/index.js';
import type { NotificationContext, Notifier } from '../services/notification/index.js';
import type { TestManagementClient } from '../services/test-management/index.js';
import type { RetryConfig } from '../utils/retry.js';
import { createModuleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface SyncPipelineDependencies {
  client: TestManagementClient;
  history?: HistoryStore;
  summarizer?: NarrativeSummarizer;
  notifier?: Notifier;

  /**
   * Collaborator problems found while wiring, carried into the report
   */
  warnings?: readonly string[];

  /**
   * Clock for history timestamps and windows
   */
  now?: () => Date;
}

export class SyncPipeline {
  private readonly logger: Logger;
  private readonly testRail: TestRailSettings;
  private readonly history: HistoryService;
  private readonly now: () => Date;

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: SyncPipelineDependencies
  ) {
    this.logger = createModuleLogger('pipeline');
    this.testRail = requireTestRail(config);
    this.history = new HistoryService(deps.history, {
      maxEntries: config.history?.maxEntries,
      days: config.history?.days,
    });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run the whole pipeline over one or more runner output documents
   */
  async run(documents: readonly ResultDocument[]): Promise<PipelineReport> {
    const records = parseResultDocuments(documents);
    return this.process(records);
  }

  /**
   * Run everything after parsing
   */
  async process(records: readonly ResultRecord[]): Promise<PipelineReport> {
    const executionId = uuidv4();
    const startedAt = this.now();
    const warnings: string[] = [...(this.deps.warnings ?? [])];
    const { build } = this.config;

    this.logger.info('Pipeline started', { executionId, records: records.length, branch: build.branch });

    const retry: Partial<RetryConfig> = {
      maxAttempts: this.config.sync.maxAttempts,
      initialBackoffMs: this.config.sync.backoffMs,
    };

    const reconciler = new CaseReconciler(this.deps.client, {
      projectId: this.testRail.projectId,
      suiteId: this.testRail.suiteId,
      sectionId: this.testRail.sectionId,
      concurrency: this.config.sync.concurrency,
      retry,
    });
    const reconciled = await reconciler.reconcile(records);

    const summary = aggregate(records);
    const riskLevel = classifyRisk(records, this.config.risk, summary);

    const submitter = new ResultSubmitter(this.deps.client, {
      projectId: this.testRail.projectId,
      suiteId: this.testRail.suiteId,
      build,
      concurrency: this.config.sync.concurrency,
      retry,
    });
    const run = await submitter.submit(summary, records, reconciled.caseMap, riskLevel);

    const keys = [...new Set(records.map(automationKeyOf))];
    const flakiness = await this.history.flakinessFor(keys, build.branch, startedAt);
    if (flakiness.error) {
      warnings.push(flakiness.error.message);
    }

    const historyError = await this.history.record(this.historyEntry(executionId, startedAt, summary, riskLevel, records, run.runId));
    if (historyError) {
      warnings.push(historyError.message);
    }

    // Skipped records are the ones the reconciler already reported
    const reconcileKeys = new Set<AutomationKey>(reconciled.unsynced.map((u) => u.automationKey));
    const unsynced: UnsyncedRecord[] = [
      ...reconciled.unsynced,
      ...run.failed,
      ...run.skipped.filter((s) => !reconcileKeys.has(s.automationKey)),
    ];

    const failing = records.filter((r) => r.status === 'failed');
    const narrative = await this.summarize(summary, failing, riskLevel, warnings);

    const text = narrative ?? renderFallbackNarrative(summary, failing, riskLevel);
    await this.notify(text, { summary, riskLevel, failing, runUrl: run.url, unsynced: unsynced.length }, warnings);

    const report: PipelineReport = {
      executionId,
      counts: {
        parsed: records.length,
        reconciled: records.filter((r) => reconciled.caseMap.has(automationKeyOf(r))).length,
        submitted: run.submitted.length,
        unsynced: unsynced.length,
        errors: reconciled.errors.length + run.failed.length,
      },
      summary,
      riskLevel,
      run,
      unsynced,
      warnings,
      flakiness: flakiness.scores,
      narrative,
      gate: this.config.qualityGate
        ? {
            maxRisk: this.config.qualityGate.maxRisk,
            passed: !exceedsRisk(riskLevel, this.config.qualityGate.maxRisk),
          }
        : undefined,
    };

    this.logger.info('Pipeline finished', {
      executionId,
      ...report.counts,
      passRate: summary.passRate,
      riskLevel,
      warnings: warnings.length,
    });

    return report;
  }

  private historyEntry(
    executionId: string,
    timestamp: Date,
    summary: RunSummary,
    riskLevel: RiskLevel,
    records: readonly ResultRecord[],
    runId: number
  ): HistoryEntry {
    return {
      branch: this.config.build.branch,
      timestamp,
      executionId,
      runId,
      commitSha: this.config.build.commitSha,
      summary,
      riskLevel,
      results: records.map((record) => ({
        automationKey: automationKeyOf(record),
        featureName: record.featureName,
        scenarioName: record.scenarioName,
        exampleIndex: record.exampleIndex,
        status: record.status,
        durationMs: record.durationMs,
        tags: [...record.tags],
        errorMessage: record.errorMessage,
      })),
    };
  }

  private async summarize(
    summary: RunSummary,
    failing: readonly ResultRecord[],
    riskLevel: RiskLevel,
    warnings: string[]
  ): Promise<string | undefined> {
    if (!this.deps.summarizer) {
      return undefined;
    }

    try {
      return await this.deps.summarizer.summarize(summary, failing, riskLevel);
    } catch (error) {
      const failure = new CollaboratorUnavailableError('summarizer', errorMessage(error), error);
      this.logger.warn(failure.message);
      warnings.push(failure.message);
      return undefined;
    }
  }

  private async notify(
    text: string,
    context: Omit<NotificationContext, 'build'>,
    warnings: string[]
  ): Promise<void> {
    if (!this.deps.notifier) {
      return;
    }

    try {
      await this.deps.notifier.notify(text, { ...context, build: this.config.build });
    } catch (error) {
      const failure = new CollaboratorUnavailableError('notifier', errorMessage(error), error);
      this.logger.warn(failure.message);
      warnings.push(failure.message);
    }
  }
}
