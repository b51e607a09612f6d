/**
 * Result Submitter
 * One remote run per invocation, one result per synced record
 */

import type {
  AutomationKey,
  RemoteRunHandle,
  ResultRecord,
  RiskLevel,
  RunSummary,
  UnsyncedRecord,
} from '../../types/index.js';
import type { BuildInfo } from '../../config/pipeline-config.js';
import { SubmissionError, errorMessage } from '../../errors.js';
import { automationKeyOf } from '../automation-key/index.js';
import { TEST_STATUS } from '../test-management/types.js';
import type { CreatedRun, TestManagementClient } from '../test-management/types.js';
import { RetryManager } from '../../utils/retry.js';
import type { RetryConfig } from '../../utils/retry.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { formatElapsed, resultComment, runDescription, runName } from './run-metadata.js';

export interface ResultSubmitterOptions {
  projectId: number;
  suiteId?: number;
  build: BuildInfo;
  concurrency?: number;
  retry?: Partial<RetryConfig>;
}

function unsyncedFrom(record: ResultRecord, key: AutomationKey, reason: string): UnsyncedRecord {
  return {
    automationKey: key,
    featureName: record.featureName,
    scenarioName: record.scenarioName,
    stage: 'submit',
    reason,
  };
}

export class ResultSubmitter {
  private readonly logger: Logger;
  private readonly retry: RetryManager;
  private readonly concurrency: number;

  constructor(
    private readonly client: TestManagementClient,
    private readonly options: ResultSubmitterOptions
  ) {
    this.logger = createModuleLogger('services:result-submitter');
    this.retry = new RetryManager(options.retry, this.logger);
    this.concurrency = options.concurrency ?? 4;
  }

  async submit(
    summary: RunSummary,
    records: readonly ResultRecord[],
    caseMap: ReadonlyMap<AutomationKey, number>,
    riskLevel?: RiskLevel
  ): Promise<RemoteRunHandle> {
    const synced: Array<{ record: ResultRecord; key: AutomationKey; remoteId: number }> = [];
    const skipped: UnsyncedRecord[] = [];

    for (const record of records) {
      const key = automationKeyOf(record);
      const remoteId = caseMap.get(key);
      if (remoteId === undefined) {
        skipped.push(unsyncedFrom(record, key, 'no remote case'));
      } else {
        synced.push({ record, key, remoteId });
      }
    }

    const name = runName(this.options.build);
    const run = await this.createRun(name, summary, riskLevel, synced.map((s) => s.remoteId));

    this.logger.info('Created run', { runId: run.id, name, cases: synced.length });

    const submitted: AutomationKey[] = [];
    const failed: UnsyncedRecord[] = [];

    await mapWithConcurrency(synced, this.concurrency, async ({ record, key, remoteId }) => {
      try {
        await this.retry.execute(
          () =>
            this.client.addResult(run.id, remoteId, {
              statusId: record.status === 'passed' ? TEST_STATUS.passed : TEST_STATUS.failed,
              elapsed: formatElapsed(record.durationMs),
              comment: resultComment(record),
              version: this.options.build.commitSha,
            }),
          `addResult ${key}`
        );
        submitted.push(key);
      } catch (error) {
        const failure = new SubmissionError(errorMessage(error), key, error);
        this.logger.warn('Result submission failed', { automationKey: key, error: failure.message });
        failed.push(unsyncedFrom(record, key, failure.message));
      }
    });

    this.logger.info('Submitted results', {
      runId: run.id,
      submitted: submitted.length,
      failed: failed.length,
      skipped: skipped.length,
    });

    return { runId: run.id, name, url: run.url, submitted, failed, skipped };
  }

  /**
   * A run that cannot be created leaves nothing to submit into: fatal
   */
  private async createRun(
    name: string,
    summary: RunSummary,
    riskLevel: RiskLevel | undefined,
    caseIds: number[]
  ): Promise<CreatedRun> {
    try {
      return await this.retry.execute(
        () =>
          this.client.createRun(this.options.projectId, {
            name,
            description: runDescription(this.options.build, summary, riskLevel),
            suiteId: this.options.suiteId,
            caseIds: [...new Set(caseIds)],
            refs: this.options.build.jiraIssue,
          }),
        'createRun'
      );
    } catch (error) {
      throw new SubmissionError(`Could not create run "${name}": ${errorMessage(error)}`, undefined, error, true);
    }
  }
}
