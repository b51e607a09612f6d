/**
 * Case Reconciler
 * Create-or-update of remote cases keyed by automation key. One directory listing
 * per pass; the key -> case id map lives only for that pass.
 */

import type { AutomationKey, RemoteCase, ResultRecord, UnsyncedRecord } from '../../types/index.js';
import { ReconciliationError, TestManagementUnavailableError, errorMessage } from '../../errors.js';
import { automationKeyOf, normalizeLabel } from '../automation-key/index.js';
import type { TestManagementClient } from '../test-management/types.js';
import { RetryManager } from '../../utils/retry.js';
import type { RetryConfig } from '../../utils/retry.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { buildNewCase, caseTitle } from './case-content.js';

export interface CaseReconcilerOptions {
  projectId: number;
  suiteId?: number;

  /**
   * Section new cases are created in
   */
  sectionId: number;

  concurrency?: number;
  retry?: Partial<RetryConfig>;
}

export interface ReconcileResult {
  caseMap: Map<AutomationKey, number>;
  created: number;
  updated: number;
  unchanged: number;
  errors: ReconciliationError[];

  /**
   * Every record whose key could not be reconciled
   */
  unsynced: UnsyncedRecord[];
}

type CaseOutcome = 'created' | 'updated' | 'unchanged';

export class CaseReconciler {
  private readonly logger: Logger;
  private readonly retry: RetryManager;
  private readonly concurrency: number;

  constructor(
    private readonly client: TestManagementClient,
    private readonly options: CaseReconcilerOptions
  ) {
    this.logger = createModuleLogger('services:case-reconciler');
    this.retry = new RetryManager(options.retry, this.logger);
    this.concurrency = options.concurrency ?? 4;
  }

  async reconcile(records: readonly ResultRecord[]): Promise<ReconcileResult> {
    const groups = this.groupByKey(records);
    const directory = await this.snapshot();

    const caseMap = new Map<AutomationKey, number>();
    const errors: ReconciliationError[] = [];
    const unsynced: UnsyncedRecord[] = [];
    const tally: Record<CaseOutcome, number> = { created: 0, updated: 0, unchanged: 0 };

    await mapWithConcurrency([...groups], this.concurrency, async ([key, group]) => {
      const [representative] = group;
      if (!representative) {
        return;
      }

      try {
        const { remoteId, outcome } = await this.ensureCase(key, representative, directory.get(key));
        caseMap.set(key, remoteId);
        tally[outcome]++;
      } catch (error) {
        const failure = new ReconciliationError(key, errorMessage(error), error);
        errors.push(failure);
        this.logger.warn('Case reconciliation failed', { automationKey: key, error: failure.message });

        for (const record of group) {
          unsynced.push({
            automationKey: key,
            featureName: record.featureName,
            scenarioName: record.scenarioName,
            stage: 'reconcile',
            reason: failure.message,
          });
        }
      }
    });

    this.logger.info('Reconciliation pass complete', {
      keys: groups.size,
      ...tally,
      errors: errors.length,
    });

    return { caseMap, ...tally, errors, unsynced };
  }

  /**
   * Records sharing a key collapse onto the first one, so a pass never creates two
   * cases for the same key
   */
  private groupByKey(records: readonly ResultRecord[]): Map<AutomationKey, ResultRecord[]> {
    const groups = new Map<AutomationKey, ResultRecord[]>();
    for (const record of records) {
      const key = automationKeyOf(record);
      const group = groups.get(key);
      if (group) {
        group.push(record);
      } else {
        groups.set(key, [record]);
      }
    }
    return groups;
  }

  private async snapshot(): Promise<Map<string, RemoteCase>> {
    const { projectId, suiteId } = this.options;
    let cases: RemoteCase[];
    try {
      cases = await this.retry.execute(() => this.client.listCases({ projectId, suiteId }), 'listCases');
    } catch (error) {
      throw new TestManagementUnavailableError(`listing cases failed: ${errorMessage(error)}`, error);
    }

    const index = new Map<string, RemoteCase>();
    for (const remote of cases) {
      if (!remote.automationKey) {
        continue;
      }
      const key = normalizeLabel(remote.automationKey);
      const existing = index.get(key);
      if (existing) {
        this.logger.warn('Several remote cases share an automation key, using the first', {
          automationKey: key,
          kept: existing.remoteId,
          ignored: remote.remoteId,
        });
        continue;
      }
      index.set(key, remote);
    }

    this.logger.debug('Fetched case directory', { cases: cases.length, keyed: index.size });
    return index;
  }

  private async ensureCase(
    key: AutomationKey,
    record: ResultRecord,
    existing: RemoteCase | undefined
  ): Promise<{ remoteId: number; outcome: CaseOutcome }> {
    const { sectionId } = this.options;

    if (!existing) {
      const created = await this.retry.execute(
        () => this.client.createCase(sectionId, buildNewCase(record, key)),
        `createCase ${key}`
      );
      this.logger.debug('Created case', { automationKey: key, remoteId: created.remoteId });
      return { remoteId: created.remoteId, outcome: 'created' };
    }

    const title = caseTitle(record);
    const drift = {
      title: existing.title !== title ? title : undefined,
      sectionId: existing.sectionId !== sectionId ? sectionId : undefined,
    };

    if (drift.title === undefined && drift.sectionId === undefined) {
      return { remoteId: existing.remoteId, outcome: 'unchanged' };
    }

    await this.retry.execute(() => this.client.updateCase(existing.remoteId, drift), `updateCase ${key}`);
    this.logger.debug('Updated drifted case', { automationKey: key, remoteId: existing.remoteId, ...drift });
    return { remoteId: existing.remoteId, outcome: 'updated' };
  }
}
