/**
 * History Service
 * Wraps the optional history store; an unreachable store degrades flakiness to 0
 * and surfaces a CollaboratorUnavailableError instead of failing the pipeline.
 */

import type { AutomationKey, HistoryEntry, HistoryWindow } from '../../types/index.js';
import { CollaboratorUnavailableError, errorMessage } from '../../errors.js';
import { flakiness } from '../run-aggregator/index.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import type { HistoryStore } from './types.js';

export interface FlakinessReport {
  scores: Record<string, number>;
  error?: CollaboratorUnavailableError;
}

export class HistoryService {
  private readonly logger: Logger;

  constructor(
    private readonly store: HistoryStore | undefined,
    private readonly window: HistoryWindow
  ) {
    this.logger = createModuleLogger('services:history');
  }

  get enabled(): boolean {
    return this.store !== undefined;
  }

  /**
   * Flakiness per key over the branch's rolling window
   */
  async flakinessFor(keys: readonly AutomationKey[], branch: string, now: Date = new Date()): Promise<FlakinessReport> {
    const zeroes = (): Record<string, number> => Object.fromEntries(keys.map((key) => [key, 0]));

    if (!this.store) {
      return { scores: zeroes() };
    }

    const window: HistoryWindow = { ...this.window, now };
    let history: HistoryEntry[];
    try {
      history = await this.store.query({ branch, automationKeys: keys }, window);
    } catch (error) {
      const failure = new CollaboratorUnavailableError('history', `flakiness query failed: ${errorMessage(error)}`, error);
      this.logger.warn(failure.message);
      return { scores: zeroes(), error: failure };
    }

    const scores: Record<string, number> = {};
    for (const key of keys) {
      scores[key] = flakiness(history, key, window);
    }

    this.logger.debug('Computed flakiness', { keys: keys.length, entries: history.length });
    return { scores };
  }

  /**
   * Append the run; failure is reported, never thrown
   */
  async record(entry: HistoryEntry): Promise<CollaboratorUnavailableError | undefined> {
    if (!this.store) {
      return undefined;
    }

    try {
      const stored = await this.store.append(entry);
      this.logger.info('Recorded run in history', { id: stored.id, branch: entry.branch });
      return undefined;
    } catch (error) {
      const failure = new CollaboratorUnavailableError('history', `append failed: ${errorMessage(error)}`, error);
      this.logger.warn(failure.message);
      return failure;
    }
  }

  async close(): Promise<void> {
    await this.store?.close();
  }
}
