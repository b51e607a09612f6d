/**
 * Composition root shared by the CLI commands: configuration, the history store
 * and the optional collaborators, each built once per process.
 */

import { parseEnv } from '../config/env.js';
import { buildPipelineConfig } from '../config/pipeline-config.js';
import type { HistorySettings, PipelineConfig, PipelineConfigOverrides } from '../config/pipeline-config.js';
import { ConfigurationError, CollaboratorUnavailableError, errorMessage } from '../errors.js';
import { SqliteHistoryStore } from '../database/index.js';
import type { HistoryStore } from '../services/history/index.js';
import { LlmNarrativeSummarizer } from '../services/narrative/index.js';
import type { NarrativeSummarizer } from '../services/narrative/index.js';
import { createSlackNotifier } from '../services/notification/index.js';
import type { Notifier } from '../services/notification/index.js';
import { createProvider } from '../llm/index.js';
import { createModuleLogger } from '../utils/logger.js';

const logger = createModuleLogger('cli');

export function loadConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  return buildPipelineConfig(parseEnv(), overrides);
}

/**
 * History store a command cannot work without
 */
export function requireHistoryStore(config: PipelineConfig): { store: HistoryStore; settings: HistorySettings } {
  if (!config.history) {
    throw new ConfigurationError('History is not configured: set HISTORY_DB_PATH');
  }
  const store = SqliteHistoryStore.open(config.history.dbPath, { logger, logQueries: config.history.logQueries });
  return { store, settings: config.history };
}

export interface Collaborators {
  history?: HistoryStore;
  summarizer?: NarrativeSummarizer;
  notifier?: Notifier;
  warnings: string[];
}

/**
 * Optional collaborators for a sync; one that cannot be built is left out with a warning
 */
export function createCollaborators(config: PipelineConfig): Collaborators {
  const collaborators: Collaborators = { warnings: [] };

  if (config.history) {
    try {
      collaborators.history = SqliteHistoryStore.open(config.history.dbPath, { logger, logQueries: config.history.logQueries });
    } catch (error) {
      const failure = new CollaboratorUnavailableError('history', `cannot open ${config.history.dbPath}: ${errorMessage(error)}`, error);
      logger.warn(failure.message);
      collaborators.warnings.push(failure.message);
    }
  }

  if (config.llm) {
    collaborators.summarizer = new LlmNarrativeSummarizer(createProvider(config.llm));
  }

  collaborators.notifier = createSlackNotifier(config.slack) ?? undefined;

  return collaborators;
}
