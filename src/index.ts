/**
 * QA Result Sync
 *
 * Parses Gherkin API test reports (Karate / Cucumber JSON), keeps TestRail cases in
 * sync with them, submits one run per build and tracks run history and flakiness.
 */

export type * from './types/index.js';
export * from './errors.js';

export { parseEnv } from './config/env.js';
export type { Env } from './config/env.js';
export { buildPipelineConfig, loadProjectProfiles, requireTestRail } from './config/pipeline-config.js';
export type {
  BuildInfo,
  HistorySettings,
  LlmSettings,
  PipelineConfig,
  PipelineConfigOverrides,
  ProjectProfile,
  RiskThresholds,
  ServerSettings,
  SlackSettings,
  SyncSettings,
  TestRailSettings,
} from './config/pipeline-config.js';

export { SyncPipeline } from './pipeline/index.js';
export type { SyncPipelineDependencies } from './pipeline/index.js';

export * from './services/result-parser/index.js';
export * from './services/automation-key/index.js';
export * from './services/test-management/index.js';
export * from './services/case-reconciler/index.js';
export * from './services/run-aggregator/index.js';
export * from './services/result-submitter/index.js';
export * from './services/history/index.js';
export * from './services/narrative/index.js';
export * from './services/notification/index.js';

export { SqliteHistoryStore, openDatabase } from './database/index.js';
export { createProvider, createProviderFromConfig, BaseLLMProvider, LLMError, LLMErrorType } from './llm/index.js';
export { createServer, ExpressServer } from './server/index.js';
export { Logger, createLogger, createModuleLogger, logger } from './utils/logger.js';
export { RetryManager, isTransientError } from './utils/retry.js';
export { mapWithConcurrency } from './utils/concurrency.js';
