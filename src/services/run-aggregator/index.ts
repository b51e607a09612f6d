export {
  DEFAULT_RISK_THRESHOLDS,
  RISK_ORDER,
  aggregate,
  passRate,
  classifyRisk,
  hasCriticalFailure,
  exceedsRisk,
  applyWindow,
  statusSeries,
  flakinessOf,
  flakiness,
  findFlakyTests,
} from './run-aggregator.js';
export type { FlakyTest } from './run-aggregator.js';
