import type { ResultRecord, RiskLevel, RunSummary } from '../../types/index.js';

/**
 * Turns the aggregated run into free text; never feeds back into the numbers
 */
export interface NarrativeSummarizer {
  summarize(summary: RunSummary, failing: readonly ResultRecord[], riskLevel: RiskLevel): Promise<string>;
}
