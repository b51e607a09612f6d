/**
 * LLM-backed narrative summarizer
 */

import type { ResultRecord, RiskLevel, RunSummary } from '../../types/index.js';
import type { BaseLLMProvider } from '../../llm/providers/base.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { NARRATIVE_SYSTEM_PROMPT, buildNarrativePrompt } from './prompts.js';
import type { NarrativeSummarizer } from './types.js';

export interface LlmSummarizerOptions {
  /**
   * Failing tests listed in the prompt
   */
  maxFailures?: number;
}

export class LlmNarrativeSummarizer implements NarrativeSummarizer {
  private readonly logger: Logger;
  private readonly maxFailures: number;

  constructor(
    private readonly provider: BaseLLMProvider,
    options: LlmSummarizerOptions = {}
  ) {
    this.logger = createModuleLogger('services:narrative');
    this.maxFailures = options.maxFailures ?? 20;
  }

  async summarize(summary: RunSummary, failing: readonly ResultRecord[], riskLevel: RiskLevel): Promise<string> {
    const response = await this.provider.createCompletion([
      { role: 'system', content: NARRATIVE_SYSTEM_PROMPT },
      { role: 'user', content: buildNarrativePrompt(summary, failing, riskLevel, this.maxFailures) },
    ]);

    this.logger.info('Generated run narrative', {
      provider: response.provider,
      model: response.model,
      totalTokens: response.usage?.totalTokens,
    });

    return response.content.trim();
  }
}
