export { LlmNarrativeSummarizer } from './llm-summarizer.js';
export type { LlmSummarizerOptions } from './llm-summarizer.js';
export { NARRATIVE_SYSTEM_PROMPT, buildNarrativePrompt } from './prompts.js';
export { renderFallbackNarrative, renderMarkdownReport } from './markdown-report.js';
export type { NarrativeSummarizer } from './types.js';
