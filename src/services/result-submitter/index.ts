export { ResultSubmitter } from './result-submitter.js';
export type { ResultSubmitterOptions } from './result-submitter.js';
export { runName, runDescription, formatElapsed, resultComment } from './run-metadata.js';
