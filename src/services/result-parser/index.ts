export { parseResults, parseResultDocuments } from './result-parser.js';
export type { ResultDocument, ParseOptions } from './result-parser.js';
export { loadResultFiles, findDefaultResultFiles } from './loader.js';
