export { CaseReconciler } from './case-reconciler.js';
export type { CaseReconcilerOptions, ReconcileResult } from './case-reconciler.js';
export {
  caseTitle,
  inferPriority,
  buildPreconditions,
  buildSteps,
  buildExpectedResult,
  buildNewCase,
  issueRefs,
} from './case-content.js';
