export { TestRailClient, TestRailApiError } from './testrail-client.js';
export { TEST_STATUS } from './types.js';
export type {
  CasePriority,
  CaseScope,
  CaseUpdate,
  CreatedRun,
  NewCase,
  NewRun,
  ResultEntry,
  TestManagementClient,
} from './types.js';
