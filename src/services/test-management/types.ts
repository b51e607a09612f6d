/**
 * Test-management client contract
 */

import type { AutomationKey, RemoteCase } from '../../types/index.js';

/**
 * Priority ids of the five-level scale: 2 Low, 3 Medium, 5 Critical
 */
export type CasePriority = 2 | 3 | 5;

export interface CaseScope {
  projectId: number;
  suiteId?: number;
  sectionId?: number;
}

export interface NewCase {
  title: string;
  automationKey: AutomationKey;
  priority: CasePriority;
  preconditions: string;
  steps: string;
  expectedResult: string;
  refs?: string;
}

export interface CaseUpdate {
  title?: string;
  sectionId?: number;
}

export interface NewRun {
  name: string;
  description: string;
  suiteId?: number;
  caseIds: number[];
  refs?: string;
}

export interface CreatedRun {
  id: number;
  url: string;
}

/**
 * TestRail status ids used by the submitter
 */
export const TEST_STATUS = {
  passed: 1,
  failed: 5,
} as const;

export interface ResultEntry {
  statusId: (typeof TEST_STATUS)[keyof typeof TEST_STATUS];

  /**
   * TestRail timespan such as "1m 5s"
   */
  elapsed?: string;

  comment: string;
  version?: string;
}

/**
 * Remote case directory plus run/result submission
 */
export interface TestManagementClient {
  listCases(scope: CaseScope): Promise<RemoteCase[]>;
  createCase(sectionId: number, payload: NewCase): Promise<RemoteCase>;
  updateCase(remoteId: number, fields: CaseUpdate): Promise<RemoteCase>;
  createRun(projectId: number, payload: NewRun): Promise<CreatedRun>;
  addResult(runId: number, remoteId: number, result: ResultEntry): Promise<void>;
  checkConnection(): Promise<boolean>;
}
