/**
 * Result submitter tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ResultSubmitter,
  formatElapsed,
  resultComment,
  runDescription,
  runName,
} from '../../src/services/result-submitter/index.js';
import { aggregate } from '../../src/services/run-aggregator/index.js';
import { deriveAutomationKey } from '../../src/services/automation-key/index.js';
import { parseResults } from '../../src/services/result-parser/index.js';
import type { BuildInfo } from '../../src/config/pipeline-config.js';
import type { AutomationKey } from '../../src/types/index.js';
import { SubmissionError } from '../../src/errors.js';
import { batch, feature, outlineRow, step } from '../fixtures/cucumber.js';
import { InMemoryTestManagement } from '../fixtures/in-memory-test-management.js';

const BUILD: BuildInfo = {
  buildNumber: '42',
  branch: 'main',
  environment: 'staging',
  commitSha: 'abc1234',
};

const RETRY = { maxAttempts: 3, initialBackoffMs: 0 };

function caseMapFor(entries: Array<[string, number]>): Map<AutomationKey, number> {
  return new Map(entries.map(([scenario, id]) => [deriveAutomationKey('Users API', scenario), id]));
}

describe('ResultSubmitter', () => {
  it('should create one run and one result per synced record', async () => {
    const remote = new InMemoryTestManagement();
    const records = parseResults([batch('Users API', 3, 1)]);
    const summary = aggregate(records);
    const submitter = new ResultSubmitter(remote, { projectId: 1, suiteId: 4, build: BUILD, retry: RETRY });

    const run = await submitter.submit(summary, records, caseMapFor([['case 1', 11], ['case 3', 13]]), 'CRITICAL');

    assert.strictEqual(remote.runs.length, 1);
    assert.strictEqual(remote.runs[0]?.projectId, 1);
    assert.strictEqual(remote.runs[0]?.payload.name, 'Build #42 - main');
    assert.strictEqual(remote.runs[0]?.payload.suiteId, 4);
    assert.deepStrictEqual(remote.runs[0]?.payload.caseIds, [11, 13]);

    assert.deepStrictEqual(
      remote.results.map((r) => [r.runId, r.remoteId, r.result.statusId, r.result.elapsed, r.result.version]),
      [
        [1, 11, 1, '1s', 'abc1234'],
        [1, 13, 5, '1s', 'abc1234'],
      ]
    );
    assert.strictEqual(remote.results[1]?.result.comment, 'Users API / case 3\nFailed: expected 200 in case 3');

    assert.strictEqual(run.runId, 1);
    assert.strictEqual(run.name, 'Build #42 - main');
    assert.strictEqual(run.url, 'https://testrail.example.test/index.php?/runs/view/1');
    assert.deepStrictEqual(run.submitted.sort(), ['users api::case 1', 'users api::case 3']);
    assert.deepStrictEqual(run.failed, []);
    assert.deepStrictEqual(run.skipped, [
      {
        automationKey: 'users api::case 2',
        featureName: 'Users API',
        scenarioName: 'case 2',
        stage: 'submit',
        reason: 'no remote case',
      },
    ]);
  });

  it('should retry transient result failures', async () => {
    const remote = new InMemoryTestManagement().failNext('addResult', 2);
    const records = parseResults([batch('Users API', 2, 0)]);
    const submitter = new ResultSubmitter(remote, { projectId: 1, build: BUILD, retry: RETRY, concurrency: 1 });

    const run = await submitter.submit(aggregate(records), records, caseMapFor([['case 1', 11], ['case 2', 12]]));

    assert.strictEqual(run.submitted.length, 2);
    assert.strictEqual(remote.calls.addResult, 4);
  });

  it('should isolate a result that keeps failing', async () => {
    const remote = new InMemoryTestManagement().rejectResultsFor(12);
    const records = parseResults([batch('Users API', 3, 0)]);
    const submitter = new ResultSubmitter(remote, { projectId: 1, build: BUILD, retry: RETRY });

    const run = await submitter.submit(aggregate(records), records, caseMapFor([['case 1', 11], ['case 2', 12], ['case 3', 13]]));

    assert.strictEqual(run.submitted.length, 2);
    assert.strictEqual(run.failed.length, 1);
    assert.strictEqual(run.failed[0]?.automationKey, 'users api::case 2');
    assert.strictEqual(run.failed[0]?.stage, 'submit');
    assert.strictEqual(remote.results.length, 2);
  });

  it('should fail fatally when the run cannot be created', async () => {
    const remote = new InMemoryTestManagement().failNext('createRun', 3);
    const records = parseResults([batch('Users API', 1, 0)]);
    const submitter = new ResultSubmitter(remote, { projectId: 1, build: BUILD, retry: RETRY });

    await assert.rejects(
      () => submitter.submit(aggregate(records), records, caseMapFor([['case 1', 11]])),
      (error: unknown) =>
        error instanceof SubmissionError && error.fatal && error.message.startsWith('Could not create run "Build #42 - main"')
    );
    assert.strictEqual(remote.calls.addResult, 0);
  });
});

describe('Run metadata', () => {
  it('should name runs after build and branch', () => {
    assert.strictEqual(runName(BUILD), 'Build #42 - main');
  });

  it('should describe the build and the results', () => {
    const records = parseResults([batch('Users API', 10, 1)]);
    const build: BuildInfo = { ...BUILD, commitMessage: 'Fix refunds', jiraIssue: 'PAY-42', actor: 'ci-bot', prNumber: 17 };

    assert.strictEqual(
      runDescription(build, aggregate(records), 'MEDIUM'),
      [
        'Build: 42',
        'Branch: main',
        'Environment: staging',
        'Commit: abc1234',
        'Message: Fix refunds',
        'Jira: PAY-42',
        'Triggered by: ci-bot',
        'Pull request: #17',
        '',
        'Results: 9/10 passed (90.00%)',
        'Risk: MEDIUM',
      ].join('\n')
    );
  });

  it('should format TestRail timespans', () => {
    assert.strictEqual(formatElapsed(0), undefined);
    assert.strictEqual(formatElapsed(Number.NaN), undefined);
    assert.strictEqual(formatElapsed(400), '1s');
    assert.strictEqual(formatElapsed(5_000), '5s');
    assert.strictEqual(formatElapsed(65_000), '1m 5s');
    assert.strictEqual(formatElapsed(3_600_000), '1h');
    assert.strictEqual(formatElapsed(3_725_000), '1h 2m 5s');
  });

  it('should comment passed and failed outline rows', () => {
    const [passed, failed] = parseResults([
      feature('Users API', [
        outlineRow('create user', [step('status 201', 'passed', 1250)]),
        outlineRow('create user', [step('status 201', 'failed', 10)]),
      ]),
    ]);
    assert.ok(passed && failed);

    assert.strictEqual(resultComment(passed), 'Users API / create user (example 1)\nPassed in 1.25s');
    assert.strictEqual(resultComment(failed), 'Users API / create user (example 2)\nFailed: Step "* status 201" was failed');
  });
});
