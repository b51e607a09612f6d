/**
 * Case reconciler tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CaseReconciler } from '../../src/services/case-reconciler/index.js';
import {
  buildNewCase,
  caseTitle,
  inferPriority,
  issueRefs,
} from '../../src/services/case-reconciler/index.js';
import { deriveAutomationKey } from '../../src/services/automation-key/index.js';
import { parseResults } from '../../src/services/result-parser/index.js';
import { TestManagementUnavailableError } from '../../src/errors.js';
import { background, feature, outlineRow, scenario, step } from '../fixtures/cucumber.js';
import { InMemoryTestManagement } from '../fixtures/in-memory-test-management.js';

const OPTIONS = { projectId: 1, sectionId: 10, retry: { maxAttempts: 3, initialBackoffMs: 0 } };

function outlineRecords() {
  return parseResults([
    feature('Users API', [
      outlineRow('create user', [step('status 201')]),
      outlineRow('create user', [step('status 201')]),
      outlineRow('create user', [step('status 201')]),
    ]),
  ]);
}

describe('CaseReconciler', () => {
  it('should create one case per outline row, then reuse them', async () => {
    const remote = new InMemoryTestManagement();
    const reconciler = new CaseReconciler(remote, OPTIONS);

    const first = await reconciler.reconcile(outlineRecords());

    assert.strictEqual(first.created, 3);
    assert.strictEqual(first.caseMap.size, 3);
    assert.deepStrictEqual(
      remote.createdCases.map((c) => [c.title, c.automationKey]),
      [
        ['create user [example 1]', 'users api::create user#0'],
        ['create user [example 2]', 'users api::create user#1'],
        ['create user [example 3]', 'users api::create user#2'],
      ]
    );

    const second = await reconciler.reconcile(outlineRecords());

    assert.strictEqual(second.created, 0);
    assert.strictEqual(second.unchanged, 3);
    assert.strictEqual(remote.calls.createCase, 3);
    assert.deepStrictEqual(second.caseMap, first.caseMap);
  });

  it('should list the directory once per pass', async () => {
    const remote = new InMemoryTestManagement();

    await new CaseReconciler(remote, OPTIONS).reconcile(outlineRecords());

    assert.strictEqual(remote.calls.listCases, 1);
  });

  it('should create a single case for records sharing a key', async () => {
    const remote = new InMemoryTestManagement();
    const records = parseResults([
      feature('Users API', [scenario('Get User', [step('status 200')]), scenario('get  user', [step('status 200')])]),
    ]);

    const result = await new CaseReconciler(remote, OPTIONS).reconcile(records);

    assert.strictEqual(result.created, 1);
    assert.strictEqual(remote.createdCases[0]?.title, 'Get User');
    assert.strictEqual(result.caseMap.get(deriveAutomationKey('users api', 'get user')), 100);
  });

  it('should match existing cases by normalised key and update drifted ones', async () => {
    const remote = new InMemoryTestManagement()
      .seed({ remoteId: 7, automationKey: 'Users API::get user', title: 'get user', sectionId: 10 })
      .seed({ remoteId: 8, automationKey: 'users api::delete user', title: 'remove user', sectionId: 99 });
    const records = parseResults([
      feature('Users API', [scenario('get user', [step('status 200')]), scenario('delete user', [step('status 204')])]),
    ]);

    const result = await new CaseReconciler(remote, OPTIONS).reconcile(records);

    assert.strictEqual(result.unchanged, 1);
    assert.strictEqual(result.updated, 1);
    assert.strictEqual(result.created, 0);
    assert.deepStrictEqual(remote.updates, [{ remoteId: 8, fields: { title: 'delete user', sectionId: 10 } }]);
    assert.strictEqual(result.caseMap.get(deriveAutomationKey('Users API', 'get user')), 7);
  });

  it('should retry transient failures', async () => {
    const remote = new InMemoryTestManagement().failNext('createCase', 2);
    const records = parseResults([feature('Users API', [scenario('get user', [step('status 200')])])]);

    const result = await new CaseReconciler(remote, OPTIONS).reconcile(records);

    assert.strictEqual(result.created, 1);
    assert.strictEqual(result.errors.length, 0);
    assert.strictEqual(remote.calls.createCase, 3);
  });

  it('should isolate a key that cannot be created', async () => {
    const remote = new InMemoryTestManagement().rejectCaseTitle('broken case');
    const records = parseResults([
      feature('Users API', [scenario('broken case', [step('status 200')]), scenario('get user', [step('status 200')])]),
    ]);

    const result = await new CaseReconciler(remote, OPTIONS).reconcile(records);

    assert.strictEqual(result.created, 1);
    assert.strictEqual(result.errors.length, 1);
    assert.strictEqual(result.errors[0]?.automationKey, 'users api::broken case');
    assert.strictEqual(remote.calls.createCase, 2);
    assert.deepStrictEqual(
      result.unsynced.map((u) => [u.automationKey, u.stage]),
      [['users api::broken case', 'reconcile']]
    );
    assert.strictEqual(result.caseMap.has(deriveAutomationKey('Users API', 'broken case')), false);
  });

  it('should fail the pass when the directory cannot be listed', async () => {
    const remote = new InMemoryTestManagement().failNext('listCases', 5);
    const records = parseResults([feature('Users API', [scenario('get user', [step('status 200')])])]);

    await assert.rejects(
      () => new CaseReconciler(remote, OPTIONS).reconcile(records),
      (error: unknown) => error instanceof TestManagementUnavailableError && error.fatal
    );
    assert.strictEqual(remote.calls.listCases, 3);
    assert.strictEqual(remote.calls.createCase, 0);
  });
});

describe('Case content', () => {
  const [record] = parseResults([
    feature('Payments API', [
      background([step('url baseUrl', 'passed', 1, { keyword: '* ' })]),
      scenario(
        'refund payment',
        [
          step("path 'refunds'", 'passed', 1, { keyword: 'Given ' }),
          step('method post', 'passed', 1, { keyword: 'When ' }),
          step('status 201', 'passed', 1, { keyword: 'Then ' }),
          step('match response.state == "done"', 'passed', 1, { keyword: 'And ' }),
        ],
        { tags: ['regression', 'PAY-42'] }
      ),
    ]),
  ]);

  it('should number preconditions and steps', () => {
    assert.ok(record);
    const payload = buildNewCase(record, deriveAutomationKey('Payments API', 'refund payment'));

    assert.strictEqual(payload.title, 'refund payment');
    assert.strictEqual(payload.preconditions, '1. * url baseUrl');
    assert.strictEqual(payload.steps, "1. Given path 'refunds'\n2. When method post\n3. Then status 201\n4. And match response.state == \"done\"");
    assert.strictEqual(payload.expectedResult, '- status 201\n- match response.state == "done"');
    assert.strictEqual(payload.refs, 'PAY-42');
    assert.strictEqual(payload.priority, 3);
  });

  it('should infer priority from tags and names', () => {
    assert.strictEqual(inferPriority({ scenarioName: 'login', tags: new Set(['Smoke']) }), 5);
    assert.strictEqual(inferPriority({ scenarioName: 'critical path checkout', tags: new Set() }), 5);
    assert.strictEqual(inferPriority({ scenarioName: 'login with wrong password', tags: new Set(['negative']) }), 2);
    assert.strictEqual(inferPriority({ scenarioName: 'list users', tags: new Set(['regression']) }), 3);
  });

  it('should title outline rows with a 1-based example number', () => {
    assert.strictEqual(caseTitle({ scenarioName: 'create user', exampleIndex: 0 }), 'create user [example 1]');
    assert.strictEqual(caseTitle({ scenarioName: 'create user' }), 'create user');
  });

  it('should only take Jira-style tags as refs', () => {
    assert.strictEqual(issueRefs({ tags: new Set(['smoke', 'QA-1', 'PAY-42', 'pay-7']) }), 'QA-1,PAY-42');
    assert.strictEqual(issueRefs({ tags: new Set(['smoke']) }), undefined);
  });
});
