/**
 * End-to-end pipeline tests against in-process collaborators
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SyncPipeline } from '../../src/pipeline/index.js';
import type { SyncPipelineDependencies } from '../../src/pipeline/index.js';
import { parseEnv } from '../../src/config/env.js';
import { buildPipelineConfig } from '../../src/config/pipeline-config.js';
import type { PipelineConfig } from '../../src/config/pipeline-config.js';
import { SqliteHistoryStore } from '../../src/database/index.js';
import { renderFallbackNarrative } from '../../src/services/narrative/index.js';
import type { NarrativeSummarizer } from '../../src/services/narrative/index.js';
import type { NotificationContext, Notifier } from '../../src/services/notification/index.js';
import { parseResults } from '../../src/services/result-parser/index.js';
import type { ResultRecord, RiskLevel, RunSummary } from '../../src/types/index.js';
import { TestManagementUnavailableError } from '../../src/errors.js';
import { batch } from '../fixtures/cucumber.js';
import { InMemoryTestManagement } from '../fixtures/in-memory-test-management.js';
import { NOW, keyOf, seriesHistory } from '../fixtures/history.js';
import { UnreachableHistoryStore } from '../fixtures/unreachable-history-store.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function configWith(extra: Record<string, string> = {}): PipelineConfig {
  return buildPipelineConfig(
    parseEnv({
      TESTRAIL_URL: 'https://testrail.example.test',
      TESTRAIL_EMAIL: 'qa@example.test',
      TESTRAIL_API_KEY: 'test-secret',
      TESTRAIL_PROJECT_ID: '1',
      TESTRAIL_SECTION_ID: '10',
      SYNC_RETRY_BACKOFF_MS: '0',
      BUILD_NUMBER: '42',
      BRANCH_NAME: 'main',
      ...extra,
    })
  );
}

function pipelineWith(deps: Partial<SyncPipelineDependencies> = {}, config: PipelineConfig = configWith()) {
  const client = deps.client instanceof InMemoryTestManagement ? deps.client : new InMemoryTestManagement();
  return { client, pipeline: new SyncPipeline(config, { now: () => NOW, ...deps, client }) };
}

class StubSummarizer implements NarrativeSummarizer {
  readonly calls: Array<{ summary: RunSummary; failing: readonly ResultRecord[]; riskLevel: RiskLevel }> = [];

  constructor(private readonly outcome: string | Error) {}

  async summarize(summary: RunSummary, failing: readonly ResultRecord[], riskLevel: RiskLevel): Promise<string> {
    this.calls.push({ summary, failing, riskLevel });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

class RecordingNotifier implements Notifier {
  readonly sent: Array<{ text: string; context?: NotificationContext }> = [];

  constructor(private readonly failure?: Error) {}

  async notify(text: string, context?: NotificationContext): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ text, context });
  }
}

describe('SyncPipeline', () => {
  it('should create cases, submit one run and report counts', async () => {
    const { client, pipeline } = pipelineWith({}, configWith({ QUALITY_GATE_MAX_RISK: 'MEDIUM' }));

    const report = await pipeline.process(parseResults([batch('Users API', 10, 1)]));

    assert.match(report.executionId, UUID);
    assert.deepStrictEqual(report.counts, { parsed: 10, reconciled: 10, submitted: 10, unsynced: 0, errors: 0 });
    assert.strictEqual(report.summary.passRate, 90);
    assert.strictEqual(report.riskLevel, 'MEDIUM');
    assert.deepStrictEqual(report.gate, { maxRisk: 'MEDIUM', passed: true });
    assert.strictEqual(report.run?.name, 'Build #42 - main');
    assert.strictEqual(report.run?.url, 'https://testrail.example.test/index.php?/runs/view/1');
    assert.deepStrictEqual(report.unsynced, []);
    assert.deepStrictEqual(report.warnings, []);
    assert.strictEqual(report.narrative, undefined);
    assert.strictEqual(Object.keys(report.flakiness).length, 10);
    assert.ok(Object.values(report.flakiness).every((score) => score === 0));

    assert.strictEqual(client.createdCases.length, 10);
    assert.strictEqual(client.runs.length, 1);
    assert.strictEqual(client.results.length, 10);
  });

  it('should reuse cases on a second run', async () => {
    const client = new InMemoryTestManagement();
    const { pipeline } = pipelineWith({ client });
    const records = parseResults([batch('Users API', 3, 0)]);

    await pipeline.process(records);
    const second = await pipeline.process(records);

    assert.strictEqual(client.createdCases.length, 3);
    assert.strictEqual(client.runs.length, 2);
    assert.strictEqual(second.counts.reconciled, 3);
    assert.deepStrictEqual(
      client.runs.map((run) => run.payload.caseIds),
      [client.runs[0]?.payload.caseIds, client.runs[0]?.payload.caseIds]
    );
  });

  it('should fail the gate when risk exceeds the maximum', async () => {
    const { pipeline } = pipelineWith({}, configWith({ QUALITY_GATE_MAX_RISK: 'MEDIUM' }));

    const report = await pipeline.process(parseResults([batch('Users API', 10, 3)]));

    assert.strictEqual(report.riskLevel, 'CRITICAL');
    assert.deepStrictEqual(report.gate, { maxRisk: 'MEDIUM', passed: false });
  });

  it('should report a case that cannot be created once', async () => {
    const client = new InMemoryTestManagement().rejectCaseTitle('case 2');
    const { pipeline } = pipelineWith({ client });

    const report = await pipeline.process(parseResults([batch('Users API', 3, 0)]));

    assert.deepStrictEqual(report.counts, { parsed: 3, reconciled: 2, submitted: 2, unsynced: 1, errors: 1 });
    assert.strictEqual(report.unsynced.length, 1);
    assert.strictEqual(report.unsynced[0]?.automationKey, 'users api::case 2');
    assert.strictEqual(report.unsynced[0]?.stage, 'reconcile');
    assert.strictEqual(client.results.length, 2);
  });

  it('should report results the run rejects', async () => {
    const client = new InMemoryTestManagement().rejectResultsFor(12);
    for (const [scenario, remoteId] of [['case 1', 11], ['case 2', 12], ['case 3', 13]] as const) {
      client.seed({ remoteId, automationKey: keyOf(scenario), title: scenario, sectionId: 10 });
    }
    const { pipeline } = pipelineWith({ client });

    const report = await pipeline.process(parseResults([batch('Users API', 3, 0)]));

    assert.strictEqual(client.createdCases.length, 0);
    assert.deepStrictEqual(report.counts, { parsed: 3, reconciled: 3, submitted: 2, unsynced: 1, errors: 1 });
    assert.strictEqual(report.unsynced[0]?.automationKey, 'users api::case 2');
    assert.strictEqual(report.unsynced[0]?.stage, 'submit');
  });

  it('should stop when the case directory is unreachable', async () => {
    const client = new InMemoryTestManagement().failNext('listCases', 3);
    const { pipeline } = pipelineWith({ client });

    await assert.rejects(
      () => pipeline.process(parseResults([batch('Users API', 2, 0)])),
      TestManagementUnavailableError
    );
    assert.strictEqual(client.calls.listCases, 3);
    assert.strictEqual(client.runs.length, 0);
  });

  it('should score flakiness from history and record the run', async () => {
    const history = SqliteHistoryStore.open(':memory:');
    for (const entry of seriesHistory('case 1', ['passed', 'failed'])) {
      await history.append(entry);
    }
    const { pipeline } = pipelineWith({ history });

    const report = await pipeline.process(parseResults([batch('Users API', 2, 0)]));

    assert.deepStrictEqual(report.flakiness, { 'users api::case 1': 0.5, 'users api::case 2': 0 });

    const stored = await history.listEntries({ branch: 'main' });
    assert.strictEqual(stored.total, 3);
    assert.ok(stored.entries.some((entry) => entry.executionId === report.executionId && entry.runId === 1));
    await history.close();
  });

  it('should pass the narrative to the notifier', async () => {
    const summarizer = new StubSummarizer('Two tests failed.');
    const notifier = new RecordingNotifier();
    const { pipeline } = pipelineWith({ summarizer, notifier });

    const report = await pipeline.process(parseResults([batch('Users API', 4, 2)]));

    assert.strictEqual(report.narrative, 'Two tests failed.');
    assert.strictEqual(summarizer.calls.length, 1);
    assert.deepStrictEqual(summarizer.calls[0]?.failing.map((r) => r.scenarioName), ['case 3', 'case 4']);
    assert.strictEqual(notifier.sent.length, 1);
    assert.strictEqual(notifier.sent[0]?.text, 'Two tests failed.');
    assert.strictEqual(notifier.sent[0]?.context?.runUrl, report.run?.url);
    assert.strictEqual(notifier.sent[0]?.context?.build.buildNumber, '42');
    assert.strictEqual(notifier.sent[0]?.context?.unsynced, 0);
  });

  it('should notify with the fallback narrative without a summarizer', async () => {
    const notifier = new RecordingNotifier();
    const { pipeline } = pipelineWith({ notifier });
    const records = parseResults([batch('Users API', 4, 2)]);

    const report = await pipeline.process(records);

    const failing = records.filter((r) => r.status === 'failed');
    assert.strictEqual(notifier.sent[0]?.text, renderFallbackNarrative(report.summary, failing, report.riskLevel));
  });

  it('should turn collaborator failures into warnings', async () => {
    const { pipeline } = pipelineWith({
      history: new UnreachableHistoryStore(),
      summarizer: new StubSummarizer(new Error('LLM down')),
      notifier: new RecordingNotifier(new Error('webhook returned 500')),
      warnings: ['history unavailable: cannot open replica'],
    });

    const report = await pipeline.process(parseResults([batch('Users API', 2, 0)]));

    assert.strictEqual(report.counts.submitted, 2);
    assert.strictEqual(report.narrative, undefined);
    assert.deepStrictEqual(report.flakiness, { 'users api::case 1': 0, 'users api::case 2': 0 });
    assert.deepStrictEqual(report.warnings, [
      'history unavailable: cannot open replica',
      'history unavailable: flakiness query failed: disk I/O error',
      'history unavailable: append failed: disk I/O error',
      'summarizer unavailable: LLM down',
      'notifier unavailable: webhook returned 500',
    ]);
  });

  it('should parse raw documents before processing', async () => {
    const { pipeline } = pipelineWith();

    const report = await pipeline.run([{ source: 'users.json', content: JSON.stringify([batch('Users API', 2, 1)]) }]);

    assert.strictEqual(report.counts.parsed, 2);
    assert.strictEqual(report.summary.failed, 1);
  });
});
