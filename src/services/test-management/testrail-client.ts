/**
 * TestRail API v2 client
 * fetch with basic auth, per-call timeout and paginated case listing
 */

import { z } from 'zod';
import type { RemoteCase } from '../../types/index.js';
import type { TestRailSettings } from '../../config/pipeline-config.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import type {
  CaseScope,
  CaseUpdate,
  CreatedRun,
  NewCase,
  NewRun,
  ResultEntry,
  TestManagementClient,
} from './types.js';

const PAGE_SIZE = 250;

/**
 * HTTP-level failure talking to TestRail
 */
export class TestRailApiError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly statusCode?: number,
    public readonly transient: boolean = false,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TestRailApiError';
  }
}

const caseSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    section_id: z.number().int(),
  })
  .catchall(z.unknown());

const casesPageSchema = z.union([
  z.array(caseSchema),
  z.object({
    cases: z.array(caseSchema),
    _links: z.object({ next: z.string().nullable().optional() }).optional(),
  }),
]);

const runSchema = z.object({
  id: z.number().int(),
  url: z.string().optional(),
});

const errorBodySchema = z.object({ error: z.string() });

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class TestRailClient implements TestManagementClient {
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly authorization: string;

  constructor(private readonly settings: TestRailSettings) {
    this.logger = createModuleLogger('services:testrail');
    this.baseUrl = `${settings.url.replace(/\/+$/, '')}/index.php?`;
    this.authorization = `Basic ${Buffer.from(`${settings.email}:${settings.apiKey}`).toString('base64')}`;
  }

  /**
   * Every case of the scope, following `_links.next` until exhausted
   */
  async listCases(scope: CaseScope): Promise<RemoteCase[]> {
    const filters = [
      scope.suiteId !== undefined ? `&suite_id=${scope.suiteId}` : '',
      scope.sectionId !== undefined ? `&section_id=${scope.sectionId}` : '',
    ].join('');

    let endpoint: string | undefined = `/api/v2/get_cases/${scope.projectId}${filters}&limit=${PAGE_SIZE}`;
    const cases: RemoteCase[] = [];

    while (endpoint) {
      const page = casesPageSchema.safeParse(await this.request('GET', endpoint));
      if (!page.success) {
        throw new TestRailApiError('Unexpected get_cases response shape', endpoint);
      }

      const rows = Array.isArray(page.data) ? page.data : page.data.cases;
      for (const row of rows) {
        cases.push(this.toRemoteCase(row));
      }

      endpoint = Array.isArray(page.data) ? undefined : page.data._links?.next ?? undefined;
    }

    this.logger.debug('Listed TestRail cases', { projectId: scope.projectId, count: cases.length });
    return cases;
  }

  async createCase(sectionId: number, payload: NewCase): Promise<RemoteCase> {
    const body: Record<string, unknown> = {
      title: payload.title,
      priority_id: payload.priority,
      custom_preconds: payload.preconditions,
      custom_steps: payload.steps,
      custom_expected: payload.expectedResult,
      [this.settings.automationField]: payload.automationKey,
    };
    if (payload.refs) {
      body.refs = payload.refs;
    }

    const created = await this.request('POST', `/api/v2/add_case/${sectionId}`, body);
    return this.toRemoteCase(this.decodeCase(created, 'add_case'));
  }

  async updateCase(remoteId: number, fields: CaseUpdate): Promise<RemoteCase> {
    const body: Record<string, unknown> = {};
    if (fields.title !== undefined) {
      body.title = fields.title;
    }
    if (fields.sectionId !== undefined) {
      body.section_id = fields.sectionId;
    }

    const updated = await this.request('POST', `/api/v2/update_case/${remoteId}`, body);
    return this.toRemoteCase(this.decodeCase(updated, 'update_case'));
  }

  async createRun(projectId: number, payload: NewRun): Promise<CreatedRun> {
    const body: Record<string, unknown> = {
      name: payload.name,
      description: payload.description,
      include_all: false,
      case_ids: payload.caseIds,
    };
    if (payload.suiteId !== undefined) {
      body.suite_id = payload.suiteId;
    }
    if (payload.refs) {
      body.refs = payload.refs;
    }

    const endpoint = `/api/v2/add_run/${projectId}`;
    const run = runSchema.safeParse(await this.request('POST', endpoint, body));
    if (!run.success) {
      throw new TestRailApiError('Unexpected add_run response shape', endpoint);
    }

    return { id: run.data.id, url: run.data.url ?? this.runUrl(run.data.id) };
  }

  async addResult(runId: number, remoteId: number, result: ResultEntry): Promise<void> {
    const body: Record<string, unknown> = {
      status_id: result.statusId,
      comment: result.comment,
    };
    if (result.elapsed) {
      body.elapsed = result.elapsed;
    }
    if (result.version) {
      body.version = result.version;
    }

    await this.request('POST', `/api/v2/add_result_for_case/${runId}/${remoteId}`, body);
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.request('GET', `/api/v2/get_project/${this.settings.projectId}`);
      return true;
    } catch (error) {
      this.logger.warn('TestRail connection check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  runUrl(runId: number): string {
    return `${this.baseUrl}/runs/view/${runId}`;
  }

  private decodeCase(data: unknown, endpoint: string): z.infer<typeof caseSchema> {
    const parsed = caseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TestRailApiError(`Unexpected ${endpoint} response shape`, endpoint);
    }
    return parsed.data;
  }

  private toRemoteCase(row: z.infer<typeof caseSchema>): RemoteCase {
    const key = row[this.settings.automationField];
    return {
      remoteId: row.id,
      automationKey: typeof key === 'string' && key.length > 0 ? key : undefined,
      title: row.title,
      sectionId: row.section_id,
    };
  }

  /**
   * `endpoint` is the part after `index.php?`, e.g. `/api/v2/get_cases/1`
   */
  private async request(method: 'GET' | 'POST', endpoint: string, body?: Record<string, unknown>): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.settings.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, {
        method,
        headers: {
          Authorization: this.authorization,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeoutId);
      const reason = error instanceof Error && error.name === 'AbortError'
        ? `timed out after ${this.settings.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error);
      throw new TestRailApiError(`${method} ${endpoint} failed: ${reason}`, endpoint, undefined, true, error);
    }

    try {
      const text = await response.text();

      if (!response.ok) {
        throw new TestRailApiError(
          `${method} ${endpoint} returned ${response.status}: ${this.describeError(text, response.statusText)}`,
          endpoint,
          response.status,
          isTransientStatus(response.status)
        );
      }

      if (!text) {
        return {};
      }
      const data: unknown = JSON.parse(text);
      return data;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private describeError(text: string, fallback: string): string {
    try {
      const parsed = errorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        return parsed.data.error;
      }
    } catch {
      // TestRail proxies answer with HTML on gateway errors
    }
    return text.slice(0, 200) || fallback;
  }
}
