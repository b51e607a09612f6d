/**
 * Test Server Setup
 *
 * Starts the history API on a free local port over an in-memory history store.
 */

import { before, after } from 'node:test';
import type { Application } from 'express';
import { createServer } from '../../src/server/factory.js';
import type { ServerConfig, ServerDependencies } from '../../src/server/types.js';
import { SqliteHistoryStore } from '../../src/database/index.js';
import type { HistoryStore } from '../../src/services/history/index.js';

export interface TestServerInstance {
  app: Application;

  /**
   * Base URL, known once started
   */
  serverUrl: string;

  history: HistoryStore;

  server: ReturnType<typeof createServer>;

  start: () => Promise<void>;

  stop: () => Promise<void>;
}

export interface TestServerOptions {
  /**
   * Store to serve; an empty in-memory store by default
   */
  history?: HistoryStore;

  flakyThreshold?: number;

  now?: () => Date;
}

export function createTestServer(options: TestServerOptions = {}): TestServerInstance {
  const history = options.history ?? SqliteHistoryStore.open(':memory:');

  const serverConfig: ServerConfig = {
    port: 0,
    host: '127.0.0.1',
    enableCors: true,
    enableHelmet: false,
    enableRequestLogging: true,
  };

  const dependencies: ServerDependencies = {
    history,
    flakyThreshold: options.flakyThreshold,
    now: options.now,
  };

  const server = createServer(serverConfig, dependencies);
  const instance: TestServerInstance = {
    app: server.getApp(),
    serverUrl: '',
    history,
    server,
    async start() {
      await server.start();
      instance.serverUrl = `http://127.0.0.1:${server.port ?? 0}`;
    },
    async stop() {
      await server.stop();
      await history.close();
    },
  };
  return instance;
}

/**
 * Start a server before the suite's tests and stop it afterwards. `seed` runs
 * against the store before the server starts.
 *
 * ```ts
 * describe('History API', () => {
 *   const server = withTestServer({}, async (history) => { await history.append(entry); });
 *
 *   it('lists runs', async () => {
 *     const response = await fetch(`${server.serverUrl}/api/history/runs`);
 *   });
 * });
 * ```
 */
export function withTestServer(
  options: TestServerOptions = {},
  seed?: (history: HistoryStore) => Promise<void>
): { readonly serverUrl: string } {
  let instance: TestServerInstance | undefined;

  before(async () => {
    instance = createTestServer(options);
    await seed?.(instance.history);
    await instance.start();
  });

  after(async () => {
    await instance?.stop();
    instance = undefined;
  });

  return {
    get serverUrl() {
      return instance?.serverUrl ?? '';
    },
  };
}
