/**
 * Test Helpers
 *
 * Request and response helpers for the API tests.
 */

import type { z } from 'zod';
import type { HistoryEntry } from '../../src/types/index.js';
import type { HistoryStore } from '../../src/services/history/index.js';

export const seeders = {
  async history(store: HistoryStore, entries: readonly HistoryEntry[]): Promise<void> {
    for (const entry of entries) {
      await store.append(entry);
    }
  },
};

/**
 * Decode a JSON body against the expected shape
 */
export async function readBody<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.output<T>> {
  const body: unknown = await response.json();
  return schema.parse(body);
}

/**
 * Minimal client bound to a (lazily known) server URL
 */
export function createTestClient(server: { readonly serverUrl: string }, defaultHeaders: Record<string, string> = {}) {
  return {
    async get(path: string, headers: Record<string, string> = {}): Promise<Response> {
      return fetch(`${server.serverUrl}${path}`, {
        method: 'GET',
        headers: { Accept: 'application/json', ...defaultHeaders, ...headers },
      });
    },
  };
}
