/**
 * CLI Command: Flaky
 * List flaky tests from the history store
 */

import { ConfigurationError } from '../../errors.js';
import { findFlakyTests } from '../../services/run-aggregator/index.js';
import type { FlakyTest } from '../../services/run-aggregator/index.js';
import { flagValue, fraction, positiveInt } from '../args.js';
import { loadConfig, requireHistoryStore } from '../runtime.js';

export interface FlakyCommandArgs {
  branch?: string;
  days?: number;
  limit?: number;
  threshold?: number;
  json: boolean;
}

export function parseFlakyArgs(args: readonly string[]): FlakyCommandArgs {
  const parsed: FlakyCommandArgs = { json: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-b':
      case '--branch':
        parsed.branch = flagValue(args, i++, arg);
        break;
      case '--days':
        parsed.days = positiveInt(flagValue(args, i++, arg), arg);
        break;
      case '--limit':
        parsed.limit = positiveInt(flagValue(args, i++, arg), arg);
        break;
      case '--threshold':
        parsed.threshold = fraction(flagValue(args, i++, arg), arg);
        break;
      case '--json':
        parsed.json = true;
        break;
      default:
        throw new ConfigurationError(`Unknown argument ${arg ?? ''}`);
    }
  }

  return parsed;
}

function formatRow(test: FlakyTest): string {
  const score = `${(test.flakiness * 100).toFixed(0)}%`.padStart(5);
  return `${score}  ${String(test.failures).padStart(3)}/${String(test.runs).padEnd(3)} ${test.lastStatus.padEnd(7)} ${test.automationKey}`;
}

export async function executeFlakyCommand(args: readonly string[]): Promise<number> {
  const options = parseFlakyArgs(args);
  const config = loadConfig({ branch: options.branch });
  const { store, settings } = requireHistoryStore(config);

  try {
    const window = {
      maxEntries: options.limit ?? settings.maxEntries,
      days: options.days ?? settings.days,
      now: new Date(),
    };
    const history = await store.query({ branch: options.branch }, window);
    const flaky = findFlakyTests(history, options.threshold ?? settings.flakyThreshold, window);

    if (options.json) {
      console.log(JSON.stringify(flaky, null, 2));
      return 0;
    }

    if (flaky.length === 0) {
      console.log(`No flaky tests in the last ${history.length} runs`);
      return 0;
    }

    console.log(`Flaky tests over the last ${history.length} runs:`);
    console.log('score  fail/runs last    key');
    for (const test of flaky) {
      console.log(formatRow(test));
    }
    return 0;
  } finally {
    await store.close();
  }
}
