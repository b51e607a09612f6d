#!/usr/bin/env node
/**
 * CLI entry point for the QA result sync
 */

import { PipelineError } from '../errors.js';
import { logger } from '../utils/logger.js';
import {
  EXIT_FATAL,
  executeCheckCommand,
  executeFlakyCommand,
  executeServeCommand,
  executeSyncCommand,
} from './commands/index.js';

const args = process.argv.slice(2);

async function main(): Promise<number> {
  const [command, ...rest] = args;

  switch (command) {
    case 'sync':
      return executeSyncCommand(rest);
    case 'check':
      return executeCheckCommand(rest);
    case 'flaky':
      return executeFlakyCommand(rest);
    case 'serve':
      return executeServeCommand(rest);
    case undefined:
    case '-h':
    case '--help':
      displayMainHelp();
      return 0;
    default:
      console.error(`Unknown command "${command}"\n`);
      displayMainHelp();
      return EXIT_FATAL;
  }
}

/**
 * Display main CLI help
 */
function displayMainHelp(): void {
  console.log(`
QA Result Sync
==============

Syncs Karate / Cucumber JSON results to TestRail, tracks run history and flakiness.

Usage:
  qa-sync <command> [options]

Commands:
  sync [files...]         Parse results, reconcile cases, submit a run
  check                   Verify configuration and TestRail connectivity
  flaky                   List flaky tests from the history store
                          (--branch, --days, --limit, --threshold, --json)
  serve                   Start the read-only history API

Options:
  -h, --help              Show this help message

Examples:
  qa-sync sync target/karate-reports/*.json --branch main
  qa-sync sync --project payments --report sync-report.md
  qa-sync flaky --branch main --days 14

For more information on a specific command, use:
  qa-sync sync --help
`);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof PipelineError) {
      logger.error({ code: error.code }, error.message);
      console.error(`Error: ${error.message}`);
    } else {
      logger.error(error instanceof Error ? error : new Error(String(error)), 'Unexpected failure');
      console.error('Error:', error);
    }
    process.exitCode = EXIT_FATAL;
  });
