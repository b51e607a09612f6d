/**
 * CLI Command: Sync
 * Parse runner output, sync cases and results, report
 */

import { writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { PipelineReport } from '../../types/index.js';
import { requireTestRail } from '../../config/pipeline-config.js';
import { ConfigurationError } from '../../errors.js';
import { SyncPipeline } from '../../pipeline/index.js';
import { findDefaultResultFiles, loadResultFiles } from '../../services/result-parser/index.js';
import { TestRailClient } from '../../services/test-management/index.js';
import { renderMarkdownReport } from '../../services/narrative/index.js';
import { flagValue } from '../args.js';
import { createCollaborators, loadConfig } from '../runtime.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_GATE_FAILED = 2;

export function displaySyncHelp(): void {
  console.log(`
Usage:
  qa-sync sync [options] [result-files...]

Arguments:
  result-files            Cucumber / Karate JSON reports. Without any, karate.json or
                          target/karate-reports/*.json is used

Options:
  -p, --project <key>     Project from TESTRAIL_PROJECTS_FILE
  -b, --branch <name>     Branch recorded in history (default: BRANCH_NAME)
  -r, --report <file>     Write the report (.json as JSON, otherwise markdown)
  -h, --help              Show this help message

Exit codes:
  0  synced
  1  fatal error (malformed results, TestRail unreachable, bad configuration)
  2  quality gate failed (QUALITY_GATE_MAX_RISK)
`);
}

export interface SyncCommandArgs {
  files: string[];
  projectKey?: string;
  branch?: string;
  reportPath?: string;
  help: boolean;
}

export function parseSyncArgs(args: readonly string[]): SyncCommandArgs {
  const parsed: SyncCommandArgs = { files: [], help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;

      case '-p':
      case '--project':
        parsed.projectKey = flagValue(args, i++, arg);
        break;

      case '-b':
      case '--branch':
        parsed.branch = flagValue(args, i++, arg);
        break;

      case '-r':
      case '--report':
        parsed.reportPath = flagValue(args, i++, arg);
        break;

      default:
        if (arg === undefined) {
          break;
        }
        if (arg.startsWith('-')) {
          throw new ConfigurationError(`Unknown option ${arg}`);
        }
        parsed.files.push(arg);
    }
  }

  return parsed;
}

/**
 * Exit code for a finished run
 */
export function exitCodeFor(report: PipelineReport): number {
  return report.gate && !report.gate.passed ? EXIT_GATE_FAILED : EXIT_OK;
}

function printReport(report: PipelineReport): void {
  const { counts, summary } = report;
  console.log(`\nExecution ${report.executionId}`);
  console.log(`  Results:    ${summary.passed}/${summary.total} passed (${summary.passRate.toFixed(2)}%)`);
  console.log(`  Risk:       ${report.riskLevel}`);
  if (report.run) {
    console.log(`  Run:        ${report.run.url}`);
  }
  console.log(
    `  Synced:     parsed ${counts.parsed}, reconciled ${counts.reconciled}, submitted ${counts.submitted}, ` +
      `unsynced ${counts.unsynced}, errors ${counts.errors}`
  );
  for (const record of report.unsynced) {
    console.log(`  ! ${record.automationKey} (${record.stage}): ${record.reason}`);
  }
  for (const warning of report.warnings) {
    console.log(`  warning: ${warning}`);
  }
  if (report.gate) {
    console.log(`  Gate:       ${report.gate.passed ? 'passed' : 'FAILED'} (max ${report.gate.maxRisk})`);
  }
}

async function writeReport(path: string, report: PipelineReport): Promise<void> {
  const content = extname(path).toLowerCase() === '.json'
    ? JSON.stringify(report, null, 2)
    : renderMarkdownReport(report);
  await writeFile(path, `${content}\n`, 'utf-8');
}

export async function executeSyncCommand(args: readonly string[]): Promise<number> {
  const options = parseSyncArgs(args);
  if (options.help) {
    displaySyncHelp();
    return EXIT_OK;
  }

  const config = loadConfig({ projectKey: options.projectKey, branch: options.branch });
  const testRail = requireTestRail(config);

  const files = options.files.length > 0 ? options.files : findDefaultResultFiles(process.cwd());
  if (files.length === 0) {
    throw new ConfigurationError('No result files given and none found in karate.json or target/*-reports');
  }

  const records = await loadResultFiles(files);
  const collaborators = createCollaborators(config);

  try {
    const pipeline = new SyncPipeline(config, {
      client: new TestRailClient(testRail),
      history: collaborators.history,
      summarizer: collaborators.summarizer,
      notifier: collaborators.notifier,
      warnings: collaborators.warnings,
    });

    const report = await pipeline.process(records);
    printReport(report);

    if (options.reportPath) {
      await writeReport(options.reportPath, report);
      console.log(`  Report:     ${options.reportPath}`);
    }

    return exitCodeFor(report);
  } finally {
    await collaborators.history?.close();
  }
}
