/**
 * Result file discovery and loading
 */

import { existsSync, readdirSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { ResultRecord } from '../../types/index.js';
import { MalformedResultError, errorMessage } from '../../errors.js';
import { createModuleLogger } from '../../utils/logger.js';
import { parseResultDocuments } from './result-parser.js';
import type { ResultDocument } from './result-parser.js';

const logger = createModuleLogger('services:result-loader');

/**
 * Report directories searched when no file is given, in order
 */
const REPORT_DIRECTORIES = [
  'target/karate-reports',
  'src/test/java/target/karate-reports',
  'target/cucumber-reports',
];

function jsonReportsIn(directory: string): string[] {
  if (!existsSync(directory)) {
    return [];
  }
  return readdirSync(directory)
    .filter((name) => name.endsWith('.json') && !name.startsWith('karate-summary'))
    .sort()
    .map((name) => join(directory, name));
}

/**
 * Locate runner output: a combined `karate.json` at the root wins, otherwise every
 * Cucumber JSON report of the first report directory that has any.
 */
export function findDefaultResultFiles(cwd: string = process.cwd()): string[] {
  const combined = resolve(cwd, 'karate.json');
  if (existsSync(combined)) {
    return [combined];
  }

  for (const directory of REPORT_DIRECTORIES) {
    const reports = jsonReportsIn(resolve(cwd, directory));
    if (reports.length > 0) {
      return reports;
    }
  }

  return [];
}

/**
 * Read and parse one or more report files into a single record sequence
 */
export async function loadResultFiles(paths: readonly string[]): Promise<ResultRecord[]> {
  const documents: ResultDocument[] = [];

  for (const path of paths) {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new MalformedResultError(path, `cannot read file (${errorMessage(error)})`);
    }
    documents.push({ source: path, content });
  }

  const records = parseResultDocuments(documents);
  logger.info('Parsed runner output', { files: paths.length, records: records.length });
  return records;
}
