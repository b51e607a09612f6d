/**
 * Result Parser
 * Turns Cucumber-style JSON runner output into canonical result records.
 * One record per plain scenario and one per expanded Scenario Outline row.
 */

import type { ResultRecord, StepRecord } from '../../types/index.js';
import { MalformedResultError, errorMessage } from '../../errors.js';
import { featureSchema } from './schemas.js';
import type { RawElement, RawExamples, RawFeature, RawStep } from './schemas.js';

/**
 * One runner output document. `content` is either the raw JSON text or an
 * already-decoded value.
 */
export interface ResultDocument {
  source: string;
  content: unknown;
}

export interface ParseOptions {
  /**
   * Label used in error messages when a document carries neither uri nor name
   */
  source?: string;
}

const NON_FAILING_STEP_STATUSES = new Set(['passed', 'skipped']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decode(document: ResultDocument): unknown {
  if (typeof document.content !== 'string') {
    return document.content;
  }
  try {
    const decoded: unknown = JSON.parse(document.content);
    return decoded;
  } catch (error) {
    throw new MalformedResultError(document.source, `invalid JSON (${errorMessage(error)})`);
  }
}

/**
 * Karate and Cucumber write either an array of features, a single feature, or `{ features: [...] }`
 */
function extractFeatures(value: unknown, source: string): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value)) {
    if ('elements' in value) {
      return [value];
    }
    const features = value.features;
    if (Array.isArray(features)) {
      return features;
    }
  }
  throw new MalformedResultError(
    source,
    'expected an array of features, a feature object or an object with a "features" array'
  );
}

function documentLabel(raw: unknown, source: string, index: number): string {
  if (isRecord(raw)) {
    if (typeof raw.uri === 'string' && raw.uri.length > 0) {
      return raw.uri;
    }
    if (typeof raw.name === 'string' && raw.name.trim().length > 0) {
      return raw.name.trim();
    }
  }
  return `${source}[${index}]`;
}

function validateFeature(raw: unknown, label: string): RawFeature {
  const parsed = featureSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new MalformedResultError(label, issue?.message ?? 'invalid feature document', issue?.path ?? []);
  }
  return parsed.data;
}

function toStepRecord(step: RawStep): StepRecord {
  return {
    keyword: step.keyword,
    text: step.name,
    status: step.result.status.toLowerCase(),
    durationMs: (step.result.duration ?? 0) / 1e6,
    errorMessage: step.result.error_message,
  };
}

/**
 * The Examples block an outline row was expanded from: by id when the runner
 * reports ids, else by the row's position across the blocks' data rows
 */
function examplesBlockOf(element: RawElement, rowIndex: number): RawExamples | undefined {
  const blocks = element.examples ?? [];
  const { id } = element;
  if (id !== undefined) {
    const byId = blocks.find((block) => block.id !== undefined && id.startsWith(`${block.id};`));
    if (byId) {
      return byId;
    }
  }

  let firstRow = 0;
  for (const block of blocks) {
    // Blocks without rows stand for a single example
    const size = block.rows ? Math.max(block.rows.length - 1, 0) : 1;
    if (rowIndex < firstRow + size) {
      return block;
    }
    firstRow += size;
  }
  return undefined;
}

function collectTags(element: RawElement, exampleIndex: number | undefined): Set<string> {
  const tags = new Set<string>();
  const block = exampleIndex === undefined ? undefined : examplesBlockOf(element, exampleIndex);
  for (const tag of [...element.tags, ...(block?.tags ?? [])]) {
    const name = tag.name.trim().replace(/^@/, '');
    if (name) {
      tags.add(name);
    }
  }
  return tags;
}

function isOutlineRow(element: RawElement): boolean {
  return /outline/i.test(element.keyword) || element.type.toLowerCase() === 'scenario_outline';
}

/**
 * First failing step decides the error message; an explicit element status counts too
 */
function resolveOutcome(
  element: RawElement,
  steps: StepRecord[]
): Pick<ResultRecord, 'status' | 'errorMessage'> {
  const failing = steps.find((step) => !NON_FAILING_STEP_STATUSES.has(step.status));
  if (failing) {
    return {
      status: 'failed',
      errorMessage:
        failing.errorMessage ?? `Step "${`${failing.keyword.trim()} ${failing.text}`.trim()}" was ${failing.status}`,
    };
  }

  const reported = element.status?.toLowerCase();
  if (reported && reported !== 'passed') {
    return { status: 'failed', errorMessage: `Scenario reported status "${reported}"` };
  }

  return { status: 'passed' };
}

function parseFeature(feature: RawFeature): ResultRecord[] {
  const records: ResultRecord[] = [];
  const outlineRows = new Map<string, number>();
  let backgroundSteps: StepRecord[] = [];

  for (const element of feature.elements) {
    const steps = element.steps.map(toStepRecord);

    if (element.type.toLowerCase() === 'background') {
      backgroundSteps = steps;
      continue;
    }

    let exampleIndex: number | undefined;
    if (isOutlineRow(element)) {
      exampleIndex = outlineRows.get(element.name) ?? 0;
      outlineRows.set(element.name, exampleIndex + 1);
    }

    const executed = [...backgroundSteps, ...steps];
    const durationMs = executed.reduce((total, step) => total + step.durationMs, 0);

    records.push({
      featureName: feature.name,
      scenarioName: element.name,
      exampleIndex,
      tags: collectTags(element, exampleIndex),
      ...resolveOutcome(element, executed),
      durationMs,
      steps,
      backgroundSteps,
      sourceUri: feature.uri,
      description: element.description?.trim() || undefined,
    });

    // A background element precedes each scenario it applies to
    backgroundSteps = [];
  }

  return records;
}

/**
 * Parse several runner documents into one ordered record sequence. Any malformed
 * document, or a repeated (feature, scenario, example row), rejects the whole batch.
 */
export function parseResultDocuments(documents: readonly ResultDocument[]): ResultRecord[] {
  const records: ResultRecord[] = [];
  const seen = new Map<string, string>();

  for (const document of documents) {
    const features = extractFeatures(decode(document), document.source);

    features.forEach((raw, index) => {
      const label = documentLabel(raw, document.source, index);
      const feature = validateFeature(raw, label);

      for (const record of parseFeature(feature)) {
        const identity = [record.featureName, record.scenarioName, record.exampleIndex ?? ''].join('\u0000');
        const firstSeenIn = seen.get(identity);
        if (firstSeenIn !== undefined) {
          const row = record.exampleIndex === undefined ? '' : ` (example ${record.exampleIndex})`;
          throw new MalformedResultError(
            label,
            `duplicate scenario "${record.scenarioName}"${row} in feature "${record.featureName}" (first seen in ${firstSeenIn})`
          );
        }
        seen.set(identity, label);
        records.push(record);
      }
    });
  }

  return records;
}

/**
 * Parse one runner output (JSON text or decoded value)
 */
export function parseResults(input: unknown, options: ParseOptions = {}): ResultRecord[] {
  return parseResultDocuments([{ source: options.source ?? 'input', content: input }]);
}
