/**
 * Automation key derivation
 *
 * The key is a pure function of (feature, scenario, example row): the same logical
 * test maps to the same remote case on every run.
 */

import type { AutomationKey, ResultRecord } from '../../types/index.js';

export const KEY_SEPARATOR = '::';

/**
 * Trim, lowercase, collapse inner whitespace
 */
export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function isAutomationKey(value: string): value is AutomationKey {
  const separator = value.indexOf(KEY_SEPARATOR);
  return separator > 0 && separator + KEY_SEPARATOR.length < value.length && value === value.trim();
}

/**
 * Accept a key coming back from storage or a URL
 */
export function toAutomationKey(value: string): AutomationKey {
  if (!isAutomationKey(value)) {
    throw new TypeError(`Not an automation key: "${value}"`);
  }
  return value;
}

export function deriveAutomationKey(
  featureName: string,
  scenarioName: string,
  exampleIndex?: number
): AutomationKey {
  const base = `${normalizeLabel(featureName)}${KEY_SEPARATOR}${normalizeLabel(scenarioName)}`;
  return toAutomationKey(exampleIndex === undefined ? base : `${base}#${exampleIndex}`);
}

export function automationKeyOf(
  record: Pick<ResultRecord, 'featureName' | 'scenarioName' | 'exampleIndex'>
): AutomationKey {
  return deriveAutomationKey(record.featureName, record.scenarioName, record.exampleIndex);
}
