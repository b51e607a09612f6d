/**
 * Small helpers for the hand-rolled argument parsers
 */

import { ConfigurationError } from '../errors.js';

/**
 * Value following a flag, or a ConfigurationError when it is missing
 */
export function flagValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigurationError(`Option ${flag} needs a value`);
  }
  return value;
}

export function positiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Option ${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

export function fraction(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigurationError(`Option ${flag} expects a number between 0 and 1, got "${value}"`);
  }
  return parsed;
}
