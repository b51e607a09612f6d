/**
 * Error taxonomy for the sync pipeline.
 *
 * Fatal errors abort the invocation with a non-zero exit code. Per-record errors
 * (reconciliation, submission) are collected into the pipeline report instead.
 */

export type PipelineErrorCode =
  | 'MALFORMED_RESULT'
  | 'RECONCILIATION_FAILED'
  | 'SUBMISSION_FAILED'
  | 'COLLABORATOR_UNAVAILABLE'
  | 'TEST_MANAGEMENT_UNAVAILABLE'
  | 'CONFIGURATION_INVALID';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
  }

  /**
   * Whether this error must abort the whole invocation
   */
  get fatal(): boolean {
    return true;
  }
}

/**
 * Runner output is missing required structural fields
 */
export class MalformedResultError extends PipelineError {
  constructor(
    public readonly document: string,
    message: string,
    public readonly path: ReadonlyArray<string | number> = []
  ) {
    const where = path.length > 0 ? ` at ${path.join('.')}` : '';
    super('MALFORMED_RESULT', `Malformed result document "${document}"${where}: ${message}`);
    this.name = 'MalformedResultError';
  }
}

/**
 * Creating or updating the remote case for one automation key failed
 */
export class ReconciliationError extends PipelineError {
  constructor(
    public readonly automationKey: string,
    message: string,
    cause?: unknown
  ) {
    super('RECONCILIATION_FAILED', `Could not reconcile case "${automationKey}": ${message}`, cause);
    this.name = 'ReconciliationError';
  }

  override get fatal(): boolean {
    return false;
  }
}

/**
 * Submitting a result (or creating the run) failed after all retries
 */
export class SubmissionError extends PipelineError {
  constructor(
    message: string,
    public readonly automationKey?: string,
    cause?: unknown,
    private readonly runLevel: boolean = false
  ) {
    super('SUBMISSION_FAILED', message, cause);
    this.name = 'SubmissionError';
  }

  override get fatal(): boolean {
    return this.runLevel;
  }
}

/**
 * An optional collaborator (history store, summarizer, notifier) is unreachable
 */
export class CollaboratorUnavailableError extends PipelineError {
  constructor(
    public readonly collaborator: 'history' | 'summarizer' | 'notifier',
    message: string,
    cause?: unknown
  ) {
    super('COLLABORATOR_UNAVAILABLE', `${collaborator} unavailable: ${message}`, cause);
    this.name = 'CollaboratorUnavailableError';
  }

  override get fatal(): boolean {
    return false;
  }
}

/**
 * Not a single call to the test-management API succeeded
 */
export class TestManagementUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('TEST_MANAGEMENT_UNAVAILABLE', `Test management API unreachable: ${message}`, cause);
    this.name = 'TestManagementUnavailableError';
  }
}

/**
 * Environment or project configuration failed validation
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super('CONFIGURATION_INVALID', message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
