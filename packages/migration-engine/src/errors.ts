/**
 * Error classes
 *
 * Only misuse and cancellation are raised as errors. Operational risk
 * (inspector failures, action failures, drift) is always reported as a
 * Finding instead.
 */

import { Finding, Summary } from './findings';

/**
 * Programmer/operator misuse: missing collaborator, non-idempotent step,
 * non-read-only check, invalid plan. Aborts the invocation without a summary.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class PlanValidationError extends ConfigurationError {
  constructor(message: string, public readonly details: string[]) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'PlanValidationError';
  }
}

/**
 * Raised by the workflow runner when the cancellation signal fired at a step
 * boundary. Carries what had been aggregated before the halt.
 */
export class RunCancelledError extends Error {
  constructor(
    public readonly stepName: string,
    public readonly summary: Summary,
    public readonly reason?: unknown
  ) {
    super(`run cancelled before step ${stepName}`);
    this.name = 'RunCancelledError';
  }
}

/**
 * Thrown by a step that fails after producing some findings. The runner keeps
 * the findings and appends a BLOCK for the failure.
 */
export class StepFailure extends Error {
  constructor(message: string, public readonly findings: Finding[] = []) {
    super(message);
    this.name = 'StepFailure';
  }
}

export class CheckpointPersistenceError extends Error {
  constructor(public readonly filePath: string, public readonly reason?: unknown) {
    super(`failed to persist checkpoint state to ${filePath}: ${errorMessage(reason)}`);
    this.name = 'CheckpointPersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
