// DR Control Plane Errors
// Error taxonomy shared by the validator, the failover orchestrator and the request handlers

import type { ZodIssue } from 'zod';

export type DisasterRecoveryErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'INVALID_REGION'
  | 'INVALID_REQUEST'
  | 'OPERATION_TIMEOUT'
  | 'CONFIGURATION';

export class DisasterRecoveryError extends Error {
  readonly code: DisasterRecoveryErrorCode;

  constructor(message: string, code: DisasterRecoveryErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A mandatory storage call (item count, sample scan, sentinel write) could not be completed.
 */
export class BackendUnavailableError extends DisasterRecoveryError {
  readonly region: string;
  readonly operation: string;

  constructor(region: string, operation: string, cause?: unknown) {
    super(`${operation} failed in region ${region}: ${describeError(cause)}`, 'BACKEND_UNAVAILABLE', { cause });
    this.region = region;
    this.operation = operation;
  }
}

export class InvalidRegionError extends DisasterRecoveryError {
  readonly region: string;

  constructor(region: string) {
    super(`Invalid region: ${region}`, 'INVALID_REGION');
    this.region = region;
  }
}

export class RequestValidationError extends DisasterRecoveryError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(`Invalid request: ${formatIssues(issues)}`, 'INVALID_REQUEST');
    this.issues = issues;
  }
}

export class OperationTimeoutError extends DisasterRecoveryError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'OPERATION_TIMEOUT');
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigurationError extends DisasterRecoveryError {
  constructor(issues: ZodIssue[]) {
    super(`Invalid disaster recovery configuration: ${formatIssues(issues)}`, 'CONFIGURATION');
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
