import { QueryGateError } from '@querygate/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'DATA_LOAD_FAILED'
  | 'TABLE_NOT_FOUND'
  | 'DB_QUERY_FAILED'
  | 'COLUMN_MISMATCH'
  | 'POLICY_BLOCKED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'POLICY_BLOCKED', message, details);
}

/**
 * Map gateway errors onto CLI error kinds; anything else passes through.
 */
export function toCliError(error: unknown): unknown {
  if (!(error instanceof QueryGateError)) return error;
  const details = {
    kind: error.kind,
    offendingFragment: error.offendingFragment,
    ...(error.details === undefined ? {} : { details: error.details }),
  };
  switch (error.kind) {
    case 'PolicyViolation':
    case 'NotASelectError':
      return policyError(error.message, details);
    case 'CleaningError':
    case 'ConfigurationError':
    case 'ToolArgumentError':
      return usageError(error.message, 'INVALID_ARGS', details);
    case 'TableNotFoundError':
      return runtimeError(error.message, 'TABLE_NOT_FOUND', details);
    case 'ColumnMismatchError':
      return runtimeError(error.message, 'COLUMN_MISMATCH', details);
    case 'BackendExecutionError':
    case 'SourceReleasedError':
      return runtimeError(error.message, 'DB_QUERY_FAILED', details);
  }
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
