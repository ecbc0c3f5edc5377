/**
 * Error types for querygate.
 *
 * Every failure the gateway raises is a QueryGateError with a stable `kind`,
 * so a tool layer can relay it to the model without string matching.
 */

export type QueryGateErrorKind =
  | 'CleaningError'
  | 'PolicyViolation'
  | 'NotASelectError'
  | 'TableNotFoundError'
  | 'ColumnMismatchError'
  | 'BackendExecutionError'
  | 'ConfigurationError'
  | 'SourceReleasedError'
  | 'ToolArgumentError';

export type PolicyViolationClass = 'always-blocked' | 'update-blocked';

export interface ErrorPayload {
  kind: QueryGateErrorKind | 'InternalError';
  message: string;
  offendingFragment?: string;
}

export class QueryGateError extends Error {
  readonly kind: QueryGateErrorKind;
  readonly offendingFragment?: string;
  readonly details?: unknown;

  constructor(
    kind: QueryGateErrorKind,
    message: string,
    options: { offendingFragment?: string; details?: unknown; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.offendingFragment = options.offendingFragment;
    this.details = options.details;
  }
}

export class CleaningError extends QueryGateError {
  constructor(message: string, offendingFragment?: string) {
    super('CleaningError', message, { offendingFragment });
  }
}

export class PolicyViolation extends QueryGateError {
  readonly violation: PolicyViolationClass;
  readonly keyword: string;

  constructor(violation: PolicyViolationClass, keyword: string, message: string) {
    super('PolicyViolation', message, { offendingFragment: keyword, details: { violation, keyword } });
    this.violation = violation;
    this.keyword = keyword;
  }
}

export class NotASelectError extends QueryGateError {
  constructor(sql: string) {
    super('NotASelectError', `SQL query does not start with SELECT: ${truncate(sql, 100)}`, {
      offendingFragment: firstWord(sql),
    });
  }
}

export class TableNotFoundError extends QueryGateError {
  readonly table: string;

  constructor(table: string) {
    super('TableNotFoundError', `Table "${table}" not found in database.`, {
      offendingFragment: table,
      details: {
        hint: 'For a table in a catalog or schema, pass { schema, table } instead of a plain name.',
      },
    });
    this.table = table;
  }
}

export class ColumnMismatchError extends QueryGateError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[], originalColumns: string[]) {
    const missing = missingColumns.map((c) => `'${c}'`).join(', ');
    const original = originalColumns.map((c) => `'${c}'`).join(', ');
    super(
      'ColumnMismatchError',
      `Query result missing required columns: ${missing}. ` +
        `The query must return all original table columns (in any order). Original columns: ${original}`,
      { offendingFragment: missingColumns.join(', '), details: { missingColumns, originalColumns } },
    );
    this.missingColumns = missingColumns;
  }
}

export class BackendExecutionError extends QueryGateError {
  readonly sql: string;

  constructor(sql: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('BackendExecutionError', `Query failed: ${reason}`, {
      offendingFragment: sql,
      cause,
    });
    this.sql = sql;
  }
}

export class ConfigurationError extends QueryGateError {
  constructor(message: string, offendingFragment?: string) {
    super('ConfigurationError', message, { offendingFragment });
  }
}

export class SourceReleasedError extends QueryGateError {
  constructor(table: string) {
    super('SourceReleasedError', `Data source "${table}" has been released and can no longer be queried.`);
  }
}

export class ToolArgumentError extends QueryGateError {
  constructor(tool: string, problems: string[]) {
    super('ToolArgumentError', `Invalid arguments for ${tool}: ${problems.join('; ')}`, {
      details: { tool, problems },
    });
  }
}

/**
 * Structured form of any thrown value, for relaying to a model or a JSON client.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof QueryGateError) {
    const payload: ErrorPayload = { kind: error.kind, message: error.message };
    if (error.offendingFragment !== undefined) {
      payload.offendingFragment = error.offendingFragment;
    }
    return payload;
  }
  return {
    kind: 'InternalError',
    message: error instanceof Error ? error.message : String(error),
  };
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function firstWord(text: string): string {
  return text.trim().split(/\s+/)[0] ?? '';
}
