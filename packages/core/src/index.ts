/**
 * @querygate/core barrel export
 *
 * SQL cleaning, policy and execution gateway shared by the CLI and agent hosts.
 */

// Errors
export {
  QueryGateError,
  CleaningError,
  PolicyViolation,
  NotASelectError,
  TableNotFoundError,
  ColumnMismatchError,
  BackendExecutionError,
  ConfigurationError,
  SourceReleasedError,
  ToolArgumentError,
  toErrorPayload,
} from './errors.js';
export type { QueryGateErrorKind, PolicyViolationClass, ErrorPayload } from './errors.js';

// Configuration
export {
  loadConfig,
  isTruthyFlag,
  parseEngineName,
  parseCategoricalThreshold,
  resolveCategoricalThreshold,
} from './config.js';
export type { GatewayConfig } from './config.js';
export { EMBEDDED_ENGINE_NAMES, ENV, GATEWAY_DEFAULTS } from './db/defaults.js';
export type { EmbeddedEngineName } from './db/defaults.js';

// Query cleaning
export { cleanSql } from './sql/clean.js';
export type { CleanOptions, CleanResult, CleanWarning, CleanWarningCode } from './sql/clean.js';

// Query guard
export {
  guardQuery,
  evaluateQuery,
  leadingKeyword,
  readOnlyViolation,
  updatesAllowed,
  ALWAYS_BLOCKED_KEYWORDS,
  UPDATE_BLOCKED_KEYWORDS,
} from './policy/guard.js';
export type { GuardPolicy, GuardDecision } from './policy/types.js';

// Data sources
export { DataSource } from './db/datasource.js';
export type { FrameSourceOptions, ConnectionSourceOptions, FetchOneRowOptions } from './db/datasource.js';
export type { Connection, RunOptions, Backend, EmbeddedBackend, ExternalBackend } from './db/backend.js';
export { sqliteConnection } from './db/connections/sqlite.js';
export { postgresConnection } from './db/connections/postgres.js';
export type { PgClient } from './db/connections/postgres.js';
export { setDefaultEmbeddedEngine, resolveEmbeddedEngine } from './db/engines/registry.js';
export { normalizeFrame, inferSemanticType } from './db/frame.js';
export { quoteIdent, tableReference, displayName } from './db/identifier.js';
export type { QualifiedName } from './db/identifier.js';
export { columnNames, toRecords, formatScalar } from './db/result.js';
export { findMissingColumns, assertColumnContract } from './db/contract.js';
export type {
  Scalar,
  SemanticType,
  BackendKind,
  SourceState,
  TableIdentifier,
  ColumnInfo,
  ResultColumn,
  QueryResult,
  FrameInput,
  SqlDialect,
} from './db/types.js';

// Schema description
export { inspectSchema, formatSchema, describeSchema, NO_RANGE } from './schema/inspect.js';
export type { SchemaDescription, SchemaColumn, ColumnFacet, InspectOptions } from './schema/inspect.js';
export { mapNativeType } from './schema/types.js';

// Agent tools
export * from './tools/index.js';
