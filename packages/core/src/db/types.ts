/**
 * Data source abstraction types for querygate.
 */

export type Scalar = string | number | bigint | boolean | Date | Uint8Array | null;

export type SemanticType = 'INTEGER' | 'FLOAT' | 'BOOLEAN' | 'DATETIME' | 'TEXT';

export type BackendKind = 'embedded' | 'external';

export type SourceState = 'constructed' | 'validated' | 'active' | 'released';

/** Plain table name, or a catalog/schema-qualified one. */
export type TableIdentifier =
  | string
  | {
      catalog?: string;
      schema?: string;
      table: string;
    };

export interface ColumnInfo {
  name: string;
  /** Type as the backend declares it, e.g. "REAL" or "double precision" */
  nativeType: string;
}

export interface ResultColumn {
  name: string;
  values: Scalar[];
}

export interface QueryResult {
  columns: ResultColumn[];
  rowCount: number;
  /** The statement that was sent to the backend */
  sql: string;
  /** Messages from cleaning the query text */
  warnings: string[];
  execMs: number;
  /** Rows changed, for statements that return no columns */
  rowsAffected?: number;
}

/** Rows as produced by a driver, before they become columns. */
export interface RawRows {
  columnNames: string[];
  rows: unknown[][];
  /** Rows changed by a non-reading statement */
  changes?: number;
}

/** Row-object or columnar in-memory table handed to an embedded source. */
export type FrameInput = ReadonlyArray<Readonly<Record<string, Scalar | undefined>>> | Readonly<Record<string, ReadonlyArray<Scalar>>>;

export type SqlDialect = 'sqlite' | 'postgres';
