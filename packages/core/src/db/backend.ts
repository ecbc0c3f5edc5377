/**
 * Backend variants a DataSource runs on.
 *
 * Both variants speak the same Connection contract; they differ only in who
 * owns the underlying handle and how it was opened.
 */

import type { EmbeddedEngineName } from './defaults.js';
import type { QualifiedName } from './identifier.js';
import type { ColumnInfo, RawRows, SqlDialect } from './types.js';

export interface RunOptions {
  /**
   * Refuse any statement that would write, with PolicyViolation. Enforced by
   * the backend itself, independently of the text-level guard.
   */
  readOnly?: boolean;
}

export interface Connection {
  readonly dialect: SqlDialect;
  /** Run one statement exactly as given. */
  run(sql: string, options?: RunOptions): Promise<RawRows>;
  tableExists(name: QualifiedName): Promise<boolean>;
  /** Columns in native order, with their declared types. */
  describeColumns(name: QualifiedName): Promise<ColumnInfo[]>;
  close(): Promise<void>;
}

export interface EmbeddedBackend {
  kind: 'embedded';
  engine: EmbeddedEngineName;
  connection: Connection;
}

export interface ExternalBackend {
  kind: 'external';
  /** Close the caller's handle on release */
  ownsConnection: boolean;
  connection: Connection;
}

export type Backend = EmbeddedBackend | ExternalBackend;

/** Release whatever the backend owns. Caller-owned handles are left open. */
export async function closeBackend(backend: Backend): Promise<void> {
  switch (backend.kind) {
    case 'embedded':
      await backend.connection.close();
      return;
    case 'external':
      if (backend.ownsConnection) {
        await backend.connection.close();
      }
      return;
  }
}

export function dialectLabel(dialect: SqlDialect): string {
  return dialect === 'postgres' ? 'PostgreSQL' : 'SQLite';
}
