/**
 * External connection over a caller's open better-sqlite3 database.
 */

import type Database from 'better-sqlite3';
import { ConfigurationError } from '../../errors.js';
import { readOnlyViolation } from '../../policy/guard.js';
import type { Connection, RunOptions } from '../backend.js';
import { quoteIdent, type QualifiedName } from '../identifier.js';
import type { ColumnInfo, RawRows } from '../types.js';

/** Parameterized lookup a SQLite-dialect handle can answer synchronously. */
export type SqliteLookup = (sql: string, params: string[]) => unknown[][];

function schemaPrefix(name: QualifiedName): string {
  if (name.catalog !== undefined) {
    throw new ConfigurationError(
      'SQLite tables are addressed as { schema, table }; a catalog is not supported.',
      name.catalog,
    );
  }
  return name.schema === undefined ? '' : `${quoteIdent(name.schema)}.`;
}

export function sqliteTableExists(lookup: SqliteLookup, name: QualifiedName): boolean {
  const master = name.schema?.toLowerCase() === 'temp' ? 'sqlite_temp_master' : 'sqlite_master';
  const prefix = name.schema?.toLowerCase() === 'temp' ? '' : schemaPrefix(name);
  const rows = lookup(
    `SELECT 1 FROM ${prefix}${master} WHERE type IN ('table', 'view') AND name = ?`,
    [name.table],
  );
  return rows.length > 0;
}

export function sqliteColumns(lookup: SqliteLookup, name: QualifiedName): ColumnInfo[] {
  // cid, name, type, notnull, dflt_value, pk
  const rows = lookup(`PRAGMA ${schemaPrefix(name)}table_info(${quoteIdent(name.table)})`, []);
  return rows.map((row) => ({
    name: String(row[1]),
    nativeType: typeof row[2] === 'string' && row[2] ? row[2] : 'TEXT',
  }));
}

function arrayRows(rows: unknown[]): unknown[][] {
  return rows.map((row) => (Array.isArray(row) ? row : [row]));
}

/**
 * Wrap an open better-sqlite3 database. The handle is only closed by
 * `close()`, which a DataSource calls when it owns the connection.
 */
export function sqliteConnection(db: Database.Database): Connection {
  const lookup: SqliteLookup = (sql, params) => arrayRows(db.prepare(sql).raw(true).all(...params));

  return {
    dialect: 'sqlite',

    async run(sql: string, options: RunOptions = {}): Promise<RawRows> {
      const stmt = db.prepare(sql);
      if (options.readOnly && !stmt.readonly) {
        throw readOnlyViolation(sql);
      }
      if (!stmt.reader) {
        const run = stmt.run();
        return { columnNames: [], rows: [], changes: Number(run.changes ?? 0) };
      }
      const columnNames = stmt.columns().map((column) => column.name);
      return { columnNames, rows: arrayRows(stmt.safeIntegers(true).raw(true).all()) };
    },

    async tableExists(name: QualifiedName): Promise<boolean> {
      return sqliteTableExists(lookup, name);
    },

    async describeColumns(name: QualifiedName): Promise<ColumnInfo[]> {
      return sqliteColumns(lookup, name);
    },

    async close(): Promise<void> {
      if (db.open) {
        db.close();
      }
    },
  };
}
