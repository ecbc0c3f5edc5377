/**
 * Embedded engine on sql.js, SQLite compiled to WebAssembly.
 */

import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { ConfigurationError } from '../../errors.js';
import { readOnlyViolation } from '../../policy/guard.js';
import type { Connection, RunOptions } from '../backend.js';
import { sqliteColumns, sqliteTableExists, type SqliteLookup } from '../connections/sqlite.js';
import type { NormalizedFrame } from '../frame.js';
import type { QualifiedName } from '../identifier.js';
import type { ColumnInfo, RawRows } from '../types.js';
import { createTableSql, frameRows, insertSql, type StoredValue } from './load.js';

let sqlJs: Promise<SqlJsStatic> | undefined;

/** The WebAssembly module is compiled once per process. */
function loadSqlJs(): Promise<SqlJsStatic> {
  // CommonJS package: under ESM the initializer sits on `.default`.
  sqlJs ??= initSqlJs.default();
  return sqlJs;
}

/** sql.js reads integers back as doubles, so only safe integers are stored. */
function bindable(value: StoredValue): SqlValue {
  if (typeof value !== 'bigint') return value;
  if (!Number.isSafeInteger(Number(value))) {
    throw new ConfigurationError(
      `Integer ${value} cannot be stored exactly by the sqljs engine; use the sqlite engine for 64-bit values.`,
      value.toString(),
    );
  }
  return Number(value);
}

function collect(db: Database, sql: string, params: SqlValue[] = []): RawRows {
  const stmt = db.prepare(sql);
  try {
    if (params.length) stmt.bind(params);
    const columnNames = stmt.getColumnNames();
    const rows: unknown[][] = [];
    while (stmt.step()) {
      rows.push(stmt.get());
    }
    if (columnNames.length === 0) {
      return { columnNames, rows, changes: db.getRowsModified() };
    }
    return { columnNames, rows };
  } finally {
    stmt.free();
  }
}

function isReadOnlyError(err: unknown): boolean {
  return err instanceof Error && /readonly database/i.test(err.message);
}

export async function openSqlJs(table: string, frame: NormalizedFrame): Promise<Connection> {
  const SQL = await loadSqlJs();
  const db = new SQL.Database();
  try {
    db.run('BEGIN');
    db.run(createTableSql(table, frame));
    const insert = db.prepare(insertSql(table, frame));
    try {
      for (const row of frameRows(frame)) {
        insert.run(row.map(bindable));
      }
    } finally {
      insert.free();
    }
    db.run('COMMIT');
  } catch (err: unknown) {
    db.close();
    throw err;
  }

  const lookup: SqliteLookup = (sql, params) => collect(db, sql, params).rows;
  let open = true;

  return {
    dialect: 'sqlite',

    async run(sql: string, options: RunOptions = {}): Promise<RawRows> {
      if (!options.readOnly) return collect(db, sql);
      // sql.js exposes no per-statement read-only flag; query_only makes any write fail
      db.run('PRAGMA query_only = 1');
      try {
        return collect(db, sql);
      } catch (err: unknown) {
        throw isReadOnlyError(err) ? readOnlyViolation(sql) : err;
      } finally {
        db.run('PRAGMA query_only = 0');
      }
    },

    async tableExists(name: QualifiedName): Promise<boolean> {
      return sqliteTableExists(lookup, name);
    },

    async describeColumns(name: QualifiedName): Promise<ColumnInfo[]> {
      return sqliteColumns(lookup, name);
    },

    async close(): Promise<void> {
      if (open) {
        open = false;
        db.close();
      }
    },
  };
}
