/**
 * Embedded engine on an in-memory better-sqlite3 database.
 */

import Database from 'better-sqlite3';
import type { Connection } from '../backend.js';
import { sqliteConnection } from '../connections/sqlite.js';
import type { NormalizedFrame } from '../frame.js';
import { createTableSql, frameRows, insertSql, type StoredValue } from './load.js';

function bindable(value: StoredValue): StoredValue {
  // better-sqlite3 binds blobs from Buffers only
  return value instanceof Uint8Array && !Buffer.isBuffer(value) ? Buffer.from(value) : value;
}

export async function openBetterSqlite(table: string, frame: NormalizedFrame): Promise<Connection> {
  const db = new Database(':memory:');
  try {
    db.prepare(createTableSql(table, frame)).run();
    const insert = db.prepare(insertSql(table, frame));
    const load = db.transaction(() => {
      for (const row of frameRows(frame)) {
        insert.run(...row.map(bindable));
      }
    });
    load();
  } catch (err: unknown) {
    db.close();
    throw err;
  }
  return sqliteConnection(db);
}
