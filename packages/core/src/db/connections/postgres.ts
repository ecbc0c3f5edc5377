/**
 * External connection over a caller's open `pg` client.
 */

import type { QueryArrayConfig, QueryArrayResult } from 'pg';
import { readOnlyViolation } from '../../policy/guard.js';
import type { Connection, RunOptions } from '../backend.js';
import type { QualifiedName } from '../identifier.js';
import type { ColumnInfo, RawRows } from '../types.js';

/** The part of a pg client this module calls; pg.Client and pg.PoolClient both fit. */
export interface PgQueryable {
  query(config: QueryArrayConfig): Promise<QueryArrayResult>;
}

export type PgClient = PgQueryable & ({ release(err?: Error | boolean): void } | { end(): Promise<void> });

const TABLE_FILTER = `
  table_name = $1
  AND table_schema = COALESCE($2::text, current_schema())
  AND table_catalog = COALESCE($3::text, current_database())
`;

// SQLSTATE read_only_sql_transaction
const READ_ONLY_TRANSACTION = '25006';

function isReadOnlyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === READ_ONLY_TRANSACTION;
}

function filterValues(name: QualifiedName): Array<string | null> {
  return [name.table, name.schema ?? null, name.catalog ?? null];
}

/**
 * Wrap a connected pg client. A pooled client is released back to its pool
 * on close; a standalone client is ended.
 */
export function postgresConnection(client: PgClient): Connection {
  async function query(text: string, values: unknown[] = []): Promise<QueryArrayResult> {
    return client.query({ text, values, rowMode: 'array' });
  }

  return {
    dialect: 'postgres',

    async run(sql: string, options: RunOptions = {}): Promise<RawRows> {
      let result: QueryArrayResult;
      if (options.readOnly) {
        await query('BEGIN READ ONLY');
        try {
          result = await query(sql);
        } catch (err: unknown) {
          throw isReadOnlyError(err) ? readOnlyViolation(sql) : err;
        } finally {
          await query('ROLLBACK');
        }
      } else {
        result = await query(sql);
      }
      if (result.fields.length === 0) {
        return { columnNames: [], rows: [], changes: result.rowCount ?? 0 };
      }
      return {
        columnNames: result.fields.map((f) => f.name),
        rows: result.rows,
      };
    },

    async tableExists(name: QualifiedName): Promise<boolean> {
      const result = await query(
        `SELECT 1 FROM information_schema.tables WHERE ${TABLE_FILTER}`,
        filterValues(name),
      );
      return result.rows.length > 0;
    },

    async describeColumns(name: QualifiedName): Promise<ColumnInfo[]> {
      const result = await query(
        `SELECT column_name, data_type FROM information_schema.columns
         WHERE ${TABLE_FILTER}
         ORDER BY ordinal_position`,
        filterValues(name),
      );
      return result.rows.map((row) => ({ name: String(row[0]), nativeType: String(row[1]) }));
    },

    async close(): Promise<void> {
      if ('release' in client) {
        client.release();
      } else {
        await client.end();
      }
    },
  };
}
