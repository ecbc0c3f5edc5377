/**
 * Columnar query results.
 */

import type { QueryResult, RawRows, Scalar } from './types.js';

export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
      // Integers read exactly; only those beyond 2^53 stay bigint
      return Number.isSafeInteger(Number(value)) ? Number(value) : value;
  }
  if (value instanceof Date || value instanceof Uint8Array) return value;
  // json/jsonb, arrays, intervals and other structured driver values
  return JSON.stringify(value);
}

/**
 * Pivot driver rows into columns. Every column gets exactly one value per
 * row, so the result stays rectangular even if a driver hands back a short row.
 */
export function buildResult(
  raw: RawRows,
  meta: { sql: string; warnings: string[]; execMs: number },
): QueryResult {
  const columns = raw.columnNames.map((name) => ({ name, values: new Array<Scalar>() }));
  for (const row of raw.rows) {
    columns.forEach((column, i) => {
      column.values.push(toScalar(row[i]));
    });
  }
  const result: QueryResult = {
    columns,
    rowCount: raw.rows.length,
    sql: meta.sql,
    warnings: meta.warnings,
    execMs: meta.execMs,
  };
  if (raw.changes !== undefined) {
    result.rowsAffected = raw.changes;
  }
  return result;
}

export function columnNames(result: QueryResult): string[] {
  return result.columns.map((c) => c.name);
}

/**
 * Row objects for display. A repeated column name keeps its last value.
 */
export function toRecords(result: QueryResult): Record<string, Scalar>[] {
  const records: Record<string, Scalar>[] = [];
  for (let row = 0; row < result.rowCount; row++) {
    const record: Record<string, Scalar> = {};
    for (const column of result.columns) {
      record[column.name] = column.values[row];
    }
    records.push(record);
  }
  return records;
}

export function formatScalar(value: Scalar): string {
  if (value === null) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
  return String(value);
}
