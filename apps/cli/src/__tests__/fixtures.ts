import type { QueryResult, Scalar } from '@querygate/core';

export function buildResultForDisplay(names: string[], rows: Scalar[][]): QueryResult {
  return {
    columns: names.map((name, i) => ({ name, values: rows.map((row) => row[i] ?? null) })),
    rowCount: rows.length,
    sql: 'SELECT 1',
    warnings: [],
    execMs: 0,
  };
}
