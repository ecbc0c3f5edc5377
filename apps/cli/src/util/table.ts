/**
 * Plain-text table for query results in the terminal.
 */

import { formatScalar, type QueryResult } from '@querygate/core';

const MAX_WIDTH = 60;

export function formatTable(result: QueryResult, maxRows = Number.POSITIVE_INFINITY): string {
  if (result.columns.length === 0) {
    return result.rowsAffected === undefined ? '(no columns)' : `(${result.rowsAffected} row(s) affected)`;
  }
  if (result.rowCount === 0) return '(0 rows)';

  const shown = Math.min(result.rowCount, maxRows);
  const cells = result.columns.map((column) =>
    column.values.slice(0, shown).map((value) => formatScalar(value)),
  );
  const widths = result.columns.map((column, i) =>
    Math.min(Math.max(column.name.length, ...cells[i].map((text) => text.length)), MAX_WIDTH),
  );

  const fit = (text: string, width: number): string =>
    text.length > width ? `${text.slice(0, width - 3)}...` : text.padEnd(width);

  const lines = [
    result.columns.map((column, i) => fit(column.name, widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
  ];
  for (let row = 0; row < shown; row++) {
    lines.push(cells.map((column, i) => fit(column[row], widths[i])).join(' | '));
  }
  if (shown < result.rowCount) {
    lines.push(`(${shown} of ${result.rowCount} rows shown)`);
  }
  return lines.join('\n');
}
