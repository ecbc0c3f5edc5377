/**
 * Markdown renderings of tool outcomes, for display next to a chat turn.
 */

import { GATEWAY_DEFAULTS } from '../db/defaults.js';
import { formatScalar } from '../db/result.js';
import type { QueryResult } from '../db/types.js';
import type { ErrorPayload } from '../errors.js';

export function sqlBlock(sql: string): string {
  return '```sql\n' + sql + '\n```';
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/** First `maxRows` rows of a result as a markdown table. */
export function previewTable(result: QueryResult, maxRows: number = GATEWAY_DEFAULTS.previewRows): string {
  if (result.columns.length === 0) {
    return result.rowsAffected === undefined ? '_No columns returned._' : `_${result.rowsAffected} row(s) affected._`;
  }
  const shown = Math.min(result.rowCount, maxRows);
  const lines = [
    `| ${result.columns.map((c) => cell(c.name)).join(' | ')} |`,
    `| ${result.columns.map(() => '---').join(' | ')} |`,
  ];
  for (let row = 0; row < shown; row++) {
    lines.push(`| ${result.columns.map((c) => cell(formatScalar(c.values[row] ?? null))).join(' | ')} |`);
  }
  if (result.rowCount > shown) {
    lines.push('', `_Showing ${shown} of ${result.rowCount} rows._`);
  } else if (result.rowCount === 0) {
    lines.push('', '_No rows._');
  }
  return lines.join('\n');
}

export function errorNote(error: ErrorPayload): string {
  return `> Error (${error.kind}): ${error.message}`;
}
