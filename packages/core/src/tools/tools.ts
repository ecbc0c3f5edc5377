/**
 * Entry points an orchestrating agent calls with model-supplied arguments.
 *
 * Tools never throw for query problems: every outcome, including policy
 * violations and backend errors, comes back as a structured result the agent
 * can relay to the model so it can write a better query.
 */

import type { DataSource } from '../db/datasource.js';
import type { QueryResult } from '../db/types.js';
import { toErrorPayload, type ErrorPayload } from '../errors.js';
import { errorNote, previewTable, sqlBlock } from './markdown.js';
import { parseQueryToolArgs, parseUpdateDashboardArgs, type UpdateDashboardArgs } from './schema.js';

export type ToolOutcome<T> =
  | ({ ok: true; markdown: string } & T)
  | { ok: false; markdown: string; error: ErrorPayload };

export type DashboardUpdate = UpdateDashboardArgs;

export type DashboardUpdateHandler = (update: DashboardUpdate) => void | Promise<void>;

function queryText(args: unknown): string {
  if (typeof args === 'object' && args !== null && 'query' in args && typeof args.query === 'string') {
    return args.query;
  }
  return '';
}

function failure(sql: string, error: unknown): { ok: false; markdown: string; error: ErrorPayload } {
  const payload = toErrorPayload(error);
  return { ok: false, markdown: `${sqlBlock(sql)}\n\n${errorNote(payload)}`, error: payload };
}

/**
 * Run a read query and return its full result plus a short preview.
 */
export async function runQueryTool(
  source: DataSource,
  args: unknown,
): Promise<ToolOutcome<{ result: QueryResult }>> {
  try {
    const { query } = parseQueryToolArgs(args);
    const result = await source.execute(query);
    return {
      ok: true,
      result,
      markdown: `${sqlBlock(query)}\n\n${previewTable(result)}`,
    };
  } catch (err: unknown) {
    return failure(queryText(args), err);
  }
}

/**
 * Check that a query can replace the visible dataset, then hand it to
 * `onUpdate`. The query must keep every original column; it is test-run with
 * a one-row cap and not executed in full here.
 */
export async function updateDashboardTool(
  source: DataSource,
  args: unknown,
  onUpdate: DashboardUpdateHandler,
): Promise<ToolOutcome<{ update: DashboardUpdate }>> {
  try {
    const update = parseUpdateDashboardArgs(args);
    await source.fetchOneRow(update.query, { requireAllColumns: true });
    await onUpdate({ query: update.query, title: update.title });
    return {
      ok: true,
      update,
      markdown: `**${update.title}**\n\n${sqlBlock(update.query)}`,
    };
  } catch (err: unknown) {
    return failure(queryText(args), err);
  }
}

/**
 * Restore the unfiltered dataset through `onReset`.
 */
export async function resetDashboardTool(
  onReset: () => void | Promise<void>,
): Promise<ToolOutcome<Record<never, never>>> {
  try {
    await onReset();
    return { ok: true, markdown: 'The dashboard has been reset to show all data.' };
  } catch (err: unknown) {
    const error = toErrorPayload(err);
    return { ok: false, markdown: errorNote(error), error };
  }
}
