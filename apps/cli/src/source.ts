/**
 * Opening a DataSource from command line options.
 */

import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';
import type { Command } from 'commander';
import {
  DataSource,
  sqliteConnection,
  updatesAllowed,
  type FrameInput,
  type SemanticType,
  type TableIdentifier,
} from '@querygate/core';
import { runtimeError, usageError } from './errors.js';

export interface SourceOptions {
  data?: string;
  sqlite?: string;
  table?: string;
  schema?: string;
  engine?: string;
  columnType?: string[];
  allowUpdates?: boolean;
}

type JsonScalar = string | number | boolean | null;

const SEMANTIC_TYPES: readonly SemanticType[] = ['INTEGER', 'FLOAT', 'BOOLEAN', 'DATETIME', 'TEXT'];

function isJsonScalar(value: unknown): value is JsonScalar {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalarArray(value: unknown): value is JsonScalar[] {
  return Array.isArray(value) && value.every(isJsonScalar);
}

function isScalarRecord(value: unknown): value is Record<string, JsonScalar> {
  return isRecord(value) && Object.values(value).every(isJsonScalar);
}

/**
 * A JSON data file holds either an array of row objects or an object of
 * equal-length column arrays, with scalar values only.
 */
export function parseFrameJson(text: string, file = 'data file'): FrameInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw usageError(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, 'DATA_LOAD_FAILED');
  }
  if (Array.isArray(parsed) && parsed.every(isScalarRecord)) {
    return parsed;
  }
  if (isRecord(parsed) && Object.values(parsed).every(isScalarArray)) {
    const columns: Record<string, JsonScalar[]> = {};
    for (const [name, values] of Object.entries(parsed)) {
      if (isScalarArray(values)) columns[name] = values;
    }
    return columns;
  }
  throw usageError(
    `${file} must contain an array of row objects or an object of column arrays, with scalar values only.`,
    'DATA_LOAD_FAILED',
  );
}

/** `name=TYPE` pairs from --column-type. */
export function parseColumnTypes(pairs: string[] = []): Record<string, SemanticType> {
  const types: Record<string, SemanticType> = {};
  for (const pair of pairs) {
    const idx = pair.lastIndexOf('=');
    const name = pair.slice(0, idx).trim();
    const type = SEMANTIC_TYPES.find((t) => t === pair.slice(idx + 1).trim().toUpperCase());
    if (idx <= 0 || !name || !type) {
      throw usageError(`Invalid --column-type "${pair}". Expected name=TYPE with TYPE one of ${SEMANTIC_TYPES.join(', ')}.`);
    }
    types[name] = type;
  }
  return types;
}

function tableIdentifier(opts: SourceOptions): TableIdentifier {
  if (!opts.table) {
    throw usageError('--table is required.');
  }
  return opts.schema ? { schema: opts.schema, table: opts.table } : opts.table;
}

export async function openSource(opts: SourceOptions): Promise<DataSource> {
  if (Boolean(opts.data) === Boolean(opts.sqlite)) {
    throw usageError('Provide exactly one of --data <file.json> or --sqlite <file>.');
  }
  const table = tableIdentifier(opts);

  if (opts.data) {
    if (typeof table !== 'string') {
      throw usageError('--schema applies to --sqlite sources only.');
    }
    let text: string;
    try {
      text = readFileSync(opts.data, 'utf-8');
    } catch (error: unknown) {
      throw runtimeError(
        `Could not read ${opts.data}: ${error instanceof Error ? error.message : String(error)}`,
        'DATA_LOAD_FAILED',
      );
    }
    return DataSource.fromFrame(parseFrameJson(text, opts.data), table, {
      engine: opts.engine,
      columnTypes: parseColumnTypes(opts.columnType),
      allowUpdates: opts.allowUpdates,
    });
  }

  const file = opts.sqlite ?? '';
  // The file is opened writable exactly when the source will allow updates
  const allowUpdates = updatesAllowed({ allowUpdates: opts.allowUpdates });
  let db: Database.Database;
  try {
    db = new Database(file, { readonly: !allowUpdates, fileMustExist: true });
  } catch (error: unknown) {
    throw runtimeError(
      `Could not open SQLite database ${file}: ${error instanceof Error ? error.message : String(error)}`,
      'DATA_LOAD_FAILED',
    );
  }
  return DataSource.fromConnection(sqliteConnection(db), table, { ownsConnection: true, allowUpdates });
}

export function withSourceOptions<T extends Command>(command: T): T {
  return command
    .option('--data <file>', 'JSON data file loaded into an embedded engine')
    .option('--sqlite <file>', 'SQLite database file')
    .option('--table <name>', 'Table to query')
    .option('--schema <name>', 'Schema of the table (SQLite attached database name)')
    .option('--engine <name>', 'Embedded engine for --data (sqlite|sqljs)')
    .option('--column-type <name=TYPE...>', 'Override an inferred column type for --data')
    .option('--allow-updates', 'Allow INSERT/UPDATE-class statements (default: QUERYGATE_ENABLE_UPDATE_QUERIES)') as T;
}
