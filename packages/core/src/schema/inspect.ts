/**
 * SchemaInspector: prompt-facing description of a DataSource's table.
 *
 * Everything is derived on each call from the live table; nothing is cached.
 * Statistics queries run through the source's own pipeline, and their
 * failures propagate.
 */

import { resolveCategoricalThreshold } from '../config.js';
import type { DataSource } from '../db/datasource.js';
import { quoteIdent, tableReference } from '../db/identifier.js';
import { formatScalar } from '../db/result.js';
import type { QueryResult, Scalar, SemanticType } from '../db/types.js';
import { mapNativeType } from './types.js';

/** Range text for a ranged column whose values are all NULL. */
export const NO_RANGE = '(no non-null values)';

export type ColumnFacet =
  | { kind: 'range'; min: string; max: string }
  | { kind: 'no-range' }
  | { kind: 'categorical'; values: string[] };

export interface SchemaColumn {
  name: string;
  nativeType: string;
  semanticType: SemanticType;
  facet?: ColumnFacet;
}

export interface SchemaDescription {
  table: string;
  dbType: string;
  columns: SchemaColumn[];
}

export interface InspectOptions {
  /** Max distinct values listed for a text column (integer >= 1, default 20) */
  categoricalThreshold?: number;
}

const RANGED: ReadonlySet<SemanticType> = new Set(['INTEGER', 'FLOAT', 'DATETIME']);

function firstValue(result: QueryResult, column: number): Scalar {
  return result.columns[column]?.values[0] ?? null;
}

export async function inspectSchema(
  source: DataSource,
  options: InspectOptions = {},
): Promise<SchemaDescription> {
  const threshold = resolveCategoricalThreshold(options.categoricalThreshold);
  const from = tableReference(source.qualifiedName());
  const columns: SchemaColumn[] = source.columnSchema().map((c) => ({
    name: c.name,
    nativeType: c.nativeType,
    semanticType: mapNativeType(c.nativeType),
  }));

  // One aggregate pass: MIN/MAX for ranged columns, COUNT(DISTINCT) for text.
  const stats: string[] = [];
  const slots = new Map<SchemaColumn, number>();
  for (const column of columns) {
    const ident = quoteIdent(column.name);
    if (RANGED.has(column.semanticType)) {
      slots.set(column, stats.length);
      stats.push(`MIN(${ident})`, `MAX(${ident})`);
    } else if (column.semanticType === 'TEXT') {
      slots.set(column, stats.length);
      stats.push(`COUNT(DISTINCT ${ident})`);
    }
  }
  if (stats.length === 0) {
    return { table: source.identifier(), dbType: source.dbType(), columns };
  }

  const select = stats.map((expr, i) => `${expr} AS stat_${i}`).join(', ');
  const aggregate = await source.execute(`SELECT ${select} FROM ${from}`);

  for (const column of columns) {
    const slot = slots.get(column);
    if (slot === undefined) continue;

    if (RANGED.has(column.semanticType)) {
      const min = firstValue(aggregate, slot);
      const max = firstValue(aggregate, slot + 1);
      column.facet =
        min === null || max === null
          ? { kind: 'no-range' }
          : { kind: 'range', min: formatScalar(min), max: formatScalar(max) };
      continue;
    }

    const distinct = Number(firstValue(aggregate, slot) ?? 0);
    if (distinct >= 1 && distinct <= threshold) {
      const ident = quoteIdent(column.name);
      const values = await source.execute(
        `SELECT DISTINCT ${ident} FROM ${from} WHERE ${ident} IS NOT NULL ORDER BY ${ident}`,
      );
      column.facet = {
        kind: 'categorical',
        values: (values.columns[0]?.values ?? []).map(formatScalar),
      };
    }
  }

  return { table: source.identifier(), dbType: source.dbType(), columns };
}

function quoteValue(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function facetLine(facet: ColumnFacet): string {
  switch (facet.kind) {
    case 'range':
      return `Range: ${facet.min} to ${facet.max}`;
    case 'no-range':
      return `Range: ${NO_RANGE}`;
    case 'categorical':
      return `Categorical values: ${facet.values.map(quoteValue).join(', ')}`;
  }
}

export function formatSchema(description: SchemaDescription): string {
  const lines = [`Table: ${description.table}`, 'Columns:'];
  for (const column of description.columns) {
    lines.push(`- ${column.name} (${column.semanticType})`);
    if (column.facet) {
      lines.push(`  ${facetLine(column.facet)}`);
    }
  }
  return lines.join('\n');
}

/** Schema text ready to drop into a prompt. */
export async function describeSchema(source: DataSource, options: InspectOptions = {}): Promise<string> {
  return formatSchema(await inspectSchema(source, options));
}
