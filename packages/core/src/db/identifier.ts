import { ConfigurationError } from '../errors.js';
import type { TableIdentifier } from './types.js';

export interface QualifiedName {
  catalog?: string;
  schema?: string;
  table: string;
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function normalizeIdentifier(identifier: TableIdentifier): QualifiedName {
  const name = typeof identifier === 'string' ? { table: identifier } : { ...identifier };
  if (!name.table?.trim()) {
    throw new ConfigurationError('Table name must be a non-empty string.');
  }
  if (name.catalog !== undefined && name.schema === undefined) {
    throw new ConfigurationError('A catalog-qualified table also needs a schema.', name.catalog);
  }
  return name;
}

/** Quoted reference for use inside SQL, e.g. "analytics"."orders". */
export function tableReference(name: QualifiedName): string {
  return [name.catalog, name.schema, name.table]
    .filter((part): part is string => part !== undefined)
    .map(quoteIdent)
    .join('.');
}

/** Unquoted dotted name for messages and schema headers. */
export function displayName(name: QualifiedName): string {
  return [name.catalog, name.schema, name.table].filter((part) => part !== undefined).join('.');
}
