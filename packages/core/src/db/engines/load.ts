import { DECLARED_TYPES, storageValue, type NormalizedFrame } from '../frame.js';
import { quoteIdent } from '../identifier.js';

export type StoredValue = ReturnType<typeof storageValue>;

export function createTableSql(table: string, frame: NormalizedFrame): string {
  const columns = frame.columns.map((c) => `${quoteIdent(c.name)} ${DECLARED_TYPES[c.type]}`);
  return `CREATE TABLE ${quoteIdent(table)} (${columns.join(', ')})`;
}

export function insertSql(table: string, frame: NormalizedFrame): string {
  const names = frame.columns.map((c) => quoteIdent(c.name)).join(', ');
  const slots = frame.columns.map(() => '?').join(', ');
  return `INSERT INTO ${quoteIdent(table)} (${names}) VALUES (${slots})`;
}

/** Row-major stored values, ready to bind to `insertSql`. */
export function* frameRows(frame: NormalizedFrame): Generator<StoredValue[]> {
  for (let row = 0; row < frame.rowCount; row++) {
    yield frame.columns.map((c) => storageValue(c.values[row] ?? null, c.type));
  }
}
