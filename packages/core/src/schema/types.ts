/**
 * Native column type -> semantic type.
 */

import type { SemanticType } from '../db/types.js';

// Exact names after uppercasing and dropping length/precision arguments.
// Covers SQLite declared types and PostgreSQL information_schema.data_type.
const NATIVE_TYPES: Record<string, SemanticType> = {
  INT: 'INTEGER',
  INTEGER: 'INTEGER',
  TINYINT: 'INTEGER',
  SMALLINT: 'INTEGER',
  MEDIUMINT: 'INTEGER',
  BIGINT: 'INTEGER',
  'UNSIGNED BIG INT': 'INTEGER',
  INT2: 'INTEGER',
  INT4: 'INTEGER',
  INT8: 'INTEGER',
  SERIAL: 'INTEGER',
  SMALLSERIAL: 'INTEGER',
  BIGSERIAL: 'INTEGER',

  REAL: 'FLOAT',
  FLOAT: 'FLOAT',
  FLOAT4: 'FLOAT',
  FLOAT8: 'FLOAT',
  DOUBLE: 'FLOAT',
  'DOUBLE PRECISION': 'FLOAT',
  NUMERIC: 'FLOAT',
  DECIMAL: 'FLOAT',
  MONEY: 'FLOAT',

  BOOLEAN: 'BOOLEAN',
  BOOL: 'BOOLEAN',

  DATE: 'DATETIME',
  DATETIME: 'DATETIME',
  TIMESTAMP: 'DATETIME',
  TIMESTAMPTZ: 'DATETIME',
  'TIMESTAMP WITHOUT TIME ZONE': 'DATETIME',
  'TIMESTAMP WITH TIME ZONE': 'DATETIME',
};

/**
 * Unknown and composite types (arrays, json, interval, geometric) are TEXT.
 * Matching is on whole names, so INTERVAL and POINT do not read as INT.
 */
export function mapNativeType(nativeType: string): SemanticType {
  const key = nativeType
    .replace(/\([^)]*\)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toUpperCase();
  return NATIVE_TYPES[key] ?? 'TEXT';
}
