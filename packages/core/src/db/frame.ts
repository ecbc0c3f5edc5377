/**
 * In-memory frames handed to embedded sources.
 *
 * A frame is either an array of row objects or an object of equal-length
 * column arrays. Both are normalized to ordered columns with one semantic
 * type each before the engine loads them.
 */

import { ConfigurationError } from '../errors.js';
import type { FrameInput, Scalar, SemanticType } from './types.js';

export interface FrameColumn {
  name: string;
  type: SemanticType;
  values: Scalar[];
}

export interface NormalizedFrame {
  columns: FrameColumn[];
  rowCount: number;
}

/** Declared column type used when loading a frame into an embedded engine. */
export const DECLARED_TYPES: Record<SemanticType, string> = {
  INTEGER: 'INTEGER',
  FLOAT: 'REAL',
  BOOLEAN: 'BOOLEAN',
  DATETIME: 'TIMESTAMP',
  TEXT: 'TEXT',
};

function isColumnar(frame: FrameInput): frame is Readonly<Record<string, ReadonlyArray<Scalar>>> {
  return !Array.isArray(frame);
}

export function inferSemanticType(values: ReadonlyArray<Scalar>): SemanticType {
  const present = values.filter((v) => v !== null);
  if (present.length === 0) return 'TEXT';
  if (present.every((v) => typeof v === 'boolean')) return 'BOOLEAN';
  if (present.every((v) => v instanceof Date)) return 'DATETIME';
  if (present.every((v) => typeof v === 'bigint' || (typeof v === 'number' && Number.isInteger(v)))) {
    return 'INTEGER';
  }
  if (present.every((v) => typeof v === 'number' || typeof v === 'bigint')) return 'FLOAT';
  return 'TEXT';
}

/** Value as stored by an embedded engine for a column of the given type. */
export function storageValue(value: Scalar, type: SemanticType): string | number | bigint | Uint8Array | null {
  if (value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return value;
  if (type === 'TEXT') return String(value);
  return value;
}

export function normalizeFrame(
  frame: FrameInput,
  columnTypes: Readonly<Record<string, SemanticType>> = {},
): NormalizedFrame {
  const raw = isColumnar(frame) ? fromColumns(frame) : fromRows(frame);
  if (raw.length === 0) {
    throw new ConfigurationError('Frame has no columns.');
  }
  for (const name of Object.keys(columnTypes)) {
    if (!raw.some((c) => c.name === name)) {
      throw new ConfigurationError(`Column type given for unknown column "${name}".`, name);
    }
  }
  return {
    columns: raw.map((c) => ({ ...c, type: columnTypes[c.name] ?? inferSemanticType(c.values) })),
    rowCount: raw[0]?.values.length ?? 0,
  };
}

function fromColumns(frame: Readonly<Record<string, ReadonlyArray<Scalar>>>): Array<Omit<FrameColumn, 'type'>> {
  const columns = Object.entries(frame).map(([name, values]) => {
    const candidate: unknown = values;
    if (!Array.isArray(candidate)) {
      throw new ConfigurationError(`Column "${name}" is not an array of values.`, name);
    }
    return { name, values: values.map((v) => v ?? null) };
  });
  const lengths = new Set(columns.map((c) => c.values.length));
  if (lengths.size > 1) {
    const detail = columns.map((c) => `${c.name}=${c.values.length}`).join(', ');
    throw new ConfigurationError(`Frame columns have different lengths: ${detail}.`);
  }
  return columns;
}

function fromRows(rows: ReadonlyArray<Readonly<Record<string, Scalar | undefined>>>): Array<Omit<FrameColumn, 'type'>> {
  const first = rows[0];
  if (!first) {
    throw new ConfigurationError('Frame has no rows; pass a columnar frame to load an empty table.');
  }
  const names = Object.keys(first);
  rows.forEach((row, index) => {
    const keys = Object.keys(row);
    if (keys.length !== names.length || keys.some((k) => !names.includes(k))) {
      throw new ConfigurationError(
        `Row ${index} has columns [${keys.join(', ')}], expected [${names.join(', ')}].`,
        String(index),
      );
    }
  });
  return names.map((name) => ({ name, values: rows.map((row) => row[name] ?? null) }));
}
