/**
 * Column contract for queries that replace the visible dataset: the result
 * may add columns but must keep every original one.
 */

import { ColumnMismatchError } from '../errors.js';

/** Required columns absent from `actual`, in required order. Exact, case-sensitive names. */
export function findMissingColumns(required: readonly string[], actual: readonly string[]): string[] {
  const present = new Set(actual);
  return required.filter((name) => !present.has(name));
}

export function assertColumnContract(required: readonly string[], actual: readonly string[]): void {
  const missing = findMissingColumns(required, actual);
  if (missing.length > 0) {
    throw new ColumnMismatchError(missing, [...required]);
  }
}
