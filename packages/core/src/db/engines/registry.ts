/**
 * Embedded engine selection.
 *
 * Precedence: explicit argument > process default (setDefaultEmbeddedEngine,
 * then QUERYGATE_EMBEDDED_ENGINE) > built-in default.
 */

import { parseEngineName } from '../../config.js';
import type { Connection } from '../backend.js';
import { ENV, GATEWAY_DEFAULTS, type EmbeddedEngineName } from '../defaults.js';
import type { NormalizedFrame } from '../frame.js';
import { openBetterSqlite } from './better-sqlite.js';
import { openSqlJs } from './sqljs.js';

type EngineOpener = (table: string, frame: NormalizedFrame) => Promise<Connection>;

const ENGINES: Record<EmbeddedEngineName, EngineOpener> = {
  sqlite: openBetterSqlite,
  sqljs: openSqlJs,
};

let processDefault: EmbeddedEngineName | undefined;

/** Set (or with no argument, clear) the engine used when none is given. */
export function setDefaultEmbeddedEngine(name?: string): void {
  processDefault = name === undefined ? undefined : parseEngineName(name);
}

export function resolveEmbeddedEngine(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): EmbeddedEngineName {
  if (explicit !== undefined) return parseEngineName(explicit);
  if (processDefault) return processDefault;
  const fromEnv = env[ENV.embeddedEngine]?.trim();
  if (fromEnv) return parseEngineName(fromEnv);
  return GATEWAY_DEFAULTS.embeddedEngine;
}

export function openEmbeddedEngine(
  engine: EmbeddedEngineName,
  table: string,
  frame: NormalizedFrame,
): Promise<Connection> {
  return ENGINES[engine](table, frame);
}
