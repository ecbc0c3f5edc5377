/**
 * Environment configuration for the gateway.
 *
 * Values are read when asked for; nothing here is cached, so callers decide
 * when ambient settings are resolved.
 */

import { ConfigurationError } from './errors.js';
import {
  EMBEDDED_ENGINE_NAMES,
  ENV,
  GATEWAY_DEFAULTS,
  type EmbeddedEngineName,
} from './db/defaults.js';

export interface GatewayConfig {
  allowUpdates: boolean;
  embeddedEngine?: EmbeddedEngineName;
  categoricalThreshold: number;
}

const TRUTHY = new Set(['1', 'true', 'yes']);

/** "1", "true" and "yes" (any case) are on; anything else, including unset, is off. */
export function isTruthyFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

export function parseEngineName(value: string): EmbeddedEngineName {
  const name = value.trim().toLowerCase();
  const match = EMBEDDED_ENGINE_NAMES.find((engine) => engine === name);
  if (!match) {
    throw new ConfigurationError(
      `Unknown embedded engine "${value}". Supported engines: ${EMBEDDED_ENGINE_NAMES.join(', ')}.`,
      value,
    );
  }
  return match;
}

export function parseCategoricalThreshold(value: number | string): number {
  const n = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(
      `Categorical threshold must be a whole number of at least 1, got "${value}".`,
      String(value),
    );
  }
  return n;
}

/** Explicit value, else QUERYGATE_CATEGORICAL_THRESHOLD, else the default. */
export function resolveCategoricalThreshold(
  explicit?: number | string,
  env: NodeJS.ProcessEnv = process.env,
): number {
  if (explicit !== undefined) return parseCategoricalThreshold(explicit);
  const fromEnv = env[ENV.categoricalThreshold]?.trim();
  return fromEnv ? parseCategoricalThreshold(fromEnv) : GATEWAY_DEFAULTS.categoricalThreshold;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const engine = env[ENV.embeddedEngine]?.trim();
  return {
    allowUpdates: isTruthyFlag(env[ENV.enableUpdateQueries]),
    embeddedEngine: engine ? parseEngineName(engine) : undefined,
    categoricalThreshold: resolveCategoricalThreshold(undefined, env),
  };
}
