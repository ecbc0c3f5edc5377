/**
 * Defaults and environment variable names for the gateway.
 */

export const EMBEDDED_ENGINE_NAMES = ['sqlite', 'sqljs'] as const;

export type EmbeddedEngineName = (typeof EMBEDDED_ENGINE_NAMES)[number];

export const ENV = {
  enableUpdateQueries: 'QUERYGATE_ENABLE_UPDATE_QUERIES',
  embeddedEngine: 'QUERYGATE_EMBEDDED_ENGINE',
  categoricalThreshold: 'QUERYGATE_CATEGORICAL_THRESHOLD',
} as const;

export const GATEWAY_DEFAULTS = {
  /** Engine used when neither the caller nor the process picks one */
  embeddedEngine: 'sqlite' satisfies EmbeddedEngineName,
  /** Max distinct values for a text column to be listed as categorical */
  categoricalThreshold: 20,
  /** Rows shown in tool-result previews */
  previewRows: 5,
} as const;
