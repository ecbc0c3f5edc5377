/**
 * Policy types for the query guard.
 */

import type { PolicyViolationClass } from '../errors.js';

export interface GuardPolicy {
  /**
   * Allow INSERT/UPDATE/MERGE/REPLACE/UPSERT. When omitted, the
   * QUERYGATE_ENABLE_UPDATE_QUERIES environment toggle decides.
   */
  allowUpdates?: boolean;
}

export interface GuardDecision {
  allowed: boolean;
  keyword: string;
  violation?: PolicyViolationClass;
  reason: string;
}
