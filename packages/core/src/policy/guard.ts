/**
 * QueryGuard: blocks statements that mutate data, schema, permissions or
 * engine/session state.
 *
 * Only the statement's verb is examined: its leading keyword, or for a
 * `WITH` statement the keyword after the CTE list. Column names, table names
 * and literals that merely contain a keyword (`update_count`, `delete_logs`)
 * are never matched.
 */

import { PolicyViolation } from '../errors.js';
import { lexSql, stripLeadingTrivia } from '../sql/lexer.js';
import { isTruthyFlag } from '../config.js';
import { ENV } from '../db/defaults.js';
import type { GuardDecision, GuardPolicy } from './types.js';

/** Never allowed, whatever the policy says. */
export const ALWAYS_BLOCKED_KEYWORDS: ReadonlySet<string> = new Set([
  'DELETE',
  'TRUNCATE',
  'CREATE',
  'DROP',
  'ALTER',
  'GRANT',
  'REVOKE',
  'EXEC',
  'EXECUTE',
  'CALL',
  'ATTACH',
  'DETACH',
  'PRAGMA',
  'SET',
  'RESET',
  'COPY',
  'LOAD',
  'INSTALL',
  'VACUUM',
]);

/** Row-mutating verbs; allowed only when updates are explicitly enabled. */
export const UPDATE_BLOCKED_KEYWORDS: ReadonlySet<string> = new Set([
  'INSERT',
  'UPDATE',
  'MERGE',
  'REPLACE',
  'UPSERT',
]);

const WORD_RE = /^[A-Za-z_]/;

/**
 * Tokens outside any parentheses, with each parenthesized group reduced to
 * `()` and each quoted string or identifier to `'` or `"`. Stops at the
 * first terminator.
 */
function topLevelTokens(sql: string): string[] {
  const tokens: string[] = [];
  let depth = 0;
  for (const segment of lexSql(sql)) {
    if (segment.type === 'terminator') break;
    if (segment.type === 'line-comment' || segment.type === 'block-comment') continue;
    if (segment.type !== 'code') {
      if (depth === 0) tokens.push(segment.type === 'string' ? "'" : '"');
      continue;
    }
    for (const [token] of segment.text.matchAll(/[A-Za-z_][A-Za-z0-9_$]*|\S/g)) {
      if (token === '(') {
        if (depth === 0) tokens.push('()');
        depth += 1;
      } else if (token === ')') {
        depth = Math.max(0, depth - 1);
      } else if (depth === 0) {
        tokens.push(token);
      }
    }
  }
  return tokens;
}

/**
 * Verb after `WITH [RECURSIVE] name [(cols)] AS [[NOT] MATERIALIZED] (...) [, ...]`,
 * or '' when the CTE list does not have that shape.
 */
function verbAfterCtes(tokens: string[]): string {
  const upper = (i: number): string => (tokens[i] ?? '').toUpperCase();
  let i = 1;
  if (upper(i) === 'RECURSIVE') i += 1;
  for (;;) {
    i += 1; // CTE name
    if (tokens[i] === '()') i += 1;
    if (upper(i) !== 'AS') return '';
    i += 1;
    if (upper(i) === 'NOT') i += 1;
    if (upper(i) === 'MATERIALIZED') i += 1;
    if (tokens[i] !== '()') return '';
    i += 1;
    if (tokens[i] !== ',') break;
    i += 1;
  }
  return WORD_RE.test(tokens[i] ?? '') ? upper(i) : '';
}

/**
 * Verb of a statement, uppercased: the leading keyword, or for `WITH` the
 * keyword that follows the CTE list. '' when the statement starts with
 * something other than a word (a parenthesis, a literal).
 */
export function leadingKeyword(sql: string): string {
  const match = /^[A-Za-z_]+/.exec(stripLeadingTrivia(sql));
  const keyword = match ? match[0].toUpperCase() : '';
  if (keyword !== 'WITH') return keyword;
  return verbAfterCtes(topLevelTokens(sql)) || keyword;
}

/**
 * Resolve whether update-blocked statements are allowed: an explicit policy
 * value wins, otherwise the environment toggle decides.
 */
export function updatesAllowed(policy: GuardPolicy = {}, env: NodeJS.ProcessEnv = process.env): boolean {
  if (policy.allowUpdates !== undefined) return policy.allowUpdates;
  return isTruthyFlag(env[ENV.enableUpdateQueries]);
}

/**
 * Non-throwing form of the guard, for reporting.
 */
export function evaluateQuery(sql: string, policy: GuardPolicy = {}): GuardDecision {
  const keyword = leadingKeyword(sql);

  if (ALWAYS_BLOCKED_KEYWORDS.has(keyword)) {
    return {
      allowed: false,
      keyword,
      violation: 'always-blocked',
      reason: `Query uses a disallowed operation: ${keyword}. Only read queries can be run against this data source.`,
    };
  }

  if (UPDATE_BLOCKED_KEYWORDS.has(keyword) && !updatesAllowed(policy)) {
    return {
      allowed: false,
      keyword,
      violation: 'update-blocked',
      reason:
        `Query uses an update operation: ${keyword}. ` +
        `Set ${ENV.enableUpdateQueries}=true to allow update queries.`,
    };
  }

  return { allowed: true, keyword, reason: 'Statement allowed' };
}

/**
 * Violation for a statement a backend refused to run read-only, for use by
 * connections that enforce the policy themselves while updates are disabled.
 */
export function readOnlyViolation(sql: string): PolicyViolation {
  const keyword = leadingKeyword(sql);
  return new PolicyViolation(
    ALWAYS_BLOCKED_KEYWORDS.has(keyword) ? 'always-blocked' : 'update-blocked',
    keyword,
    `Query would modify the database, which is not allowed while ${ENV.enableUpdateQueries} is off.`,
  );
}

/**
 * Return `sql` unchanged if it passes the policy, otherwise throw PolicyViolation.
 */
export function guardQuery(sql: string, policy: GuardPolicy = {}): string {
  const decision = evaluateQuery(sql, policy);
  if (decision.violation) {
    throw new PolicyViolation(decision.violation, decision.keyword, decision.reason);
  }
  return sql;
}
