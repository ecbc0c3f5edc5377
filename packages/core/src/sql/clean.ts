/**
 * QueryCleaner: turns model-written SQL text into a single executable statement.
 *
 * Recoverable irregularities (stray terminators, stacked statements, a quote
 * or parenthesis cut off by truncated output) become warnings. Only input with
 * nothing executable left raises.
 */

import { CleaningError, NotASelectError } from '../errors.js';
import { lexSql, type Segment } from './lexer.js';

export type CleanWarningCode =
  | 'multiple-statements'
  | 'extra-terminators'
  | 'unbalanced-single-quote'
  | 'unbalanced-double-quote'
  | 'unbalanced-parentheses'
  | 'unterminated-comment'
  | 'stripped-characters';

export interface CleanWarning {
  code: CleanWarningCode;
  message: string;
}

export interface CleanOptions {
  /** Reject anything whose first word is not SELECT. Default: false */
  enforceSelect?: boolean;
}

export interface CleanResult {
  /** The cleaned statement, or null when no executable content remains */
  sql: string | null;
  warnings: CleanWarning[];
}

// C0 controls except tab/LF/CR, DEL, C1 controls, zero-width characters,
// and typographic quotes, dashes and ellipsis, outside quoted text.
// eslint-disable-next-line no-control-regex
const STRIPPED_CHARACTERS_RE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u200B-\u200D\u2060\uFEFF\u2013\u2014\u2018-\u201F\u2026]/g;

const PREVIEW_LENGTH = 60;
const CONTEXT_LENGTH = 100;

export function cleanSql(input: unknown, options: CleanOptions = {}): CleanResult {
  if (input === null || input === undefined) {
    return { sql: null, warnings: [] };
  }
  if (typeof input !== 'string') {
    throw new CleaningError(`Expected SQL query text, received ${typeof input}.`);
  }

  const warnings: CleanWarning[] = [];
  const context = input.slice(0, CONTEXT_LENGTH);

  // Quoted strings and identifiers are data and keep every character
  const text = lexSql(input)
    .map((s) => (s.type === 'string' || s.type === 'identifier' ? s.text : s.text.replace(STRIPPED_CHARACTERS_RE, '')))
    .join('');
  const removed = input.length - text.length;
  if (removed > 0) {
    warnings.push({
      code: 'stripped-characters',
      message: `Removed ${removed} non-printable or typographic character(s) that break SQL syntax.`,
    });
  }

  // Comments go first; terminators are only looked for in what remains,
  // so a GO uncovered by comment removal is treated the same on every pass.
  let uncommented = '';
  for (const segment of lexSql(text)) {
    if (segment.type === 'line-comment') continue;
    if (segment.type === 'block-comment') {
      if (!segment.closed) {
        warnings.push({
          code: 'unterminated-comment',
          message: 'SQL contains an unterminated /* comment; the rest of the query was dropped.',
        });
      }
      uncommented += ' ';
      continue;
    }
    uncommented += segment.text;
  }

  const segments = lexSql(uncommented);
  const split = segments.findIndex((s) => s.type === 'terminator');
  const first = split === -1 ? segments : segments.slice(0, split);
  const rest = split === -1 ? [] : segments.slice(split + 1);

  let statement = joinSegments(first).trim();
  const ignored = countStatements(rest);

  if (ignored > 0) {
    if (!statement) {
      throw new CleaningError(
        'The query begins with an empty statement; nothing executable precedes the first terminator.',
        joinSegments(rest).trim().slice(0, CONTEXT_LENGTH),
      );
    }
    warnings.push({
      code: 'multiple-statements',
      message:
        'Multiple SQL statements detected. Only the first statement will be used. ' +
        `Using: ${preview(statement)}. Ignoring ${ignored} additional statement(s).`,
    });
  } else if (split !== -1) {
    const terminators = segments.filter((s) => s.type === 'terminator').length;
    if (terminators > 1) {
      warnings.push({
        code: 'extra-terminators',
        message: `Removed ${terminators} trailing statement terminators.`,
      });
    }
  }

  if (!statement) {
    return { sql: null, warnings };
  }

  const tail = lastSegment(first);
  if (tail && !tail.closed && (tail.type === 'string' || tail.type === 'identifier')) {
    const single = tail.type === 'string';
    warnings.push({
      code: single ? 'unbalanced-single-quote' : 'unbalanced-double-quote',
      message: `SQL contains unbalanced ${single ? 'single' : 'double'} quotes, which may cause errors: ${context}`,
    });
    statement += single ? "'" : '"';
  }

  const depth = parenDepth(first);
  if (depth !== 0) {
    warnings.push({
      code: 'unbalanced-parentheses',
      message: `SQL contains unbalanced parentheses, which may cause errors: ${context}`,
    });
    if (depth > 0) {
      statement += ')'.repeat(depth);
    }
  }

  if (options.enforceSelect && !/^SELECT\b/i.test(statement)) {
    throw new NotASelectError(statement);
  }

  return { sql: statement, warnings };
}

function joinSegments(segments: Segment[]): string {
  return segments.map((s) => s.text).join('');
}

/** Number of non-empty statements in a run of segments. */
function countStatements(segments: Segment[]): number {
  let count = 0;
  let current = '';
  for (const segment of [...segments, { type: 'terminator', text: '', closed: true } satisfies Segment]) {
    if (segment.type === 'terminator') {
      if (current.trim()) count += 1;
      current = '';
    } else {
      current += segment.text;
    }
  }
  return count;
}

function lastSegment(segments: Segment[]): Segment | undefined {
  for (let i = segments.length - 1; i >= 0; i--) {
    if (segments[i].text.trim()) return segments[i];
  }
  return undefined;
}

function parenDepth(segments: Segment[]): number {
  let depth = 0;
  for (const segment of segments) {
    if (segment.type !== 'code') continue;
    for (const ch of segment.text) {
      if (ch === '(') depth += 1;
      else if (ch === ')') depth -= 1;
    }
  }
  return depth;
}

function preview(statement: string): string {
  return statement.length > PREVIEW_LENGTH ? `${statement.slice(0, PREVIEW_LENGTH)}...` : statement;
}
