/**
 * Quote- and comment-aware segmentation of SQL text.
 *
 * This is not a SQL tokenizer: it only knows enough to tell literal text
 * apart from comments and statement terminators, which is all the cleaner
 * and the guard need.
 */

export type SegmentType =
  | 'code'
  | 'string'
  | 'identifier'
  | 'line-comment'
  | 'block-comment'
  | 'terminator';

export interface Segment {
  type: SegmentType;
  text: string;
  /** False for a string, identifier or block comment that runs off the end of the input */
  closed: boolean;
}

// A T-SQL batch separator: GO alone on its line
const GO_LINE_RE = /^[ \t]*GO[ \t]*(?=\r?\n|$)/i;

// Words that open a statement. A GO line separates batches only before one
// of these or the end of input; otherwise it is a column or alias named go.
const STATEMENT_START = new Set([
  'SELECT', 'WITH', 'VALUES', 'TABLE', 'EXPLAIN', 'SHOW', 'DESCRIBE', 'INSERT', 'UPDATE', 'DELETE',
  'MERGE', 'REPLACE', 'UPSERT', 'CREATE', 'DROP', 'ALTER', 'TRUNCATE', 'GRANT', 'REVOKE', 'EXEC',
  'EXECUTE', 'CALL', 'ATTACH', 'DETACH', 'PRAGMA', 'SET', 'RESET', 'COPY', 'LOAD', 'INSTALL',
  'VACUUM', 'USE', 'DECLARE', 'BEGIN', 'COMMIT', 'ROLLBACK', 'PRINT',
]);

function startsStatement(rest: string): boolean {
  const trimmed = rest.trimStart();
  if (!trimmed) return true;
  const word = /^[A-Za-z_]+/.exec(trimmed);
  return word !== null && STATEMENT_START.has(word[0].toUpperCase());
}

export function lexSql(text: string): Segment[] {
  const segments: Segment[] = [];
  let code = '';
  let i = 0;

  const flushCode = (): void => {
    if (code) {
      segments.push({ type: 'code', text: code, closed: true });
      code = '';
    }
  };

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '-' && next === '-') {
      flushCode();
      const end = text.indexOf('\n', i);
      const stop = end === -1 ? text.length : end;
      segments.push({ type: 'line-comment', text: text.slice(i, stop), closed: true });
      i = stop;
      continue;
    }

    if (ch === '/' && next === '*') {
      flushCode();
      const { end, closed } = scanBlockComment(text, i);
      segments.push({ type: 'block-comment', text: text.slice(i, end), closed });
      i = end;
      continue;
    }

    if (ch === "'" || ch === '"') {
      flushCode();
      const { end, closed } = scanQuoted(text, i, ch);
      segments.push({ type: ch === "'" ? 'string' : 'identifier', text: text.slice(i, end), closed });
      i = end;
      continue;
    }

    if (ch === ';') {
      flushCode();
      segments.push({ type: 'terminator', text: ';', closed: true });
      i += 1;
      continue;
    }

    if (i === 0 || text[i - 1] === '\n') {
      const go = GO_LINE_RE.exec(text.slice(i));
      if (go && startsStatement(text.slice(i + go[0].length))) {
        flushCode();
        segments.push({ type: 'terminator', text: go[0], closed: true });
        i += go[0].length;
        continue;
      }
    }

    code += ch;
    i += 1;
  }

  flushCode();
  return segments;
}

/** Nested block comment: only the `*\/` that brings depth back to zero closes it. */
function scanBlockComment(text: string, start: number): { end: number; closed: boolean } {
  let depth = 0;
  let i = start;
  while (i < text.length) {
    if (text[i] === '/' && text[i + 1] === '*') {
      depth += 1;
      i += 2;
    } else if (text[i] === '*' && text[i + 1] === '/') {
      depth -= 1;
      i += 2;
      if (depth === 0) return { end: i, closed: true };
    } else {
      i += 1;
    }
  }
  return { end: text.length, closed: false };
}

/** Quoted token; a doubled quote character is an escape, not a close. */
function scanQuoted(text: string, start: number, quote: string): { end: number; closed: boolean } {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === quote) {
      if (text[i + 1] === quote) {
        i += 2;
        continue;
      }
      return { end: i + 1, closed: true };
    }
    i += 1;
  }
  return { end: text.length, closed: false };
}

/**
 * Skip leading whitespace and comments and return the rest of the text.
 */
export function stripLeadingTrivia(text: string): string {
  let rest = text;
  for (;;) {
    const trimmed = rest.trimStart();
    if (trimmed.startsWith('--')) {
      const end = trimmed.indexOf('\n');
      rest = end === -1 ? '' : trimmed.slice(end + 1);
    } else if (trimmed.startsWith('/*')) {
      rest = trimmed.slice(scanBlockComment(trimmed, 0).end);
    } else {
      return trimmed;
    }
  }
}
