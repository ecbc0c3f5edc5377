import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { evaluateQuery, guardQuery, leadingKeyword, readOnlyViolation, updatesAllowed } from '../guard.js';
import { PolicyViolation } from '../../errors.js';

const TOGGLE = 'QUERYGATE_ENABLE_UPDATE_QUERIES';

function violationOf(fn: () => unknown): PolicyViolation {
  try {
    fn();
  } catch (err: unknown) {
    assert.ok(err instanceof PolicyViolation, 'expected a PolicyViolation');
    return err;
  }
  assert.fail('expected the guard to throw');
}

describe('guardQuery', () => {
  let saved: string | undefined;

  beforeEach(() => {
    saved = process.env[TOGGLE];
    delete process.env[TOGGLE];
  });

  afterEach(() => {
    if (saved === undefined) {
      delete process.env[TOGGLE];
    } else {
      process.env[TOGGLE] = saved;
    }
  });

  it('returns allowed queries unchanged', () => {
    const sql = '  SELECT * FROM t WHERE x = 1';
    assert.equal(guardQuery(sql), sql);
  });

  it('blocks schema and row deletion by default', () => {
    for (const sql of ['DROP TABLE t', 'DELETE FROM t', 'truncate t', 'Alter TABLE t ADD c INT']) {
      assert.throws(() => guardQuery(sql), PolicyViolation, sql);
    }
  });

  it('blocks session and engine control verbs', () => {
    for (const sql of ["ATTACH DATABASE 'x.db' AS x", 'PRAGMA writable_schema = 1', 'SET search_path = x', 'COPY t TO STDOUT']) {
      assert.throws(() => guardQuery(sql), PolicyViolation, sql);
    }
  });

  it('blocks row mutations by default', () => {
    const violation = violationOf(() => guardQuery('INSERT INTO t VALUES (1)'));
    assert.equal(violation.violation, 'update-blocked');
    assert.equal(violation.keyword, 'INSERT');
    assert.equal(violation.offendingFragment, 'INSERT');
    assert.match(violation.message, /QUERYGATE_ENABLE_UPDATE_QUERIES=true/);
  });

  it('reports always-blocked keywords uppercased', () => {
    const violation = violationOf(() => guardQuery('drop table t'));
    assert.equal(violation.violation, 'always-blocked');
    assert.equal(violation.keyword, 'DROP');
  });

  it('matches only the leading keyword', () => {
    assert.equal(guardQuery('SELECT update_count FROM t'), 'SELECT update_count FROM t');
    assert.equal(guardQuery('SELECT * FROM delete_logs'), 'SELECT * FROM delete_logs');
    assert.equal(guardQuery("SELECT 'DROP TABLE t' AS s"), "SELECT 'DROP TABLE t' AS s");
  });

  it('looks past leading comments', () => {
    assert.throws(() => guardQuery('/* harmless */ DROP TABLE t'), PolicyViolation);
    assert.throws(() => guardQuery('-- note\nDELETE FROM t'), PolicyViolation);
  });

  it('allows updates with an explicit policy, never always-blocked verbs', () => {
    assert.equal(guardQuery('INSERT INTO t VALUES (1)', { allowUpdates: true }), 'INSERT INTO t VALUES (1)');
    assert.throws(() => guardQuery('DROP TABLE t', { allowUpdates: true }), PolicyViolation);
  });

  it('allows updates through the environment toggle', () => {
    process.env[TOGGLE] = 'Yes';
    assert.equal(guardQuery('INSERT INTO t VALUES (1)'), 'INSERT INTO t VALUES (1)');
    assert.throws(() => guardQuery('DROP TABLE t'), PolicyViolation);
  });

  it('lets an explicit policy override the environment toggle', () => {
    process.env[TOGGLE] = 'true';
    assert.throws(() => guardQuery('UPDATE t SET a = 1', { allowUpdates: false }), PolicyViolation);
  });
});

describe('updatesAllowed', () => {
  it('accepts 1, true and yes in any case', () => {
    for (const value of ['1', 'true', 'TRUE', 'yes', ' Yes ']) {
      assert.equal(updatesAllowed({}, { [TOGGLE]: value }), true, value);
    }
  });

  it('treats anything else as off', () => {
    for (const value of ['0', 'false', 'on', '']) {
      assert.equal(updatesAllowed({}, { [TOGGLE]: value }), false, value);
    }
    assert.equal(updatesAllowed({}, {}), false);
  });
});

describe('leadingKeyword', () => {
  it('returns an empty keyword for statements that open with a parenthesis', () => {
    assert.equal(leadingKeyword('(SELECT 1)'), '');
    assert.equal(evaluateQuery('(SELECT 1)').allowed, true);
  });

  it('reads the keyword after whitespace and nested comments', () => {
    assert.equal(leadingKeyword('  /* a /* b */ */\n-- c\n  select x FROM t'), 'SELECT');
  });

  it('reads the verb that follows a CTE list', () => {
    assert.equal(leadingKeyword('with x AS (SELECT 1) SELECT * FROM x'), 'SELECT');
    assert.equal(leadingKeyword('WITH x AS (SELECT 1) DELETE FROM t'), 'DELETE');
    assert.equal(
      leadingKeyword('WITH RECURSIVE r(n) AS (SELECT 1 UNION ALL SELECT n + 1 FROM r WHERE n < 3) INSERT INTO t SELECT n FROM r'),
      'INSERT',
    );
    assert.equal(
      leadingKeyword('WITH a AS MATERIALIZED (SELECT 1), "b c" AS NOT MATERIALIZED (SELECT 2) update t SET v = 1'),
      'UPDATE',
    );
  });

  it('ignores parentheses and keywords inside CTE bodies and literals', () => {
    assert.equal(leadingKeyword("WITH x AS (SELECT ')' AS p, 'DELETE' AS q) SELECT * FROM x"), 'SELECT');
    assert.equal(leadingKeyword('WITH x AS (SELECT (1 + (2)) AS p) /* DELETE */ SELECT p FROM x'), 'SELECT');
  });

  it('keeps WITH when the CTE list does not parse', () => {
    assert.equal(leadingKeyword('WITH'), 'WITH');
    assert.equal(leadingKeyword('WITH x (SELECT 1) DELETE FROM t'), 'WITH');
  });
});

describe('guardQuery on CTE statements', () => {
  let saved: string | undefined;

  beforeEach(() => {
    saved = process.env[TOGGLE];
    delete process.env[TOGGLE];
  });

  afterEach(() => {
    if (saved === undefined) {
      delete process.env[TOGGLE];
    } else {
      process.env[TOGGLE] = saved;
    }
  });

  it('always blocks a delete behind a CTE', () => {
    const violation = violationOf(() => guardQuery('WITH x AS (SELECT 1) DELETE FROM t', { allowUpdates: true }));
    assert.equal(violation.violation, 'always-blocked');
    assert.equal(violation.keyword, 'DELETE');
  });

  it('blocks an update behind a CTE unless updates are allowed', () => {
    const sql = 'WITH x AS (SELECT 1) UPDATE t SET v = 99';
    const violation = violationOf(() => guardQuery(sql));
    assert.equal(violation.violation, 'update-blocked');
    assert.equal(violation.keyword, 'UPDATE');
    assert.equal(guardQuery(sql, { allowUpdates: true }), sql);
  });

  it('allows a read behind a CTE', () => {
    const sql = 'WITH totals AS (SELECT region, SUM(v) AS s FROM t GROUP BY region) SELECT * FROM totals';
    assert.equal(guardQuery(sql), sql);
  });
});

describe('readOnlyViolation', () => {
  it('classifies the refused statement by its verb', () => {
    assert.equal(readOnlyViolation('DELETE FROM t').violation, 'always-blocked');
    const update = readOnlyViolation('UPDATE t SET v = 1');
    assert.equal(update.violation, 'update-blocked');
    assert.equal(update.keyword, 'UPDATE');
  });
});
