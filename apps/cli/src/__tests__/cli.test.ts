import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { BackendExecutionError, CleaningError, PolicyViolation, TableNotFoundError } from '@querygate/core';
import { buildResultForDisplay } from './fixtures.js';
import { CliError, EXIT_CODE_POLICY, EXIT_CODE_RUNTIME, EXIT_CODE_USAGE, toCliError, toExitCode } from '../errors.js';
import { openSource, parseColumnTypes, parseFrameJson } from '../source.js';
import { printHuman, printSuccess, type OutputOptions } from '../output.js';
import { formatTable } from '../util/table.js';

describe('toCliError', () => {
  it('maps policy violations to the policy exit code', () => {
    const mapped = toCliError(new PolicyViolation('always-blocked', 'DROP', 'blocked'));
    assert.ok(mapped instanceof CliError);
    assert.equal(mapped.code, 'POLICY_BLOCKED');
    assert.equal(toExitCode(mapped), EXIT_CODE_POLICY);
  });

  it('maps cleaning failures to usage and backend failures to runtime', () => {
    assert.equal(toExitCode(toCliError(new CleaningError('empty'))), EXIT_CODE_USAGE);
    assert.equal(toExitCode(toCliError(new BackendExecutionError('SELECT x', new Error('no such column: x')))), EXIT_CODE_RUNTIME);
    const missing = toCliError(new TableNotFoundError('t'));
    assert.ok(missing instanceof CliError);
    assert.equal(missing.code, 'TABLE_NOT_FOUND');
  });

  it('passes other errors through', () => {
    const error = new Error('boom');
    assert.equal(toCliError(error), error);
    assert.equal(toExitCode(error), EXIT_CODE_RUNTIME);
  });
});

describe('parseFrameJson', () => {
  it('accepts row objects and column arrays', () => {
    assert.deepEqual(parseFrameJson('[{"a":1,"b":"x"}]'), [{ a: 1, b: 'x' }]);
    assert.deepEqual(parseFrameJson('{"a":[1,2],"b":[null,true]}'), { a: [1, 2], b: [null, true] });
  });

  it('rejects nested values and invalid JSON', () => {
    assert.throws(() => parseFrameJson('[{"a":{"nested":1}}]'), CliError);
    assert.throws(() => parseFrameJson('{"a":1}'), CliError);
    assert.throws(() => parseFrameJson('not json'), /is not valid JSON/);
  });
});

describe('parseColumnTypes', () => {
  it('parses name=TYPE pairs case-insensitively', () => {
    assert.deepEqual(parseColumnTypes(['price=float', 'at=DATETIME']), { price: 'FLOAT', at: 'DATETIME' });
  });

  it('rejects unknown types and missing names', () => {
    assert.throws(() => parseColumnTypes(['price=money']), CliError);
    assert.throws(() => parseColumnTypes(['=TEXT']), CliError);
    assert.throws(() => parseColumnTypes(['price']), CliError);
  });
});

describe('formatTable', () => {
  it('pads columns and caps displayed rows', () => {
    const result = buildResultForDisplay(['id', 'name'], [[1, 'alpha'], [2, null], [3, 'c']]);
    assert.equal(
      formatTable(result, 2),
      ['id | name ', '---+------', '1  | alpha', '2  | NULL ', '(2 of 3 rows shown)'].join('\n'),
    );
  });

  it('describes empty results', () => {
    assert.equal(formatTable(buildResultForDisplay(['id'], [])), '(0 rows)');
    assert.equal(formatTable(buildResultForDisplay([], [])), '(no columns)');
  });
});

describe('openSource', () => {
  it('loads a JSON data file into an embedded engine', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'querygate-cli-test-'));
    try {
      const file = join(dir, 'pets.json');
      writeFileSync(file, JSON.stringify([{ id: 1, species: 'cat' }, { id: 2, species: 'dog' }]));
      const source = await openSource({ data: file, table: 'pets', engine: 'sqljs' });
      try {
        assert.equal(source.engine, 'sqljs');
        assert.equal((await source.execute("SELECT id FROM pets WHERE species = 'dog'")).columns[0].values[0], 2);
      } finally {
        await source.release();
      }
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('opens a SQLite file read-only and closes it on release', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'querygate-cli-test-'));
    try {
      const file = join(dir, 'shop.db');
      const setup = new Database(file);
      setup.exec("CREATE TABLE orders (id INTEGER, total REAL); INSERT INTO orders VALUES (1, 9.5);");
      setup.close();

      const source = await openSource({ sqlite: file, table: 'orders', allowUpdates: true });
      assert.equal(source.backendKind, 'external');
      assert.equal((await source.fetchAll()).rowCount, 1);
      await source.release();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('opens the file writable when the environment toggle allows updates', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'querygate-cli-test-'));
    const saved = process.env.QUERYGATE_ENABLE_UPDATE_QUERIES;
    try {
      const file = join(dir, 'shop.db');
      const setup = new Database(file);
      setup.exec('CREATE TABLE orders (id INTEGER, total REAL);');
      setup.close();

      process.env.QUERYGATE_ENABLE_UPDATE_QUERIES = 'true';
      const source = await openSource({ sqlite: file, table: 'orders' });
      try {
        assert.equal((await source.execute('INSERT INTO orders VALUES (2, 4.25)')).rowsAffected, 1);
      } finally {
        await source.release();
      }
    } finally {
      if (saved === undefined) {
        delete process.env.QUERYGATE_ENABLE_UPDATE_QUERIES;
      } else {
        process.env.QUERYGATE_ENABLE_UPDATE_QUERIES = saved;
      }
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('requires exactly one data source and a table', async () => {
    await assert.rejects(openSource({ table: 't' }), CliError);
    await assert.rejects(openSource({ data: 'a.json', sqlite: 'b.db', table: 't' }), CliError);
    await assert.rejects(openSource({ data: 'a.json' }), CliError);
  });
});

describe('printSuccess', () => {
  const base: OutputOptions = { json: false, quiet: false, verbose: false, debug: false };

  it('wraps data in an ok envelope under --json', (t) => {
    const log = t.mock.method(console, 'log', () => {});
    let rendered = false;
    printSuccess({ rows: 2, big: 12n }, { ...base, json: true }, () => {
      rendered = true;
    });
    assert.equal(rendered, false);
    assert.equal(log.mock.callCount(), 1);
    assert.equal(log.mock.calls[0].arguments[0], JSON.stringify({ ok: true, data: { rows: 2, big: '12' } }, null, 2));
  });

  it('hands the data to the human renderer otherwise', (t) => {
    const log = t.mock.method(console, 'log', () => {});
    printSuccess({ sql: 'SELECT 1' }, base, (data) => printHuman(`Allowed: ${data.sql}`, base));
    assert.deepEqual(log.mock.calls.map((c) => c.arguments[0]), ['Allowed: SELECT 1']);
  });
});
