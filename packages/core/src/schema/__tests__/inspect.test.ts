import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import { DataSource } from '../../db/datasource.js';
import { sqliteConnection } from '../../db/connections/sqlite.js';
import { describeSchema, formatSchema, inspectSchema, NO_RANGE } from '../inspect.js';
import { mapNativeType } from '../types.js';
import { BackendExecutionError, ConfigurationError } from '../../errors.js';

describe('mapNativeType', () => {
  it('maps SQLite declared types', () => {
    assert.equal(mapNativeType('INTEGER'), 'INTEGER');
    assert.equal(mapNativeType('bigint'), 'INTEGER');
    assert.equal(mapNativeType('REAL'), 'FLOAT');
    assert.equal(mapNativeType('NUMERIC(10, 2)'), 'FLOAT');
    assert.equal(mapNativeType('BOOLEAN'), 'BOOLEAN');
    assert.equal(mapNativeType('TIMESTAMP'), 'DATETIME');
    assert.equal(mapNativeType('VARCHAR(20)'), 'TEXT');
  });

  it('maps PostgreSQL information_schema types', () => {
    assert.equal(mapNativeType('double precision'), 'FLOAT');
    assert.equal(mapNativeType('timestamp with time zone'), 'DATETIME');
    assert.equal(mapNativeType('character varying'), 'TEXT');
    assert.equal(mapNativeType('smallint'), 'INTEGER');
  });

  it('does not read INT out of other type names', () => {
    assert.equal(mapNativeType('interval'), 'TEXT');
    assert.equal(mapNativeType('point'), 'TEXT');
    assert.equal(mapNativeType('jsonb'), 'TEXT');
    assert.equal(mapNativeType(''), 'TEXT');
  });
});

describe('inspectSchema', () => {
  it('reports ranges, the no-range sentinel and categorical values', async () => {
    const source = await DataSource.fromFrame(
      {
        id: [1, 2, 3],
        score: [1.1, 3.3, 2.2],
        empty: [null, null, null],
        region: ['south', 'north', null],
        flag: [true, false, true],
      },
      'metrics',
      { columnTypes: { empty: 'FLOAT' } },
    );
    try {
      const text = await describeSchema(source);
      assert.equal(
        text,
        [
          'Table: metrics',
          'Columns:',
          '- id (INTEGER)',
          '  Range: 1 to 3',
          '- score (FLOAT)',
          '  Range: 1.1 to 3.3',
          '- empty (FLOAT)',
          `  Range: ${NO_RANGE}`,
          '- region (TEXT)',
          "  Categorical values: 'north', 'south'",
          '- flag (BOOLEAN)',
        ].join('\n'),
      );
    } finally {
      await source.release();
    }
  });

  it('omits categorical values above the threshold', async () => {
    const source = await DataSource.fromFrame({ code: ['a', 'b', 'c'] }, 'codes');
    try {
      const wide = await inspectSchema(source, { categoricalThreshold: 3 });
      assert.deepEqual(wide.columns[0].facet, { kind: 'categorical', values: ['a', 'b', 'c'] });
      const narrow = await inspectSchema(source, { categoricalThreshold: 2 });
      assert.equal(narrow.columns[0].facet, undefined);
    } finally {
      await source.release();
    }
  });

  it('lists nothing for an all-null text column', async () => {
    const source = await DataSource.fromFrame({ note: [null, null] }, 'notes');
    try {
      const description = await inspectSchema(source);
      assert.equal(description.columns[0].semanticType, 'TEXT');
      assert.equal(description.columns[0].facet, undefined);
    } finally {
      await source.release();
    }
  });

  it('escapes quotes in categorical values and quoted column names', async () => {
    const source = await DataSource.fromFrame({ 'odd "name"': ["o'clock"] }, 'odd');
    try {
      const text = formatSchema(await inspectSchema(source));
      assert.equal(text, ['Table: odd', 'Columns:', '- odd "name" (TEXT)', "  Categorical values: 'o''clock'"].join('\n'));
    } finally {
      await source.release();
    }
  });

  it('describes columns whose names carry typographic characters', async () => {
    const dashed = `price${String.fromCharCode(0x2013)}usd`;
    const curly = `it${String.fromCharCode(0x2019)}s`;
    for (const engine of ['sqlite', 'sqljs']) {
      const source = await DataSource.fromFrame({ [dashed]: [1, 2], [curly]: ['a', 'b'] }, 'prices', { engine });
      try {
        assert.equal(
          await describeSchema(source),
          [
            'Table: prices',
            'Columns:',
            `- ${dashed} (INTEGER)`,
            '  Range: 1 to 2',
            `- ${curly} (TEXT)`,
            "  Categorical values: 'a', 'b'",
          ].join('\n'),
        );
      } finally {
        await source.release();
      }
    }
  });

  it('rejects a threshold below 1', async () => {
    const source = await DataSource.fromFrame({ a: [1] }, 't');
    try {
      await assert.rejects(inspectSchema(source, { categoricalThreshold: 0 }), ConfigurationError);
    } finally {
      await source.release();
    }
  });

  it('propagates statistics failures', async () => {
    const db = new Database(':memory:');
    db.exec('CREATE TABLE t (a INTEGER)');
    const source = await DataSource.fromConnection(sqliteConnection(db), 't');
    db.exec('DROP TABLE t');
    await assert.rejects(inspectSchema(source), BackendExecutionError);
    await source.release();
    db.close();
  });
});
