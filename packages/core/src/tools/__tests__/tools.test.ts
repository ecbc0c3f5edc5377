import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DataSource } from '../../db/datasource.js';
import { resetDashboardTool, runQueryTool, updateDashboardTool, type DashboardUpdate } from '../tools.js';
import { previewTable } from '../markdown.js';
import { buildResult } from '../../db/result.js';

const PETS = [
  { id: 1, species: 'cat', age: 3 },
  { id: 2, species: 'dog', age: 5 },
  { id: 3, species: 'cat', age: 1 },
];

describe('agent tools', () => {
  let source: DataSource;

  before(async () => {
    source = await DataSource.fromFrame(PETS, 'pets', { allowUpdates: false });
  });

  after(async () => {
    await source.release();
  });

  it('runs a query and renders a preview', async () => {
    const outcome = await runQueryTool(source, { query: "SELECT id FROM pets WHERE species = 'cat' ORDER BY id" });
    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.deepEqual(outcome.result.columns, [{ name: 'id', values: [1, 3] }]);
      assert.equal(
        outcome.markdown,
        "```sql\nSELECT id FROM pets WHERE species = 'cat' ORDER BY id\n```\n\n| id |\n| --- |\n| 1 |\n| 3 |",
      );
    }
  });

  it('returns policy violations as structured errors', async () => {
    const outcome = await runQueryTool(source, { query: 'DROP TABLE pets' });
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.error.kind, 'PolicyViolation');
      assert.equal(outcome.error.offendingFragment, 'DROP');
      assert.match(outcome.markdown, /^```sql\nDROP TABLE pets\n```\n\n> Error \(PolicyViolation\): /);
    }
  });

  it('rejects malformed arguments', async () => {
    const outcome = await runQueryTool(source, { sql: 'SELECT 1' });
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.error.kind, 'ToolArgumentError');
    }
  });

  it('hands a full-width query to the dashboard', async () => {
    const updates: DashboardUpdate[] = [];
    const outcome = await updateDashboardTool(
      source,
      { query: 'SELECT * FROM pets WHERE age > 2', title: 'Older pets' },
      (update) => {
        updates.push(update);
      },
    );
    assert.equal(outcome.ok, true);
    assert.deepEqual(updates, [{ query: 'SELECT * FROM pets WHERE age > 2', title: 'Older pets' }]);
    assert.equal(outcome.markdown, '**Older pets**\n\n```sql\nSELECT * FROM pets WHERE age > 2\n```');
  });

  it('does not update the dashboard when columns are dropped', async () => {
    const updates: DashboardUpdate[] = [];
    const outcome = await updateDashboardTool(source, { query: 'SELECT species FROM pets', title: 'Species' }, (u) => {
      updates.push(u);
    });
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.error.kind, 'ColumnMismatchError');
      assert.equal(outcome.error.offendingFragment, 'id, age');
    }
    assert.deepEqual(updates, []);
  });

  it('requires a title for dashboard updates', async () => {
    const outcome = await updateDashboardTool(source, { query: 'SELECT * FROM pets' }, () => undefined);
    assert.equal(outcome.ok, false);
  });

  it('resets the dashboard', async () => {
    let reset = false;
    const outcome = await resetDashboardTool(() => {
      reset = true;
    });
    assert.equal(outcome.ok, true);
    assert.equal(reset, true);
  });
});

describe('previewTable', () => {
  it('caps rows and escapes pipes', () => {
    const result = buildResult(
      { columnNames: ['v'], rows: [['a|b'], [2], [3]] },
      { sql: 'SELECT v', warnings: [], execMs: 0 },
    );
    assert.equal(previewTable(result, 2), '| v |\n| --- |\n| a\\|b |\n| 2 |\n\n_Showing 2 of 3 rows._');
  });

  it('notes empty results', () => {
    const result = buildResult({ columnNames: ['v'], rows: [] }, { sql: 'SELECT v', warnings: [], execMs: 0 });
    assert.equal(previewTable(result), '| v |\n| --- |\n\n_No rows._');
  });
});
