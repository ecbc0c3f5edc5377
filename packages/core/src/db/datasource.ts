/**
 * DataSource: one queryable table behind the cleaning and policy pipeline.
 *
 * Every query goes raw text -> cleanSql -> guardQuery -> backend. A failure
 * at any step is thrown to the caller; no step substitutes a default result.
 */

import { BackendExecutionError, PolicyViolation, SourceReleasedError, TableNotFoundError } from '../errors.js';
import { guardQuery, updatesAllowed } from '../policy/guard.js';
import { cleanSql } from '../sql/clean.js';
import { closeBackend, dialectLabel, type Backend, type Connection } from './backend.js';
import { assertColumnContract } from './contract.js';
import type { EmbeddedEngineName } from './defaults.js';
import { openEmbeddedEngine, resolveEmbeddedEngine } from './engines/registry.js';
import { normalizeFrame } from './frame.js';
import { displayName, normalizeIdentifier, tableReference, type QualifiedName } from './identifier.js';
import { buildResult } from './result.js';
import type {
  BackendKind,
  ColumnInfo,
  FrameInput,
  QueryResult,
  RawRows,
  SemanticType,
  SourceState,
  TableIdentifier,
} from './types.js';

export interface FrameSourceOptions {
  /** Embedded engine name, case-insensitive. Defaults to the process default. */
  engine?: string;
  /** Override inferred semantic types per column */
  columnTypes?: Readonly<Record<string, SemanticType>>;
  /** Allow INSERT/UPDATE-class statements. Defaults to the environment toggle. */
  allowUpdates?: boolean;
}

export interface ConnectionSourceOptions {
  /** Close the connection when the source is released */
  ownsConnection?: boolean;
  allowUpdates?: boolean;
}

export interface FetchOneRowOptions {
  /** Fail unless the result keeps every original table column */
  requireAllColumns?: boolean;
}

interface PreparedQuery {
  sql: string;
  warnings: string[];
}

export class DataSource {
  private currentState: SourceState = 'constructed';
  private columns: ColumnInfo[] = [];

  private constructor(
    private readonly name: QualifiedName,
    private readonly backend: Backend,
    private readonly allowUpdates: boolean,
  ) {}

  /**
   * Load an in-memory frame into a private embedded database.
   */
  static async fromFrame(
    frame: FrameInput,
    tableName: string,
    options: FrameSourceOptions = {},
  ): Promise<DataSource> {
    const engine = resolveEmbeddedEngine(options.engine);
    const allowUpdates = updatesAllowed({ allowUpdates: options.allowUpdates });
    const name = normalizeIdentifier(tableName);
    const normalized = normalizeFrame(frame, options.columnTypes);
    const connection = await openEmbeddedEngine(engine, name.table, normalized);
    return DataSource.open(name, { kind: 'embedded', engine, connection }, allowUpdates);
  }

  /**
   * Wrap a caller's open connection. The table must already exist.
   */
  static async fromConnection(
    connection: Connection,
    table: TableIdentifier,
    options: ConnectionSourceOptions = {},
  ): Promise<DataSource> {
    const allowUpdates = updatesAllowed({ allowUpdates: options.allowUpdates });
    const name = normalizeIdentifier(table);
    const backend: Backend = {
      kind: 'external',
      ownsConnection: options.ownsConnection ?? false,
      connection,
    };
    return DataSource.open(name, backend, allowUpdates);
  }

  private static async open(name: QualifiedName, backend: Backend, allowUpdates: boolean): Promise<DataSource> {
    const source = new DataSource(name, backend, allowUpdates);
    try {
      await source.validate();
    } catch (err: unknown) {
      await closeBackend(backend);
      throw err;
    }
    return source;
  }

  private async validate(): Promise<void> {
    const { connection } = this.backend;
    if (!(await connection.tableExists(this.name))) {
      throw new TableNotFoundError(displayName(this.name));
    }
    this.columns = await connection.describeColumns(this.name);
    this.currentState = 'validated';
  }

  get state(): SourceState {
    return this.currentState;
  }

  get backendKind(): BackendKind {
    return this.backend.kind;
  }

  /** Engine name for embedded sources */
  get engine(): EmbeddedEngineName | undefined {
    return this.backend.kind === 'embedded' ? this.backend.engine : undefined;
  }

  identifier(): string {
    return displayName(this.name);
  }

  qualifiedName(): QualifiedName {
    return { ...this.name };
  }

  /** Dialect label for prompts, e.g. "SQLite". */
  dbType(): string {
    return dialectLabel(this.backend.connection.dialect);
  }

  /** Columns as captured when the source was validated. */
  columnSchema(): ColumnInfo[] {
    this.assertUsable();
    return this.columns.map((c) => ({ ...c }));
  }

  async execute(query?: string | null): Promise<QueryResult> {
    this.assertUsable();
    const prepared = this.prepare(query);
    return this.run(prepared.sql, prepared.warnings);
  }

  /**
   * At most one row, capped by the backend through LIMIT 1.
   */
  async fetchOneRow(query?: string | null, options: FetchOneRowOptions = {}): Promise<QueryResult> {
    this.assertUsable();
    const prepared = this.prepare(query);
    const result = await this.run(
      `SELECT * FROM (${prepared.sql}) AS subquery LIMIT 1`,
      prepared.warnings,
    );
    if (options.requireAllColumns) {
      assertColumnContract(
        this.columns.map((c) => c.name),
        result.columns.map((c) => c.name),
      );
    }
    return result;
  }

  async fetchAll(): Promise<QueryResult> {
    this.assertUsable();
    return this.run(this.identityQuery(), []);
  }

  /** Safe to call more than once; owned resources are freed on the first call. */
  async release(): Promise<void> {
    if (this.currentState === 'released') return;
    this.currentState = 'released';
    await closeBackend(this.backend);
  }

  private identityQuery(): string {
    return `SELECT * FROM ${tableReference(this.name)}`;
  }

  private prepare(query: string | null | undefined): PreparedQuery {
    const cleaned = cleanSql(query);
    const warnings = cleaned.warnings.map((w) => w.message);
    if (cleaned.sql === null) {
      return { sql: this.identityQuery(), warnings };
    }
    return { sql: guardQuery(cleaned.sql, { allowUpdates: this.allowUpdates }), warnings };
  }

  private async run(sql: string, warnings: string[]): Promise<QueryResult> {
    const start = performance.now();
    let raw: RawRows;
    try {
      raw = await this.backend.connection.run(sql, { readOnly: !this.allowUpdates });
    } catch (err: unknown) {
      if (err instanceof PolicyViolation) throw err;
      throw new BackendExecutionError(sql, err);
    }
    const execMs = Math.round(performance.now() - start);
    this.currentState = 'active';
    return buildResult(raw, { sql, warnings, execMs });
  }

  private assertUsable(): void {
    if (this.currentState === 'released') {
      throw new SourceReleasedError(this.identifier());
    }
  }
}
