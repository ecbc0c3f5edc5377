#!/usr/bin/env node

/**
 * querygate CLI entrypoint.
 * Clean, check and run SQL against a JSON data file or a SQLite database.
 */

import { Command } from 'commander';
import {
  DataSource,
  EMBEDDED_ENGINE_NAMES,
  ENV,
  cleanSql,
  columnNames,
  evaluateQuery,
  formatSchema,
  inspectSchema,
  loadConfig,
  toRecords,
  updatesAllowed,
  type GatewayConfig,
} from '@querygate/core';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  policyError,
  toCliError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCleanWarnings,
  printError,
  printHuman,
  printHumanTable,
  printSuccess,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { openSource, withSourceOptions, type SourceOptions } from './source.js';

const VERSION = '0.1.0';
const DEFAULT_DISPLAY_ROWS = 50;

// ── Helpers ──────────────────────────────────────────────────────────

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data));
    process.stdin.on('error', reject);
  });
}

/** SQL from the positional argument, else from piped stdin, else none. */
async function resolveSql(arg: string | undefined, required: boolean): Promise<string | undefined> {
  if (arg !== undefined) return arg;
  if (!process.stdin.isTTY) return readStdin();
  if (required) {
    throw usageError('Provide SQL as an argument or pipe it via stdin.');
  }
  return undefined;
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw usageError(`Invalid ${flag}: expected a whole number of at least 1.`);
  }
  return n;
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const mapped = toCliError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

async function withSource<T>(opts: SourceOptions, fn: (source: DataSource) => Promise<T>): Promise<T> {
  const source = await openSource(opts);
  try {
    return await fn(source);
  } finally {
    await source.release();
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('querygate')
  .description('querygate: clean, police and run model-written SQL')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Text only:  clean, check
  Data:       schema, run, test
  Setup:      doctor
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check the runtime and the gateway environment settings')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          let config: GatewayConfig | undefined;
          let configError: string | undefined;
          try {
            config = loadConfig();
          } catch (error: unknown) {
            configError = error instanceof Error ? error.message : String(error);
          }

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            engines: [...EMBEDDED_ENGINE_NAMES],
            config: config ?? null,
            configError: configError ?? null,
          };
          if (!config) {
            process.exitCode = EXIT_CODE_USAGE;
          }
          printSuccess(payload, output, () => {
            printHuman('querygate doctor', output);
            printHuman('================', output);
            printHuman('', output);
            printHuman(`Node.js:         ${nodeVersion} ${nodeOk ? 'ok' : '(requires >=20)'}`, output);
            printHuman(`Engines:         ${EMBEDDED_ENGINE_NAMES.join(', ')}`, output);
            if (config) {
              printHuman(`Update queries:  ${config.allowUpdates ? 'ENABLED' : 'blocked'} (${ENV.enableUpdateQueries})`, output);
              printHuman(`Default engine:  ${config.embeddedEngine ?? 'sqlite (built-in)'} (${ENV.embeddedEngine})`, output);
              printHuman(`Categorical max: ${config.categoricalThreshold} (${ENV.categoricalThreshold})`, output);
            } else {
              printHuman(`Configuration:   invalid: ${configError ?? 'unknown error'}`, output);
            }
          });
        });
      }),
  ),
  ['querygate doctor', 'querygate doctor --json'],
);

// ── clean ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('clean [sql]')
      .description('Normalize SQL text without running it')
      .option('--enforce-select', 'Fail unless the statement starts with SELECT', false)
      .action(async function (this: Command, sqlArg: string | undefined, opts: { enforceSelect: boolean }) {
        await runCommand(this, async (output) => {
          const sql = await resolveSql(sqlArg, true);
          printSuccess(cleanSql(sql, { enforceSelect: opts.enforceSelect }), output, (result) => {
            printCleanWarnings(result.warnings, output);
            printHuman(result.sql ?? '(no executable content)', output);
          });
        });
      }),
  ),
  ['querygate clean "SELECT 1;;;"', 'echo "SELECT * FROM t -- note" | querygate clean'],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('check [sql]')
      .description('Clean SQL and report whether the policy allows it')
      .option('--allow-updates', 'Allow INSERT/UPDATE-class statements')
      .action(async function (this: Command, sqlArg: string | undefined, opts: { allowUpdates?: boolean }) {
        await runCommand(this, async (output) => {
          const sql = await resolveSql(sqlArg, true);
          const cleaned = cleanSql(sql);
          if (cleaned.sql === null) {
            throw usageError('No executable SQL after cleaning.');
          }
          const policy = { allowUpdates: updatesAllowed({ allowUpdates: opts.allowUpdates }) };
          const decision = evaluateQuery(cleaned.sql, policy);
          if (!decision.allowed) {
            throw policyError(decision.reason, { keyword: decision.keyword, violation: decision.violation });
          }
          printSuccess({ sql: cleaned.sql, warnings: cleaned.warnings, decision }, output, (checked) => {
            printCleanWarnings(checked.warnings, output);
            printHuman(`Allowed: ${checked.sql}`, output);
            if (output.verbose) {
              printHuman(`Leading keyword: ${checked.decision.keyword || '(none)'}`, output);
            }
          });
        });
      }),
  ),
  ['querygate check "DELETE FROM t"', 'querygate check --allow-updates "INSERT INTO t VALUES (1)"'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withSourceOptions(
      program
        .command('schema')
        .description('Describe a table the way it is shown to a model')
        .option('--threshold <n>', 'Max distinct values listed for a text column'),
    ).action(async function (this: Command, opts: SourceOptions & { threshold?: string }) {
      await runCommand(this, async (output) => {
        const categoricalThreshold =
          opts.threshold === undefined ? undefined : parsePositiveInt(opts.threshold, '--threshold');
        await withSource(opts, async (source) => {
          const description = await inspectSchema(source, { categoricalThreshold });
          printSuccess(description, output, (d) => printHuman(formatSchema(d), output));
        });
      });
    }),
  ),
  ['querygate schema --data pets.json --table pets', 'querygate schema --sqlite shop.db --table orders --threshold 10'],
);

// ── run ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withSourceOptions(
      program
        .command('run [sql]')
        .description('Clean, check and execute SQL; no SQL returns the whole table')
        .option('--max-rows <n>', 'Rows to display', String(DEFAULT_DISPLAY_ROWS)),
    ).action(async function (this: Command, sqlArg: string | undefined, opts: SourceOptions & { maxRows: string }) {
      await runCommand(this, async (output) => {
        const maxRows = parsePositiveInt(opts.maxRows, '--max-rows');
        const sql = await resolveSql(sqlArg, false);
        await withSource(opts, async (source) => {
          const result = await source.execute(sql);
          const data = {
            sql: result.sql,
            warnings: result.warnings,
            rowCount: result.rowCount,
            rowsAffected: result.rowsAffected,
            execMs: result.execMs,
            columns: columnNames(result),
            rows: toRecords(result),
          };
          printSuccess(data, output, () => {
            printCleanWarnings(result.warnings, output);
            printHumanTable(result, output, maxRows);
            if (output.verbose) {
              printHuman(`\n${result.sql}\n${result.rowCount} row(s) in ${result.execMs}ms`, output);
            }
          });
        });
      });
    }),
  ),
  ['querygate run --data pets.json --table pets "SELECT species, COUNT(*) FROM pets GROUP BY species"'],
);

// ── test ─────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    withSourceOptions(
      program
        .command('test [sql]')
        .description('Run SQL with a one-row cap, optionally requiring every original column')
        .option('--require-all-columns', 'Fail unless the result keeps every table column', false),
    ).action(async function (
      this: Command,
      sqlArg: string | undefined,
      opts: SourceOptions & { requireAllColumns: boolean },
    ) {
      await runCommand(this, async (output) => {
        const sql = await resolveSql(sqlArg, true);
        await withSource(opts, async (source) => {
          const result = await source.fetchOneRow(sql, { requireAllColumns: opts.requireAllColumns });
          const data = { sql: result.sql, warnings: result.warnings, row: toRecords(result)[0] ?? null };
          printSuccess(data, output, () => {
            printCleanWarnings(result.warnings, output);
            printHumanTable(result, output);
            printHuman(
              opts.requireAllColumns
                ? `Query OK: keeps all ${source.columnSchema().length} original column(s).`
                : 'Query OK.',
              output,
            );
          });
        });
      });
    }),
  ),
  ['querygate test --sqlite shop.db --table orders --require-all-columns "SELECT * FROM orders WHERE total > 100"'],
);

// ── parse ────────────────────────────────────────────────────────────

function commanderCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    const code = commanderCode(error);
    // Commander reports help/version output and usage mistakes by throwing
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exitCode = EXIT_CODE_SUCCESS;
      return;
    }
    if (code?.startsWith('commander.')) {
      printError(usageError(error instanceof Error ? error.message : String(error)), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
