import type { Command } from 'commander';
import type { CleanWarning, QueryResult } from '@querygate/core';
import { formatTable } from './util/table.js';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals?.() ?? command.opts();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

/** Cleaner warnings go to stderr so piped table output stays clean. */
export function printCleanWarnings(warnings: ReadonlyArray<CleanWarning | string>, output: OutputOptions): void {
  if (output.quiet) return;
  for (const warning of warnings) {
    console.warn(`Warning: ${typeof warning === 'string' ? warning : warning.message}`);
  }
}

// Query values may be bigints or blobs, which JSON.stringify rejects or mangles.
function jsonValue(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  return value;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, jsonValue, 2));
}

export function printHumanTable(result: QueryResult, output: OutputOptions, maxRows?: number): void {
  printHuman(formatTable(result, maxRows), output);
}

/**
 * Emit a command's result: an `{ ok: true, data }` envelope under --json,
 * otherwise whatever `render` prints for a person.
 */
export function printSuccess<T>(data: T, output: OutputOptions, render: (data: T) => void): void {
  if (output.json) {
    printJson({ ok: true, data });
    return;
  }
  render(data);
}

function errorCode(error: unknown): string {
  return error instanceof CliError ? error.code : 'INTERNAL_ERROR';
}

function debugDetails(error: unknown): unknown {
  if (error instanceof CliError) return error.details ?? null;
  if (error instanceof Error) return { stack: error.stack };
  return { raw: String(error) };
}

/** The SQL fragment a gateway error points at, when it names one. */
function offendingFragment(error: unknown): string | undefined {
  if (!(error instanceof CliError)) return undefined;
  const { details } = error;
  if (typeof details === 'object' && details !== null && 'offendingFragment' in details) {
    return typeof details.offendingFragment === 'string' ? details.offendingFragment : undefined;
  }
  return undefined;
}

export function printError(error: unknown, output: OutputOptions): void {
  const message = error instanceof Error ? error.message : String(error);

  if (output.json) {
    printJson({
      ok: false,
      code: errorCode(error),
      message,
      ...(output.debug ? { details: debugDetails(error) } : {}),
    });
    return;
  }

  console.error(`Error: ${message}`);
  const fragment = offendingFragment(error);
  if (fragment && (output.verbose || output.debug)) {
    console.error(`Near: ${fragment}`);
  }
  if (output.debug) {
    const details = debugDetails(error);
    console.error(typeof details === 'object' && details !== null && 'stack' in details
      ? String(details.stack)
      : `Details: ${JSON.stringify(details, jsonValue, 2)}`);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false) as T;
}
