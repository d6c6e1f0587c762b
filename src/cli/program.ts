/**
 * `toon` command line: formatting, checking and converting TOON tables.
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { fromCsv, toCsv } from '../csv.js';
import { ToonInputError, ToonIoError } from '../errors.js';
import { readToon, writeToon } from '../io.js';
import { parse } from '../parser.js';
import { fromRecords, toRecords } from '../records.js';
import { serialize } from '../stringify.js';
import { defaultRuntime, runCommandWithRuntime, type CliRuntime } from './runtime.js';

type FmtOptions = { write?: boolean };
type ToJsonOptions = { pretty?: boolean };
type FromOptions = { name?: string };

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new ToonIoError('Cannot read file', { path, cause: err });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function registerToonCommands(program: Command, runtime: CliRuntime = defaultRuntime): void {
  program
    .command('fmt <file>')
    .description('Parse a .toon file and print it in canonical form (rows must match the header)')
    .option('--write', 'Rewrite the file in place instead of printing', false)
    .action(async (file: string, opts: FmtOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        const doc = await readToon(file, { arity: 'strict' });
        if (opts.write) {
          await writeToon(file, doc);
          return;
        }
        runtime.log(serialize(doc));
      });
    });

  program
    .command('check <file>')
    .description('Validate a .toon file and report whether it is in canonical form')
    .action(async (file: string) => {
      await runCommandWithRuntime(runtime, async () => {
        const text = await readText(file);
        const doc = parse(text, { arity: 'strict' });
        const canonical = serialize(doc) === text.trim();
        runtime.log(`table: ${doc.tableName ?? '(none)'}`);
        runtime.log(`columns: ${doc.columns.length}`);
        runtime.log(`rows: ${doc.rows.length}`);
        runtime.log(`canonical: ${canonical ? 'yes' : 'no'}`);
      });
    });

  program
    .command('to-json <file>')
    .description('Convert a .toon file to a JSON array of records')
    .option('--pretty', 'Indent the JSON output', false)
    .action(async (file: string, opts: ToJsonOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        const doc = await readToon(file);
        runtime.log(JSON.stringify(toRecords(doc), jsonReplacer, opts.pretty ? 2 : undefined));
      });
    });

  program
    .command('from-json <file>')
    .description('Convert a JSON array of records to TOON')
    .option('--name <name>', 'Table name for the @ line')
    .action(async (file: string, opts: FromOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        let data: unknown;
        try {
          data = JSON.parse(await readText(file));
        } catch (err) {
          if (err instanceof SyntaxError) {
            throw new ToonInputError(`Invalid JSON: ${err.message}`, { path: file, cause: err });
          }
          throw err;
        }
        if (!Array.isArray(data) || !data.every(isRecord)) {
          throw new ToonInputError('Expected a JSON array of objects', { path: file });
        }
        runtime.log(serialize(fromRecords(data, { tableName: opts.name })));
      });
    });

  program
    .command('from-csv <file>')
    .description('Convert a CSV file (first row is the header) to TOON')
    .option('--name <name>', 'Table name for the @ line')
    .action(async (file: string, opts: FromOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        const doc = fromCsv(await readText(file), { tableName: opts.name });
        runtime.log(serialize(doc));
      });
    });

  program
    .command('to-csv <file>')
    .description('Convert a .toon file to CSV')
    .action(async (file: string) => {
      await runCommandWithRuntime(runtime, async () => {
        runtime.log(toCsv(await readToon(file)));
      });
    });
}

export function buildProgram(runtime: CliRuntime = defaultRuntime): Command {
  const program = new Command();
  program
    .name('toon')
    .description('Read, write and convert TOON tables')
    .version('0.1.0');
  registerToonCommands(program, runtime);
  return program;
}

