/**
 * Output sink for CLI commands. Commands never touch process streams
 * directly, so tests can pass a recording runtime.
 */

import createDebug from 'debug';
import { ToonError } from '../errors.js';

const log = createDebug('toon:cli');

export interface CliRuntime {
  log(text: string): void;
  error(text: string): void;
  exit(code: number): void;
}

export const defaultRuntime: CliRuntime = {
  log: (text) => {
    process.stdout.write(`${text}\n`);
  },
  error: (text) => {
    process.stderr.write(`${text}\n`);
  },
  exit: (code) => {
    process.exitCode = code;
  },
};

function describeError(err: unknown): string {
  if (err instanceof ToonError) return err.toString();
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Run a command body, reporting any failure as `error: ...` and exit code 1. */
export async function runCommandWithRuntime(
  runtime: CliRuntime,
  action: () => Promise<void>
): Promise<void> {
  try {
    await action();
  } catch (err) {
    log('command failed: %O', err);
    runtime.error(`error: ${describeError(err)}`);
    runtime.exit(1);
  }
}
