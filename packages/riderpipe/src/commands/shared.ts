import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigError } from '../config.js';
import { EditRejectedError, RiderNotFoundError } from '../errors.js';
import { loadSession, type Session } from '../session.js';
import { ensureDir, storePaths } from '../store.js';
import type { SyncResult } from '../sync.js';
import type { Logger } from '../types.js';

export function isJson(program: Command): boolean {
  return Boolean(program.opts().json);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Progress goes to stderr so --json output stays parseable. */
export function cliLogger(verbose: boolean): Logger {
  return {
    info: (message) => {
      if (verbose) console.error(chalk.dim(message));
    },
    warn: (message) => console.error(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
  };
}

export async function openSession(program: Command): Promise<Session> {
  const paths = storePaths();
  ensureDir(paths.dir);
  return loadSession({ paths, logger: cliLogger(Boolean(program.opts().verbose)) });
}

/** Print a user-facing failure and exit. Anything unexpected is rethrown. */
export function fail(e: unknown): never {
  if (e instanceof RiderNotFoundError || e instanceof EditRejectedError || e instanceof ConfigError) {
    console.error(chalk.red(e.message));
    process.exit(1);
  }
  throw e;
}

export function describeSync(sync: SyncResult | null): string {
  if (!sync) return '';
  if (!sync.ok) return chalk.yellow(` (records table not updated: ${sync.error})`);
  const dropped = sync.droppedFields.length ? chalk.dim(`, skipped ${sync.droppedFields.join(', ')}`) : '';
  return chalk.dim(` (records table ${sync.action}${dropped})`);
}
