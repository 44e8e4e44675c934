/**
 * CLI Context
 *
 * Resolves the global options every command shares and picks the progress
 * and prompt adapters that fit the current terminal.
 */

import { resolve } from 'path';
import type { Command } from 'commander';

import type { ProgressPort } from '../core/ports/progress.js';
import { consoleProgress } from '../core/ports/console-progress.js';
import { createSpinnerProgress } from './spinner-progress.js';

export interface GlobalOptions {
  cwd?: string;
  verbose?: boolean;
}

export function getGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return { cwd: opts.cwd, verbose: opts.verbose };
}

/**
 * Absolute project root: the positional argument, relative to `--cwd` when given
 */
export function resolveProjectRoot(project: string | undefined, command: Command): string {
  const { cwd } = getGlobalOptions(command);
  return resolve(cwd ?? process.cwd(), project ?? '.');
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

/**
 * Spinner in a terminal, one line per event in CI and pipes
 */
export function createCliProgress(interactive: boolean = detectInteractive()): ProgressPort {
  return interactive ? createSpinnerProgress() : consoleProgress;
}
