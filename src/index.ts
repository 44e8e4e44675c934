#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { getVersion } from './utils/package.js';

import { setupBuildCommand } from './commands/build.js';
import { setupFingerprintCommand } from './commands/fingerprint.js';
import { setupStubCommand } from './commands/stub.js';
import { setupReconcileCommand } from './commands/reconcile.js';
import { setupCacheCommand } from './commands/cache.js';

/**
 * depcache CLI - Main entry point
 *
 * Builds compiled-language projects in two phases so that dependency
 * compilation is cached by the resolved lock and reused across source changes.
 */

const program = new Command();

program
  .name('depcache')
  .description('Dependency-isolated build cache for compiled-language projects')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'log debug output')
  .configureHelp({ sortSubcommands: true });

setupBuildCommand(program);
setupFingerprintCommand(program);
setupStubCommand(program);
setupReconcileCommand(program);
setupCacheCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string; verbose?: boolean }>();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      logger.debug(`Working directory: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`Invalid --cwd '${opts.cwd}': ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
  }

  try {
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run when executed directly, not when imported
if (process.argv[1] && (process.argv[1].endsWith('index.js') || process.argv[1].endsWith('index.ts') || process.argv[1].endsWith('depcache'))) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
