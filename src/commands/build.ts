import { Command } from 'commander';
import { resolve } from 'path';
import pico from 'picocolors';

import type { BuildOutput, CommandResult, DepcacheConfig } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatPathForDisplay, shortFingerprint } from '../utils/formatters.js';
import { loadConfig, isReconcileStrategy } from '../core/config.js';
import { getToolchain } from '../core/toolchains/registry.js';
import { createDependencyCache } from '../core/cache/dependency-cache.js';
import { BuildOrchestrator } from '../core/build/build-orchestrator.js';
import { CommandCompiler } from '../core/build/compiler.js';
import type { ProgressPort } from '../core/ports/progress.js';
import { createCliProgress, resolveProjectRoot } from '../cli/context.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface BuildOptions {
  output?: string;
  buildDir?: string;
  cacheDir?: string;
  profile?: string;
  reconcile?: string;
}

/**
 * Lay command-line flags over the loaded configuration
 */
export function applyBuildOptions(config: DepcacheConfig, options: BuildOptions, cwd: string): DepcacheConfig {
  if (options.reconcile !== undefined && !isReconcileStrategy(options.reconcile)) {
    throw new ValidationError(`Unknown reconcile strategy '${options.reconcile}' (expected mtime or content-hash)`);
  }
  return {
    ...config,
    output: options.output ? resolve(cwd, options.output) : config.output,
    buildDir: options.buildDir ? resolve(cwd, options.buildDir) : config.buildDir,
    cacheDir: options.cacheDir ? resolve(cwd, options.cacheDir) : config.cacheDir,
    profile: options.profile ?? config.profile,
    reconcile: {
      ...config.reconcile,
      strategy: isReconcileStrategy(options.reconcile) ? options.reconcile : config.reconcile.strategy
    }
  };
}

export async function runBuild(
  projectRoot: string,
  config: DepcacheConfig,
  progress: ProgressPort
): Promise<CommandResult<BuildOutput>> {
  const toolchain = getToolchain(config.toolchain);
  const cache = createDependencyCache(config.cacheDir);
  const orchestrator = new BuildOrchestrator({
    toolchain,
    cache,
    progress,
    createCompiler: (manifest, profile) =>
      new CommandCompiler({
        toolchain,
        manifest,
        profile,
        command: config.compiler.command,
        args: config.compiler.args
      })
  });

  const output = await orchestrator.build({
    projectRoot,
    buildDir: config.buildDir,
    outputPath: config.output,
    profile: config.profile,
    reconcile: config.reconcile,
    overlayExclude: config.overlay.exclude
  });

  const { maxEntries, maxAgeDays } = config.eviction;
  if (maxEntries !== undefined || maxAgeDays !== undefined) {
    const evicted = await cache.evict({
      maxEntries,
      maxAgeMs: maxAgeDays !== undefined ? maxAgeDays * DAY_MS : undefined
    });
    if (evicted.length > 0) {
      logger.info(`Evicted ${evicted.length} cache entries after build`, { evicted });
    }
  }

  return { success: true, data: output };
}

async function buildCommand(project: string | undefined, options: BuildOptions, command: Command): Promise<void> {
  const cwd = process.cwd();
  const projectRoot = resolveProjectRoot(project, command);
  const config = applyBuildOptions(await loadConfig(projectRoot), options, cwd);
  logger.debug('Resolved build configuration', config);

  const result = await runBuild(projectRoot, config, createCliProgress());
  if (!result.data) {
    return;
  }

  const { binaryPath, digest, fingerprint, cacheHit } = result.data;
  console.log(`${pico.green('✓')} ${formatPathForDisplay(binaryPath, cwd)}`);
  console.log(`  ${pico.dim('sha256')}       ${digest}`);
  console.log(`  ${pico.dim('dependencies')} ${shortFingerprint(fingerprint)} ${cacheHit ? pico.green('(cached)') : pico.yellow('(compiled)')}`);
}

export function setupBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build a project, reusing compiled dependencies when its lock is unchanged')
    .argument('[project]', 'project directory (defaults to the working directory)')
    .option('-o, --output <file>', 'where to write the binary')
    .option('--build-dir <dir>', 'scratch directory for the build (wiped first)')
    .option('--cache-dir <dir>', 'dependency cache location')
    .option('--profile <name>', 'build profile')
    .option('--reconcile <strategy>', 'staleness strategy: mtime or content-hash')
    .action(withErrorHandling(async (project: string | undefined, options: BuildOptions, command: Command) => {
      await buildCommand(project, options, command);
    }));
}
