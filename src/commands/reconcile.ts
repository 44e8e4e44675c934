import { Command } from 'commander';
import pico from 'picocolors';

import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { loadConfig } from '../core/config.js';
import { getToolchain } from '../core/toolchains/registry.js';
import { reconcile } from '../core/reconcile/staleness-reconciler.js';
import { resolveProjectRoot } from '../cli/context.js';

interface ReconcileOptions {
  since: string;
  granularity?: string;
}

function parseNonNegativeInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new ValidationError(`${flag} must be a non-negative integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Move a project's source timestamps past a given instant, in place.
 * The container-recipe equivalent of touching the sources after `COPY . .`.
 */
async function reconcileCommand(project: string | undefined, options: ReconcileOptions, command: Command): Promise<void> {
  const projectRoot = resolveProjectRoot(project, command);
  const since = parseNonNegativeInteger(options.since, '--since');
  const config = await loadConfig(projectRoot);
  const granularityMs =
    options.granularity !== undefined
      ? parseNonNegativeInteger(options.granularity, '--granularity')
      : config.reconcile.granularityMs;
  const toolchain = getToolchain(config.toolchain);

  const ack = await reconcile({
    buildDir: projectRoot,
    artifactDir: toolchain.artifactDir,
    sourcePatterns: toolchain.sourcePatterns,
    stub: { digest: '', files: [], compiledAtMs: since },
    strategy: 'mtime',
    granularityMs,
    applicationUnitArtifacts: []
  });

  const when = ack.mtimeMs !== undefined ? new Date(ack.mtimeMs).toISOString() : 'now';
  console.log(`${pico.green('✓')} Touched ${ack.touched.length} source files (mtime ${when})`);
}

export function setupReconcileCommand(program: Command): void {
  program
    .command('reconcile')
    .description('Make every application source file newer than a dependency-only compile')
    .argument('[project]', 'project directory (defaults to the working directory)')
    .requiredOption('--since <epochMs>', 'when the dependency-only compile finished, in milliseconds since the epoch')
    .option('--granularity <ms>', 'extra margin for coarse filesystem timestamps')
    .action(withErrorHandling(async (project: string | undefined, options: ReconcileOptions, command: Command) => {
      await reconcileCommand(project, options, command);
    }));
}
