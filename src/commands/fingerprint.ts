import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { loadConfig } from '../core/config.js';
import { getToolchain } from '../core/toolchains/registry.js';
import { canonicalizeLock, fingerprint } from '../core/fingerprint.js';
import { resolveProjectRoot } from '../cli/context.js';

interface FingerprintCommandOptions {
  profile?: string;
  canonical?: boolean;
}

async function fingerprintCommand(
  project: string | undefined,
  options: FingerprintCommandOptions,
  command: Command
): Promise<void> {
  const projectRoot = resolveProjectRoot(project, command);
  const config = await loadConfig(projectRoot);
  const manifest = await getToolchain(config.toolchain).readManifest(projectRoot);
  const profile = options.profile ?? config.profile;

  if (options.canonical) {
    console.log(canonicalizeLock(manifest, { profile }));
    return;
  }
  console.log(fingerprint(manifest, { profile }));
}

export function setupFingerprintCommand(program: Command): void {
  program
    .command('fingerprint')
    .description('Print the dependency fingerprint (cache key) of a project')
    .argument('[project]', 'project directory (defaults to the working directory)')
    .option('--profile <name>', 'build profile')
    .option('--canonical', 'print the canonical lock text instead of its hash')
    .action(withErrorHandling(async (project: string | undefined, options: FingerprintCommandOptions, command: Command) => {
      await fingerprintCommand(project, options, command);
    }));
}
