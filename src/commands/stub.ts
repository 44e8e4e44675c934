import { Command } from 'commander';
import { join, resolve } from 'path';
import pico from 'picocolors';

import { withErrorHandling } from '../utils/errors.js';
import { copyFile, ensureDir } from '../utils/fs.js';
import { loadConfig } from '../core/config.js';
import { getToolchain } from '../core/toolchains/registry.js';
import { synthesizeStub, writeStub } from '../core/stub/stub-synthesizer.js';
import { resolveProjectRoot } from '../cli/context.js';
import { formatPathForDisplay } from '../utils/formatters.js';

interface StubOptions {
  out: string;
}

/**
 * Writes the manifest files plus placeholder sources: a tree that compiles
 * every dependency and none of the application.
 */
async function stubCommand(project: string | undefined, options: StubOptions, command: Command): Promise<void> {
  const projectRoot = resolveProjectRoot(project, command);
  const outDir = resolve(process.cwd(), options.out);
  const config = await loadConfig(projectRoot);
  const toolchain = getToolchain(config.toolchain);

  const manifest = await toolchain.readManifest(projectRoot);
  const stub = synthesizeStub(manifest, toolchain);

  await ensureDir(outDir);
  for (const file of toolchain.manifestFiles) {
    await copyFile(join(projectRoot, file), join(outDir, file));
  }
  await writeStub(stub, outDir);

  console.log(`${pico.green('✓')} Stub for ${pico.bold(manifest.root.name)} written to ${formatPathForDisplay(outDir)}`);
  for (const file of stub.files) {
    console.log(`  ${file.path}`);
  }
}

export function setupStubCommand(program: Command): void {
  program
    .command('stub')
    .description('Write a dependency-only copy of a project (manifest files plus placeholder sources)')
    .argument('[project]', 'project directory (defaults to the working directory)')
    .requiredOption('--out <dir>', 'directory to write the stub project into')
    .action(withErrorHandling(async (project: string | undefined, options: StubOptions, command: Command) => {
      await stubCommand(project, options, command);
    }));
}
