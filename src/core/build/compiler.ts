import { execFile } from 'child_process';
import { join } from 'path';

import type { DependencyManifest } from '../../types/index.js';
import type { Toolchain } from '../toolchains/types.js';
import { exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export type CompilePhase = 'dependencies' | 'application';

export interface CompileRequest {
  sourceRoot: string;
  cacheDir: string;
  phase: CompilePhase;
}

export type CompileResult =
  | { ok: true; binaryPath: string; diagnostic: string }
  | { ok: false; diagnostic: string; exitCode: number | null };

/**
 * The opaque compiler contract: turn a source root into a binary, keeping
 * intermediate output in cacheDir.
 */
export interface Compiler {
  compile(request: CompileRequest): Promise<CompileResult>;
}

export interface CommandCompilerOptions {
  toolchain: Toolchain;
  manifest: DependencyManifest;
  profile: string;
  /** Replaces the toolchain's executable */
  command?: string;
  /** Replaces the toolchain's arguments; `{cacheDir}` and `{profile}` are substituted */
  args?: string[];
  env?: NodeJS.ProcessEnv;
}

interface ExecOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  spawnError?: Error;
}

function run(command: string, args: string[], cwd: string, env: NodeJS.ProcessEnv): Promise<ExecOutcome> {
  return new Promise(resolve => {
    execFile(command, args, { cwd, env, encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      const exitCode = typeof error.code === 'number' ? error.code : null;
      resolve({ exitCode, stdout, stderr, spawnError: exitCode === null ? error : undefined });
    });
  });
}

/**
 * Runs the toolchain's build command as a child process
 */
export class CommandCompiler implements Compiler {
  constructor(private readonly options: CommandCompilerOptions) {}

  async compile(request: CompileRequest): Promise<CompileResult> {
    const { toolchain, manifest, profile } = this.options;
    const defaults = toolchain.compileCommand(profile, request.cacheDir);
    const command = this.options.command ?? defaults.command;
    const args = this.options.args
      ? this.options.args.map(arg => arg.replaceAll('{cacheDir}', request.cacheDir).replaceAll('{profile}', profile))
      : defaults.args;

    logger.debug(`Compiling ${request.phase}: ${command} ${args.join(' ')}`, { cwd: request.sourceRoot });
    const outcome = await run(command, args, request.sourceRoot, { ...process.env, ...this.options.env });
    const diagnostic = [outcome.stderr.trim(), outcome.spawnError?.message].filter(Boolean).join('\n');

    if (outcome.exitCode !== 0) {
      return { ok: false, diagnostic, exitCode: outcome.exitCode };
    }

    const binaryPath = join(request.cacheDir, toolchain.binaryPath(manifest, profile));
    if (!(await exists(binaryPath))) {
      return { ok: false, diagnostic: `${command} succeeded but produced no binary at ${binaryPath}`, exitCode: 0 };
    }
    return { ok: true, binaryPath, diagnostic };
  }
}
