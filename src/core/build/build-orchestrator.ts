import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import { basename, dirname, isAbsolute, join, relative, resolve } from 'path';
import { minimatch } from 'minimatch';

import type {
  BuildOutput,
  BuildPhase,
  DependencyManifest,
  Fingerprint,
  ReconcileStrategy,
  StubRecord
} from '../../types/index.js';
import { DepcacheError } from '../../types/index.js';
import { DEFAULTS, DIR_PATTERNS } from '../../constants/index.js';
import type { Toolchain } from '../toolchains/types.js';
import type { DependencyCache } from '../cache/dependency-cache.js';
import type { Compiler } from './compiler.js';
import type { ProgressPort } from '../ports/progress.js';
import { progressEvent } from '../ports/progress.js';
import { silentProgress } from '../ports/console-progress.js';
import { canonicalizeLock, fingerprint as fingerprintManifest } from '../fingerprint.js';
import { synthesizeStub, writeStub, removeStub, recordStub } from '../stub/stub-synthesizer.js';
import { reconcile } from '../reconcile/staleness-reconciler.js';
import { copyFile, copyTree, ensureDir, remove, toPosixPath } from '../../utils/fs.js';
import { calculateFileSha256 } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import {
  ApplicationCompileError,
  CacheEntryUnavailableError,
  CacheStoreConflictError,
  DependencyCompileError,
  FileSystemError,
  ValidationError
} from '../../utils/errors.js';

export type CompilerFactory = (manifest: DependencyManifest, profile: string) => Compiler;

export interface BuildOrchestratorOptions {
  toolchain: Toolchain;
  cache: DependencyCache;
  createCompiler: CompilerFactory;
  progress?: ProgressPort;
  now?: () => number;
}

export interface BuildRequest {
  /** The real source tree; never written to */
  projectRoot: string;
  /** Scratch directory owned by the build; wiped at the start of every build */
  buildDir: string;
  /** Defaults to `<buildDir>/output/<binary name>` */
  outputPath?: string;
  profile?: string;
  reconcile?: {
    strategy?: ReconcileStrategy;
    granularityMs?: number;
  };
  /** Extra globs (relative to the project root) kept out of the overlay */
  overlayExclude?: string[];
}

/** Builds sharing a build directory in this process run one at a time */
const buildDirLocks = new KeyedMutex();

const TRANSITIONS: Record<BuildPhase, readonly BuildPhase[]> = {
  INIT: ['STUB_COMPILED', 'FAILED'],
  STUB_COMPILED: ['SOURCE_OVERLAID', 'FAILED'],
  SOURCE_OVERLAID: ['FINAL_COMPILED', 'FAILED'],
  FINAL_COMPILED: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: []
};

interface BuildRun {
  phase: BuildPhase;
  phases: BuildPhase[];
  fingerprint?: Fingerprint;
}

interface DependencyPhaseResult {
  stub: StubRecord;
  cacheHit: boolean;
}

/**
 * Reject build directories that would let a reset delete the project itself
 */
export function assertBuildDirIsSafe(projectRoot: string, buildDir: string): void {
  const rel = relative(buildDir, projectRoot);
  if (rel === '' || (!rel.startsWith('..') && !isAbsolute(rel))) {
    throw new ValidationError(`Build directory ${buildDir} must not be the project root or contain it`, {
      projectRoot,
      buildDir
    });
  }
}

/**
 * Drives one dependency-isolated build:
 * INIT -> STUB_COMPILED -> SOURCE_OVERLAID -> FINAL_COMPILED -> DONE, or FAILED.
 */
export class BuildOrchestrator {
  private readonly progress: ProgressPort;
  private readonly now: () => number;

  constructor(private readonly options: BuildOrchestratorOptions) {
    this.progress = options.progress ?? silentProgress;
    this.now = options.now ?? Date.now;
  }

  async build(request: BuildRequest): Promise<BuildOutput> {
    const projectRoot = resolve(request.projectRoot);
    const buildDir = resolve(request.buildDir);
    const profile = request.profile ?? DEFAULTS.PROFILE;
    assertBuildDirIsSafe(projectRoot, buildDir);

    return await buildDirLocks.runExclusive(buildDir, () => this.execute(request, projectRoot, buildDir, profile));
  }

  private async execute(request: BuildRequest, projectRoot: string, buildDir: string, profile: string): Promise<BuildOutput> {
    const { toolchain } = this.options;
    const run: BuildRun = { phase: 'INIT', phases: ['INIT'] };

    try {
      const manifest = await toolchain.readManifest(projectRoot);
      const resolvedLock = canonicalizeLock(manifest, { profile });
      const fingerprint = fingerprintManifest(manifest, { profile });
      run.fingerprint = fingerprint;
      this.progress.emit(progressEvent({ type: 'build:start', project: manifest.root.name, fingerprint }));

      const compiler = this.options.createCompiler(manifest, profile);
      const artifactsDir = join(buildDir, toolchain.artifactDir);

      await this.prepareBuildDir(projectRoot, buildDir);
      const { stub, cacheHit } = await this.compileDependencies({
        manifest,
        fingerprint,
        resolvedLock,
        profile,
        buildDir,
        artifactsDir,
        compiler
      });
      this.transition(run, 'STUB_COMPILED', cacheHit ? 'dependencies restored from cache' : 'dependencies compiled');

      await removeStub(stub, buildDir);
      const overlaid = await this.overlaySources(projectRoot, buildDir, request.overlayExclude ?? []);
      this.transition(run, 'SOURCE_OVERLAID', `${overlaid.length} source files`);

      const ack = await reconcile({
        buildDir,
        artifactDir: toolchain.artifactDir,
        sourcePatterns: toolchain.sourcePatterns,
        stub,
        strategy: request.reconcile?.strategy ?? DEFAULTS.RECONCILE_STRATEGY,
        granularityMs: request.reconcile?.granularityMs,
        applicationUnitArtifacts: toolchain.applicationUnitArtifacts(manifest, profile),
        now: this.now
      });
      logger.debug(`Reconciled staleness with ${ack.strategy}`, {
        touched: ack.touched.length,
        invalidated: ack.invalidated.length
      });

      this.progress.emit(progressEvent({ type: 'build:compile', unit: 'application', status: 'started' }));
      const result = await compiler.compile({ sourceRoot: buildDir, cacheDir: artifactsDir, phase: 'application' });
      if (!result.ok) {
        this.progress.emit(progressEvent({ type: 'build:compile', unit: 'application', status: 'failed' }));
        throw new ApplicationCompileError({ fingerprint, diagnostic: result.diagnostic, exitCode: result.exitCode });
      }
      this.progress.emit(progressEvent({ type: 'build:compile', unit: 'application', status: 'finished' }));
      this.transition(run, 'FINAL_COMPILED');

      const outputPath = resolve(request.outputPath ?? join(buildDir, 'output', basename(result.binaryPath)));
      const digest = await this.emitBinary(result.binaryPath, outputPath);
      this.transition(run, 'DONE', outputPath);
      this.progress.emit(progressEvent({ type: 'build:complete', success: true, binaryPath: outputPath }));

      return { binaryPath: outputPath, digest, fingerprint, cacheHit, phases: [...run.phases] };
    } catch (error) {
      const failedIn = run.phase;
      if (error instanceof DepcacheError) {
        error.details = { phase: failedIn, fingerprint: run.fingerprint, ...error.details };
      }
      if (TRANSITIONS[failedIn].includes('FAILED')) {
        this.transition(run, 'FAILED', `in ${failedIn}`);
      }
      this.progress.emit(
        progressEvent({
          type: 'build:complete',
          success: false,
          detail: error instanceof Error ? error.message : String(error)
        })
      );
      throw error;
    }
  }

  private transition(run: BuildRun, next: BuildPhase, detail?: string): void {
    if (!TRANSITIONS[run.phase].includes(next)) {
      throw new ValidationError(`Illegal build transition ${run.phase} -> ${next}`);
    }
    run.phase = next;
    run.phases.push(next);
    this.progress.emit(progressEvent({ type: 'build:phase', phase: next, fingerprint: run.fingerprint ?? '', detail }));
  }

  private async prepareBuildDir(projectRoot: string, buildDir: string): Promise<void> {
    await remove(buildDir);
    await ensureDir(buildDir);
    for (const file of this.options.toolchain.manifestFiles) {
      await copyFile(join(projectRoot, file), join(buildDir, file));
    }
  }

  private async compileDependencies(context: {
    manifest: DependencyManifest;
    fingerprint: Fingerprint;
    resolvedLock: string;
    profile: string;
    buildDir: string;
    artifactsDir: string;
    compiler: Compiler;
  }): Promise<DependencyPhaseResult> {
    const { toolchain, cache } = this.options;
    const { fingerprint } = context;

    const entry = await cache.lookup(fingerprint);
    if (entry) {
      try {
        await cache.materialize(entry, context.artifactsDir);
        this.progress.emit(progressEvent({ type: 'build:cache', status: 'hit', fingerprint }));
        return { stub: entry.metadata.stub, cacheHit: true };
      } catch (error) {
        if (!(error instanceof CacheEntryUnavailableError)) {
          throw error;
        }
        this.progress.log('warn', `${error.message}; compiling dependencies instead`);
      }
    }

    this.progress.emit(progressEvent({ type: 'build:cache', status: 'miss', fingerprint }));
    const stubSource = synthesizeStub(context.manifest, toolchain);
    await writeStub(stubSource, context.buildDir);

    this.progress.emit(progressEvent({ type: 'build:compile', unit: 'dependencies', status: 'started' }));
    const result = await context.compiler.compile({
      sourceRoot: context.buildDir,
      cacheDir: context.artifactsDir,
      phase: 'dependencies'
    });
    if (!result.ok) {
      this.progress.emit(progressEvent({ type: 'build:compile', unit: 'dependencies', status: 'failed' }));
      throw new DependencyCompileError({ fingerprint, diagnostic: result.diagnostic, exitCode: result.exitCode });
    }
    this.progress.emit(progressEvent({ type: 'build:compile', unit: 'dependencies', status: 'finished' }));

    const stub = await recordStub(stubSource, this.now());
    try {
      const ack = await cache.store(fingerprint, {
        artifactsDir: context.artifactsDir,
        toolchain: toolchain.name,
        profile: context.profile,
        resolvedLock: context.resolvedLock,
        stub
      });
      this.progress.emit(progressEvent({ type: 'build:cache', status: ack.status, fingerprint }));
    } catch (error) {
      if (!(error instanceof CacheStoreConflictError)) {
        throw error;
      }
      // A lost commit race leaves the build itself intact
      this.progress.log('warn', error.message);
      logger.debug('Cache store conflict', error.details);
      this.progress.emit(progressEvent({ type: 'build:cache', status: 'conflict', fingerprint }));
    }

    return { stub, cacheHit: false };
  }

  private async overlaySources(projectRoot: string, buildDir: string, extraExclude: string[]): Promise<string[]> {
    const { toolchain } = this.options;
    const skippedDirs = new Set<string>([toolchain.artifactDir, DIR_PATTERNS.GIT, DIR_PATTERNS.DEPCACHE]);
    const buildRel = relative(projectRoot, buildDir);
    if (!buildRel.startsWith('..') && !isAbsolute(buildRel)) {
      skippedDirs.add(toPosixPath(buildRel));
    }

    const manifestFiles = new Set(toolchain.manifestFiles);
    return await copyTree(projectRoot, buildDir, {
      enterDirectory: rel => !skippedDirs.has(rel),
      // The manifest copied for the dependency phase is the one that was fingerprinted
      filter: rel => !manifestFiles.has(rel) && !extraExclude.some(pattern => minimatch(rel, pattern, { dot: true }))
    });
  }

  /**
   * Write the binary to its final place in one rename, read/execute only
   */
  private async emitBinary(binaryPath: string, outputPath: string): Promise<string> {
    const staged = join(dirname(outputPath), `.${basename(outputPath)}.${randomBytes(4).toString('hex')}`);
    try {
      await ensureDir(dirname(outputPath));
      await fs.copyFile(binaryPath, staged);
      await fs.chmod(staged, 0o555);
      await fs.rename(staged, outputPath);
    } catch (error) {
      await remove(staged);
      throw new FileSystemError(`Failed to emit binary to ${outputPath}`, { binaryPath, outputPath, error });
    }
    return await calculateFileSha256(outputPath);
  }
}
