/**
 * Staleness reconciliation.
 *
 * After the real sources replace the stub, a compiler that decides what to
 * rebuild from file timestamps may still consider the application unit up to
 * date: the copied sources can carry timestamps older than the stub compile.
 * Before the final compile, the reconciler makes the change visible to the
 * compiler, either by moving the sources' timestamps past the stub compile
 * (`mtime`) or by deleting the application unit's incremental metadata when the
 * sources' content differs from the stub (`content-hash`).
 */

import { promises as fs } from 'fs';
import { join, relative } from 'path';
import { minimatch } from 'minimatch';

import type { ReconcileStrategy, StubRecord } from '../../types/index.js';
import { DEFAULTS, DIR_PATTERNS } from '../../constants/index.js';
import { exists, getStats, remove, toPosixPath, walkFiles } from '../../utils/fs.js';
import { calculateFileHash } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';
import { ReconciliationFailedError } from '../../utils/errors.js';

export interface ReconcileRequest {
  /** Directory holding the overlaid real sources */
  buildDir: string;
  /** Compiler artifact directory, relative to buildDir */
  artifactDir: string;
  sourcePatterns: readonly string[];
  stub: StubRecord;
  strategy: ReconcileStrategy;
  granularityMs?: number;
  /** Globs relative to the artifact directory; used by the content-hash strategy */
  applicationUnitArtifacts: readonly string[];
  now?: () => number;
}

export interface ReconcileAck {
  strategy: ReconcileStrategy;
  /** Source files whose timestamps were moved forward */
  touched: string[];
  /** Artifact files removed to force recompilation */
  invalidated: string[];
  mtimeMs?: number;
}

function matchesAny(path: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(path, pattern, { dot: true }));
}

/**
 * Application source files in the build directory, as sorted relative posix paths
 */
export async function collectSourceFiles(
  buildDir: string,
  sourcePatterns: readonly string[],
  artifactDir: string
): Promise<string[]> {
  const skipped = new Set([artifactDir, DIR_PATTERNS.GIT, DIR_PATTERNS.DEPCACHE]);
  const files: string[] = [];

  for await (const filePath of walkFiles(buildDir, { enterDirectory: rel => !skipped.has(rel) })) {
    const rel = toPosixPath(relative(buildDir, filePath));
    if (matchesAny(rel, sourcePatterns)) {
      files.push(rel);
    }
  }
  return files.sort();
}

async function reconcileByTimestamp(request: ReconcileRequest): Promise<ReconcileAck> {
  const files = await collectSourceFiles(request.buildDir, request.sourcePatterns, request.artifactDir);
  if (files.length === 0) {
    throw new ReconciliationFailedError('no application source files matched', {
      patterns: request.sourcePatterns
    });
  }

  const now = request.now ?? Date.now;
  const granularity = request.granularityMs ?? DEFAULTS.RECONCILE_GRANULARITY_MS;
  const targetMs = Math.max(now(), request.stub.compiledAtMs + granularity);
  const time = new Date(targetMs);

  for (const rel of files) {
    try {
      await fs.utimes(join(request.buildDir, rel), time, time);
    } catch (error) {
      throw new ReconciliationFailedError(`cannot update the timestamps of ${rel}`, { file: rel, error });
    }
  }

  // Coarse filesystems may round what we wrote; check what the compiler will see
  for (const rel of files) {
    const observed = (await getStats(join(request.buildDir, rel))).mtimeMs;
    if (observed <= request.stub.compiledAtMs) {
      throw new ReconciliationFailedError(
        `${rel} still appears no newer than the stub compile (${observed} <= ${request.stub.compiledAtMs})`,
        { file: rel, observed, compiledAtMs: request.stub.compiledAtMs }
      );
    }
  }

  logger.debug(`Moved ${files.length} source timestamps to ${time.toISOString()}`);
  return { strategy: 'mtime', touched: files, invalidated: [], mtimeMs: targetMs };
}

async function reconcileByContent(request: ReconcileRequest): Promise<ReconcileAck> {
  const changed: string[] = [];
  for (const stubFile of request.stub.files) {
    const path = join(request.buildDir, stubFile.path);
    if (!(await exists(path)) || (await calculateFileHash(path)) !== stubFile.hash) {
      changed.push(stubFile.path);
    }
  }

  if (changed.length === 0) {
    logger.debug('Real sources are identical to the stub; nothing to invalidate');
    return { strategy: 'content-hash', touched: [], invalidated: [] };
  }

  const artifactsRoot = join(request.buildDir, request.artifactDir);
  const doomed: string[] = [];
  if (await exists(artifactsRoot)) {
    for await (const filePath of walkFiles(artifactsRoot, { skipJunk: false })) {
      const rel = toPosixPath(relative(artifactsRoot, filePath));
      if (matchesAny(rel, request.applicationUnitArtifacts)) {
        doomed.push(rel);
      }
    }
  }

  if (doomed.length === 0) {
    throw new ReconciliationFailedError(
      'sources differ from the stub but no incremental metadata for the application unit was found',
      { changed, patterns: request.applicationUnitArtifacts }
    );
  }

  for (const rel of doomed) {
    try {
      await remove(join(artifactsRoot, rel));
    } catch (error) {
      throw new ReconciliationFailedError(`cannot remove ${rel}`, { file: rel, error });
    }
  }

  doomed.sort();
  logger.debug(`Invalidated ${doomed.length} application-unit artifacts`, { changed });
  return { strategy: 'content-hash', touched: [], invalidated: doomed };
}

export async function reconcile(request: ReconcileRequest): Promise<ReconcileAck> {
  switch (request.strategy) {
    case 'mtime':
      return reconcileByTimestamp(request);
    case 'content-hash':
      return reconcileByContent(request);
  }
}
