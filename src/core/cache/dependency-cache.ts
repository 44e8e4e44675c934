import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import { join, dirname, relative } from 'path';

import type {
  CacheEntry,
  CacheEntryMetadata,
  CacheEntrySummary,
  EvictionPolicy,
  Fingerprint,
  StoreAck,
  StubRecord
} from '../../types/index.js';
import { CACHE_DIRS, CACHE_SCHEMA_VERSION, FILE_PATTERNS, MAX_COMMIT_ATTEMPTS } from '../../constants/index.js';
import {
  copyTree,
  ensureDir,
  exists,
  getStats,
  listDirectories,
  readJsonFile,
  remove,
  toPosixPath,
  walkFiles,
  writeJsonFile,
  writeTextFile
} from '../../utils/fs.js';
import { calculateFileHash, sha256Hex } from '../../utils/hash-utils.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { logger } from '../../utils/logger.js';
import {
  CacheEntryUnavailableError,
  CacheStoreConflictError,
  FileSystemError,
  FingerprintCollisionError,
  ValidationError,
  getErrorCode
} from '../../utils/errors.js';

const STAGING_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour

export interface StoreInput {
  /** The compiler's artifact directory after the dependency-only compile */
  artifactsDir: string;
  toolchain: string;
  profile: string;
  resolvedLock: string;
  stub: StubRecord;
}

export interface DependencyCache {
  readonly root: string;

  lookup(fingerprint: Fingerprint): Promise<CacheEntry | null>;
  store(fingerprint: Fingerprint, input: StoreInput): Promise<StoreAck>;
  evict(policy: EvictionPolicy): Promise<Fingerprint[]>;

  list(): Promise<CacheEntrySummary[]>;
  materialize(entry: CacheEntry, destination: string): Promise<void>;
  prune(options?: { stagingMaxAgeMs?: number }): Promise<number>;
}

interface ArtifactStats {
  digest: string;
  fileCount: number;
  totalBytes: number;
}

function isCacheEntryMetadata(value: unknown): value is CacheEntryMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'schemaVersion' in value &&
    value.schemaVersion === CACHE_SCHEMA_VERSION &&
    'fingerprint' in value &&
    typeof value.fingerprint === 'string' &&
    'toolchain' in value &&
    typeof value.toolchain === 'string' &&
    'profile' in value &&
    typeof value.profile === 'string' &&
    'resolvedLock' in value &&
    typeof value.resolvedLock === 'string' &&
    'artifactDigest' in value &&
    typeof value.artifactDigest === 'string' &&
    'fileCount' in value &&
    typeof value.fileCount === 'number' &&
    'totalBytes' in value &&
    typeof value.totalBytes === 'number' &&
    'createdAt' in value &&
    typeof value.createdAt === 'string' &&
    'stub' in value &&
    typeof value.stub === 'object' &&
    value.stub !== null
  );
}

/**
 * Digest over every artifact's relative path, size and content hash
 */
export async function computeArtifactStats(dir: string): Promise<ArtifactStats> {
  const lines: string[] = [];
  let totalBytes = 0;

  for await (const filePath of walkFiles(dir, { skipJunk: false })) {
    const stats = await getStats(filePath);
    const hash = await calculateFileHash(filePath);
    totalBytes += stats.size;
    lines.push(`${toPosixPath(relative(dir, filePath))}\0${stats.size}\0${hash}`);
  }

  lines.sort();
  return { digest: sha256Hex(lines.join('\n')), fileCount: lines.length, totalBytes };
}

function uniqueSuffix(): string {
  return `${process.pid}.${randomBytes(4).toString('hex')}`;
}

/**
 * Rename that reports "someone else got there first" as false instead of throwing
 */
async function tryRename(src: string, dest: string): Promise<boolean> {
  await ensureDir(dirname(dest));
  try {
    await fs.rename(src, dest);
    return true;
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'EEXIST' || code === 'ENOTEMPTY' || code === 'ENOENT') {
      logger.debug(`Rename lost a race: ${src} -> ${dest}`, { code });
      return false;
    }
    throw new FileSystemError(`Failed to rename: ${src} -> ${dest}`, { src, dest, error });
  }
}

export function createDependencyCache(root: string): DependencyCache {
  const mutex = new KeyedMutex();

  const entriesDir = join(root, CACHE_DIRS.ENTRIES);
  const stagingDir = join(root, CACHE_DIRS.STAGING);
  const trashDir = join(root, CACHE_DIRS.TRASH);
  const accessDir = join(root, CACHE_DIRS.ACCESS);

  const entryPath = (fingerprint: Fingerprint): string => join(entriesDir, fingerprint);
  const accessPath = (fingerprint: Fingerprint): string => join(accessDir, fingerprint);

  async function readEntryMetadata(entryDir: string): Promise<CacheEntryMetadata | null> {
    const metadataPath = join(entryDir, FILE_PATTERNS.ENTRY_JSON);
    if (!(await exists(metadataPath))) {
      return null;
    }

    try {
      const parsed = await readJsonFile(metadataPath);
      if (isCacheEntryMetadata(parsed)) {
        return parsed;
      }
      logger.warn(`Ignoring cache entry with unexpected metadata at ${metadataPath}`);
    } catch (error) {
      logger.warn(`Failed to read cache entry metadata at ${metadataPath}`, { error });
    }
    return null;
  }

  async function moveToTrash(entryDir: string, fingerprint: Fingerprint): Promise<boolean> {
    const target = join(trashDir, `${fingerprint}.${uniqueSuffix()}`);
    if (!(await tryRename(entryDir, target))) {
      return false;
    }
    await remove(target);
    return true;
  }

  async function touchAccess(fingerprint: Fingerprint): Promise<void> {
    try {
      await writeTextFile(accessPath(fingerprint), new Date().toISOString());
    } catch (error) {
      logger.warn(`Failed to record access for cache entry ${fingerprint.substring(0, 12)}`, { error });
    }
  }

  async function lastAccessed(fingerprint: Fingerprint, fallback: string): Promise<string> {
    const marker = accessPath(fingerprint);
    if (!(await exists(marker))) {
      return fallback;
    }
    try {
      return (await getStats(marker)).mtime.toISOString();
    } catch (error) {
      logger.debug(`Access marker vanished for ${fingerprint.substring(0, 12)}`, { error });
      return fallback;
    }
  }

  /**
   * Move a fully written staging directory into place under the fingerprint.
   */
  async function commit(
    fingerprint: Fingerprint,
    staged: string,
    metadata: CacheEntryMetadata
  ): Promise<StoreAck> {
    const target = entryPath(fingerprint);

    for (let attempt = 1; attempt <= MAX_COMMIT_ATTEMPTS; attempt++) {
      const existing = await readEntryMetadata(target);

      if (!existing) {
        if (await exists(target)) {
          if (await readEntryMetadata(target)) {
            // Committed by another writer since the first read
            continue;
          }
          // Unreadable leftovers under our key; nothing can be reading them as an entry
          await moveToTrash(target, fingerprint);
        }
        if (await tryRename(staged, target)) {
          return { fingerprint, status: 'stored' };
        }
        continue;
      }

      if (existing.artifactDigest === metadata.artifactDigest) {
        logger.debug(`Cache entry ${fingerprint.substring(0, 12)} already present with identical artifacts`);
        return { fingerprint, status: 'unchanged' };
      }

      if (existing.resolvedLock !== metadata.resolvedLock) {
        throw new FingerprintCollisionError(fingerprint);
      }

      // Same lock, different bytes: compiler output is not reproducible; last writer wins
      if (!(await moveToTrash(target, fingerprint))) {
        continue;
      }
      if (await tryRename(staged, target)) {
        logger.debug(`Replaced cache entry ${fingerprint.substring(0, 12)}`);
        return { fingerprint, status: 'replaced' };
      }
    }

    throw new CacheStoreConflictError(fingerprint, MAX_COMMIT_ATTEMPTS);
  }

  async function list(): Promise<CacheEntrySummary[]> {
    if (!(await exists(entriesDir))) {
      return [];
    }

    const summaries: CacheEntrySummary[] = [];
    for (const name of await listDirectories(entriesDir)) {
      const metadata = await readEntryMetadata(entryPath(name));
      if (!metadata) continue;
      summaries.push({
        fingerprint: metadata.fingerprint,
        toolchain: metadata.toolchain,
        profile: metadata.profile,
        createdAt: metadata.createdAt,
        lastAccessedAt: await lastAccessed(metadata.fingerprint, metadata.createdAt),
        fileCount: metadata.fileCount,
        totalBytes: metadata.totalBytes
      });
    }

    // Most recently used first
    return summaries.sort((a, b) => Date.parse(b.lastAccessedAt) - Date.parse(a.lastAccessedAt));
  }

  return {
    root,

    async lookup(fingerprint: Fingerprint): Promise<CacheEntry | null> {
      const entryDir = entryPath(fingerprint);
      const metadata = await readEntryMetadata(entryDir);

      if (!metadata) {
        logger.debug(`Cache miss for ${fingerprint.substring(0, 12)}`);
        return null;
      }
      if (metadata.fingerprint !== fingerprint) {
        logger.warn(`Cache entry at ${entryDir} records fingerprint ${metadata.fingerprint}; treating as a miss`);
        return null;
      }

      await touchAccess(fingerprint);
      logger.debug(`Cache hit for ${fingerprint.substring(0, 12)}`, { files: metadata.fileCount });
      return {
        fingerprint,
        path: entryDir,
        artifactsDir: join(entryDir, CACHE_DIRS.ARTIFACTS),
        metadata
      };
    },

    async store(fingerprint: Fingerprint, input: StoreInput): Promise<StoreAck> {
      return mutex.runExclusive(fingerprint, async () => {
        const staged = join(stagingDir, `${fingerprint}.${uniqueSuffix()}`);

        try {
          const artifacts = join(staged, CACHE_DIRS.ARTIFACTS);
          await copyTree(input.artifactsDir, artifacts, { skipJunk: false });
          const stats = await computeArtifactStats(artifacts);

          const metadata: CacheEntryMetadata = {
            schemaVersion: CACHE_SCHEMA_VERSION,
            fingerprint,
            toolchain: input.toolchain,
            profile: input.profile,
            resolvedLock: input.resolvedLock,
            artifactDigest: stats.digest,
            fileCount: stats.fileCount,
            totalBytes: stats.totalBytes,
            stub: input.stub,
            createdAt: new Date().toISOString()
          };
          // entry.json is written last: a directory without it is never treated as an entry
          await writeJsonFile(join(staged, FILE_PATTERNS.ENTRY_JSON), metadata);

          const ack = await commit(fingerprint, staged, metadata);
          if (ack.status !== 'unchanged') {
            await touchAccess(fingerprint);
          }
          return ack;
        } finally {
          await remove(staged);
        }
      });
    },

    async evict(policy: EvictionPolicy): Promise<Fingerprint[]> {
      if (policy.maxEntries !== undefined && (!Number.isInteger(policy.maxEntries) || policy.maxEntries < 0)) {
        throw new ValidationError(`maxEntries must be a non-negative integer, got ${policy.maxEntries}`);
      }
      if (policy.maxAgeMs !== undefined && policy.maxAgeMs < 0) {
        throw new ValidationError(`maxAgeMs must not be negative, got ${policy.maxAgeMs}`);
      }

      const summaries = await list();
      const now = Date.now();
      const doomed = new Set<Fingerprint>();
      const named = new Set(policy.fingerprints ?? []);

      for (const summary of summaries) {
        const idleMs = now - Date.parse(summary.lastAccessedAt);
        if (
          policy.all ||
          named.has(summary.fingerprint) ||
          (policy.maxAgeMs !== undefined && idleMs > policy.maxAgeMs)
        ) {
          doomed.add(summary.fingerprint);
        }
      }

      if (policy.maxEntries !== undefined) {
        const survivors = summaries.filter(summary => !doomed.has(summary.fingerprint));
        for (const summary of survivors.slice(policy.maxEntries)) {
          doomed.add(summary.fingerprint);
        }
      }

      const removed: Fingerprint[] = [];
      for (const summary of summaries) {
        const fingerprint = summary.fingerprint;
        if (!doomed.has(fingerprint)) continue;

        const evicted = await mutex.runExclusive(fingerprint, () => moveToTrash(entryPath(fingerprint), fingerprint));
        if (evicted) {
          await remove(accessPath(fingerprint));
          removed.push(fingerprint);
        }
      }

      logger.debug(`Evicted ${removed.length} cache entries`, { removed });
      return removed;
    },

    list,

    async materialize(entry: CacheEntry, destination: string): Promise<void> {
      await remove(destination);
      let copied: string[];
      try {
        copied = await copyTree(entry.artifactsDir, destination, { skipJunk: false });
      } catch (error) {
        if (error instanceof FileSystemError && getErrorCode(error.details?.error) === 'ENOENT') {
          await remove(destination);
          throw new CacheEntryUnavailableError(entry.fingerprint, 'it was evicted while being restored');
        }
        throw error;
      }

      const current = await readEntryMetadata(entry.path);
      if (copied.length !== entry.metadata.fileCount || current?.artifactDigest !== entry.metadata.artifactDigest) {
        await remove(destination);
        throw new CacheEntryUnavailableError(entry.fingerprint, 'it changed while being restored', {
          expected: entry.metadata.fileCount,
          copied: copied.length
        });
      }
      logger.debug(`Restored ${copied.length} cached artifacts into ${destination}`);
    },

    async prune(options: { stagingMaxAgeMs?: number } = {}): Promise<number> {
      const maxAge = options.stagingMaxAgeMs ?? STAGING_MAX_AGE_MS;
      let removed = 0;

      if (await exists(trashDir)) {
        for (const name of await listDirectories(trashDir)) {
          await remove(join(trashDir, name));
          removed++;
        }
      }

      if (await exists(stagingDir)) {
        const now = Date.now();
        for (const name of await listDirectories(stagingDir)) {
          const path = join(stagingDir, name);
          // Younger staging directories may belong to a build that is still running
          if (now - (await getStats(path)).mtimeMs >= maxAge) {
            await remove(path);
            removed++;
          }
        }
      }

      return removed;
    }
  };
}
