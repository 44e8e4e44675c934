import { join } from 'path';

import type { DependencyManifest, StubRecord, StubSource } from '../../types/index.js';
import type { Toolchain } from '../toolchains/types.js';
import { remove, writeTextFile } from '../../utils/fs.js';
import { calculateContentHash, sha256Hex } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';

/**
 * Build the placeholder sources for a manifest: one semantically empty file per
 * declared target, enough for the compiler to resolve and build every dependency.
 * The same manifest always yields byte-identical output.
 */
export function synthesizeStub(manifest: DependencyManifest, toolchain: Toolchain): StubSource {
  const byPath = new Map<string, string>();
  for (const target of manifest.targets) {
    const file = toolchain.stubFor(target);
    // Targets may share a path; the first one wins
    if (!byPath.has(file.path)) {
      byPath.set(file.path, file.content);
    }
  }

  const files = [...byPath.entries()]
    .map(([path, content]) => ({ path, content }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  const digest = sha256Hex(files.map(file => `${file.path}\0${file.content}`).join('\0\0'));
  return { files, digest };
}

export async function writeStub(stub: StubSource, dir: string): Promise<void> {
  for (const file of stub.files) {
    await writeTextFile(join(dir, file.path), file.content);
  }
  logger.debug(`Wrote ${stub.files.length} stub files into ${dir}`);
}

/**
 * Delete the stub files so none of them survives into the application build
 */
export async function removeStub(stub: { files: Array<{ path: string }> }, dir: string): Promise<void> {
  for (const file of stub.files) {
    await remove(join(dir, file.path));
  }
}

/**
 * The part of a stub that must outlive it: content hashes and the time its compile finished
 */
export async function recordStub(stub: StubSource, compiledAtMs: number): Promise<StubRecord> {
  const files: StubRecord['files'] = [];
  for (const file of stub.files) {
    files.push({ path: file.path, hash: await calculateContentHash(file.content) });
  }
  return { digest: stub.digest, files, compiledAtMs };
}
