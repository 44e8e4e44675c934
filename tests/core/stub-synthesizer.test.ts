import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, readdir, access } from 'node:fs/promises';
import { join } from 'node:path';

import { synthesizeStub, writeStub, removeStub, recordStub } from '../../src/core/stub/stub-synthesizer.js';
import { cargoToolchain } from '../../src/core/toolchains/cargo-toolchain.js';
import type { DependencyManifest } from '../../src/types/index.js';
import { calculateContentHash } from '../../src/utils/hash-utils.js';
import { createTempDir, removeTempDir } from '../test-helpers.js';

function manifestWithTargets(targets: DependencyManifest['targets']): DependencyManifest {
  return {
    toolchain: 'cargo',
    root: { name: 'tool', version: '1.0.0' },
    declared: [],
    locked: [{ name: 'tool', version: '1.0.0', dependencies: [] }],
    targets
  };
}

const TARGETS: DependencyManifest['targets'] = [
  { kind: 'bin', name: 'tool', path: 'src/main.rs' },
  { kind: 'lib', name: 'tool', path: 'src/lib.rs' },
  { kind: 'build-script', name: 'build-script-build', path: 'build.rs' },
  { kind: 'example', name: 'demo', path: 'examples/demo.rs' },
  { kind: 'bin', name: 'other', path: 'src/main.rs' }
];

describe('synthesizeStub', () => {
  it('emits one placeholder per distinct target path, sorted by path', () => {
    const stub = synthesizeStub(manifestWithTargets(TARGETS), cargoToolchain);

    assert.deepEqual(stub.files, [
      { path: 'build.rs', content: 'fn main() {}\n' },
      { path: 'examples/demo.rs', content: 'fn main() {}\n' },
      { path: 'src/lib.rs', content: '' },
      { path: 'src/main.rs', content: 'fn main() {}\n' }
    ]);
  });

  it('is deterministic regardless of target order', () => {
    const forward = synthesizeStub(manifestWithTargets(TARGETS), cargoToolchain);
    const reversed = synthesizeStub(manifestWithTargets([...TARGETS].reverse()), cargoToolchain);

    assert.equal(reversed.digest, forward.digest);
    assert.match(forward.digest, /^[0-9a-f]{64}$/);
  });

  it('changes its digest when the targets change', () => {
    const one = synthesizeStub(manifestWithTargets(TARGETS.slice(0, 1)), cargoToolchain);
    const two = synthesizeStub(manifestWithTargets(TARGETS.slice(0, 2)), cargoToolchain);
    assert.notEqual(one.digest, two.digest);
  });
});

describe('stub files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir('stub');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes and removes exactly the stub files', async () => {
    const stub = synthesizeStub(manifestWithTargets(TARGETS), cargoToolchain);

    await writeStub(stub, dir);
    assert.equal(await readFile(join(dir, 'src', 'main.rs'), 'utf8'), 'fn main() {}\n');
    assert.equal(await readFile(join(dir, 'src', 'lib.rs'), 'utf8'), '');

    await removeStub(stub, dir);
    assert.deepEqual((await readdir(join(dir, 'src'))).length, 0);
    await assert.rejects(access(join(dir, 'build.rs')));
  });

  it('records content hashes and the compile time', async () => {
    const stub = synthesizeStub(manifestWithTargets(TARGETS.slice(0, 2)), cargoToolchain);

    const record = await recordStub(stub, 1_700_000_123_456);

    assert.equal(record.digest, stub.digest);
    assert.equal(record.compiledAtMs, 1_700_000_123_456);
    assert.deepEqual(record.files, [
      { path: 'src/lib.rs', hash: await calculateContentHash('') },
      { path: 'src/main.rs', hash: await calculateContentHash('fn main() {}\n') }
    ]);
  });
});
