import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { stat, access, utimes } from 'node:fs/promises';
import { join } from 'node:path';

import { collectSourceFiles, reconcile, type ReconcileRequest } from '../../src/core/reconcile/staleness-reconciler.js';
import type { StubRecord } from '../../src/types/index.js';
import { calculateContentHash } from '../../src/utils/hash-utils.js';
import { ReconciliationFailedError } from '../../src/utils/errors.js';
import { parseCargoManifest } from '../../src/core/toolchains/cargo-manifest.js';
import { cargoToolchain } from '../../src/core/toolchains/cargo-toolchain.js';
import { cargoLock, cargoToml, createTempDir, removeTempDir, writeProjectFile, backdate } from '../test-helpers.js';

const STUB_MAIN = 'fn main() {}\n';
const REAL_MAIN = 'fn main() {\n    println!("real");\n}\n';
const COMPILED_AT = Date.parse('2024-05-01T12:00:00Z');
const APP_ARTIFACTS = ['release/.fingerprint/demo-*/**', 'release/demo'];

let buildDir: string;

async function stubRecord(): Promise<StubRecord> {
  return {
    digest: 'stub',
    files: [{ path: 'src/main.rs', hash: await calculateContentHash(STUB_MAIN) }],
    compiledAtMs: COMPILED_AT
  };
}

async function baseRequest(overrides: Partial<ReconcileRequest> = {}): Promise<ReconcileRequest> {
  return {
    buildDir,
    artifactDir: 'target',
    sourcePatterns: ['**/*.rs'],
    stub: await stubRecord(),
    strategy: 'mtime',
    applicationUnitArtifacts: APP_ARTIFACTS,
    ...overrides
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

beforeEach(async () => {
  buildDir = await createTempDir('reconcile');
  await writeProjectFile(buildDir, 'src/main.rs', REAL_MAIN);
  await writeProjectFile(buildDir, 'src/util/mod.rs', 'pub fn helper() {}\n');
  await writeProjectFile(buildDir, 'README.md', '# demo\n');
  await writeProjectFile(buildDir, 'target/release/build/dep-1/out.rs', '// generated by a dependency\n');
  await writeProjectFile(buildDir, 'target/release/.fingerprint/demo-1234/bin-demo', 'fp');
  await writeProjectFile(buildDir, 'target/release/demo', 'stub binary');
  await writeProjectFile(buildDir, 'target/release/deps/libserde-1.rlib', 'rlib');
});

afterEach(async () => {
  await removeTempDir(buildDir);
});

describe('collectSourceFiles', () => {
  it('matches source globs outside the artifact directory', async () => {
    assert.deepEqual(await collectSourceFiles(buildDir, ['**/*.rs'], 'target'), ['src/main.rs', 'src/util/mod.rs']);
  });
});

describe('mtime strategy', () => {
  it('moves every source file past the stub compile by the granularity', async () => {
    await backdate(join(buildDir, 'src/main.rs'));
    await backdate(join(buildDir, 'README.md'));
    const now = COMPILED_AT - 5_000;

    const ack = await reconcile(await baseRequest({ granularityMs: 2_000, now: () => now }));

    assert.deepEqual(ack, {
      strategy: 'mtime',
      touched: ['src/main.rs', 'src/util/mod.rs'],
      invalidated: [],
      mtimeMs: COMPILED_AT + 2_000
    });
    assert.equal((await stat(join(buildDir, 'src/main.rs'))).mtimeMs, COMPILED_AT + 2_000);
    assert.equal((await stat(join(buildDir, 'README.md'))).mtimeMs, Date.parse('2001-02-03T04:05:06Z'));
  });

  it('uses the current time when it is already later', async () => {
    const now = COMPILED_AT + 60_000;
    const ack = await reconcile(await baseRequest({ now: () => now }));

    assert.equal(ack.mtimeMs, now);
    assert.equal((await stat(join(buildDir, 'src/util/mod.rs'))).mtimeMs, now);
  });

  it('leaves artifacts alone', async () => {
    const generated = join(buildDir, 'target/release/build/dep-1/out.rs');
    const stamp = new Date('2010-01-01T00:00:00Z');
    await utimes(generated, stamp, stamp);

    await reconcile(await baseRequest());

    assert.equal((await stat(generated)).mtimeMs, stamp.getTime());
  });

  it('fails when there are no sources to reconcile', async () => {
    await assert.rejects(reconcile(await baseRequest({ sourcePatterns: ['**/*.zig'] })), ReconciliationFailedError);
  });
});

describe('content-hash strategy', () => {
  it('invalidates the application unit when sources differ from the stub', async () => {
    const ack = await reconcile(await baseRequest({ strategy: 'content-hash' }));

    assert.deepEqual(ack, {
      strategy: 'content-hash',
      touched: [],
      invalidated: ['release/.fingerprint/demo-1234/bin-demo', 'release/demo']
    });
    assert.equal(await exists(join(buildDir, 'target/release/demo')), false);
    assert.equal(await exists(join(buildDir, 'target/release/deps/libserde-1.rlib')), true);
  });

  it('keeps dependencies whose names start with the package name', async () => {
    const spec = { name: 'demo', dependencies: [{ name: 'demo-utils', version: '0.3.0' }] };
    const manifest = parseCargoManifest(cargoToml(spec), cargoLock(spec));
    await writeProjectFile(buildDir, 'target/release/.fingerprint/demo-utils-bbbb/lib-demo_utils', 'fp');
    await writeProjectFile(buildDir, 'target/release/build/demo-utils-cccc/output', 'build script output');
    await writeProjectFile(buildDir, 'target/release/deps/libdemo_utils-bbbb.rlib', 'rlib');

    const ack = await reconcile(
      await baseRequest({
        strategy: 'content-hash',
        applicationUnitArtifacts: cargoToolchain.applicationUnitArtifacts(manifest, 'release')
      })
    );

    assert.deepEqual(ack.invalidated, ['release/.fingerprint/demo-1234/bin-demo', 'release/demo']);
    assert.equal(await exists(join(buildDir, 'target/release/.fingerprint/demo-utils-bbbb/lib-demo_utils')), true);
    assert.equal(await exists(join(buildDir, 'target/release/build/demo-utils-cccc/output')), true);
    assert.equal(await exists(join(buildDir, 'target/release/deps/libdemo_utils-bbbb.rlib')), true);
  });

  it('does nothing when the sources equal the stub', async () => {
    await writeProjectFile(buildDir, 'src/main.rs', STUB_MAIN);

    const ack = await reconcile(await baseRequest({ strategy: 'content-hash' }));

    assert.deepEqual(ack.invalidated, []);
    assert.equal(await exists(join(buildDir, 'target/release/demo')), true);
  });

  it('fails when sources differ but no metadata can be found', async () => {
    await assert.rejects(
      reconcile(await baseRequest({ strategy: 'content-hash', applicationUnitArtifacts: ['release/nothing-*'] })),
      (error: unknown) => error instanceof ReconciliationFailedError && /no incremental metadata/.test(error.message)
    );
  });
});
