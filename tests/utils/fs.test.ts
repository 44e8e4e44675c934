/**
 * Tests for directory walking and tree copies
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { stat } from 'node:fs/promises';
import { join, relative } from 'node:path';

import { copyTree, remove, toPosixPath, walkFiles } from '../../src/utils/fs.js';
import { backdate, createTempDir, removeTempDir, writeProjectFile } from '../test-helpers.js';

let tmp: string;

async function walk(dir: string, enterDirectory?: (rel: string) => boolean): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walkFiles(dir, { enterDirectory })) {
    files.push(toPosixPath(relative(dir, file)));
  }
  return files.sort();
}

beforeEach(async () => {
  tmp = await createTempDir('fs');
  await writeProjectFile(tmp, 'src/main.rs', 'fn main() {}\n');
  await writeProjectFile(tmp, 'src/.DS_Store', 'junk');
  await writeProjectFile(tmp, '.env.example', 'KEY=test-secret\n');
  await writeProjectFile(tmp, 'target/release/app', 'binary');
});

afterEach(async () => {
  await removeTempDir(tmp);
});

describe('walkFiles', () => {
  it('skips OS junk but keeps ordinary dotfiles', async () => {
    assert.deepEqual(await walk(tmp), ['.env.example', 'src/main.rs', 'target/release/app']);
  });

  it('does not enter rejected directories', async () => {
    assert.deepEqual(await walk(tmp, rel => rel !== 'target'), ['.env.example', 'src/main.rs']);
  });
});

describe('copyTree', () => {
  it('copies filtered files and preserves their modification times', async () => {
    const source = join(tmp, 'src/main.rs');
    await backdate(source);
    const dest = join(tmp, 'copy');

    const copied = await copyTree(join(tmp, 'src'), dest, { filter: rel => rel.endsWith('.rs') });

    assert.deepEqual(copied, ['main.rs']);
    assert.equal((await stat(join(dest, 'main.rs'))).mtimeMs, (await stat(source)).mtimeMs);
  });
});

describe('remove', () => {
  it('ignores paths that do not exist', async () => {
    await remove(join(tmp, 'missing'));
    await remove(join(tmp, 'target'));
    assert.deepEqual(await walk(tmp), ['.env.example', 'src/main.rs']);
  });
});
