import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import os from 'os';
import { formatAge, formatBytes, formatPathForDisplay, shortFingerprint } from '../../src/utils/formatters.js';

describe('formatPathForDisplay', () => {
  const homeDir = os.homedir();
  const mockCwd = '/work/project';

  test('should return tilde notation for the default cache directory', () => {
    const path = join(homeDir, '.depcache', 'cache');
    assert.strictEqual(formatPathForDisplay(path, mockCwd), '~/.depcache/cache');
  });

  test('should return relative path for files within cwd', () => {
    assert.strictEqual(formatPathForDisplay(join(mockCwd, 'output', 'server'), mockCwd), 'output/server');
  });

  test('should return as-is for already relative paths', () => {
    assert.strictEqual(formatPathForDisplay('./target/release', mockCwd), './target/release');
  });

  test('should return absolute path when outside cwd and not under home', () => {
    assert.strictEqual(formatPathForDisplay('/opt/builds/app', mockCwd), '/opt/builds/app');
  });

  test('should use cwd from process.cwd() when not provided', () => {
    assert.strictEqual(formatPathForDisplay(join(process.cwd(), 'depcache.yml')), 'depcache.yml');
  });
});

describe('formatBytes', () => {
  test('should keep whole bytes below a kilobyte', () => {
    assert.strictEqual(formatBytes(0), '0 B');
    assert.strictEqual(formatBytes(512), '512 B');
  });

  test('should scale to larger units with one decimal', () => {
    assert.strictEqual(formatBytes(1536), '1.5 KB');
    assert.strictEqual(formatBytes(5 * 1024 * 1024), '5.0 MB');
  });
});

describe('formatAge', () => {
  const at = '2024-01-01T00:00:00Z';
  const base = Date.parse(at);

  test('should pick the coarsest sensible unit', () => {
    assert.strictEqual(formatAge(at, base + 30_000), '30s ago');
    assert.strictEqual(formatAge(at, base + 90_000), '1m ago');
    assert.strictEqual(formatAge(at, base + 3 * 3_600_000), '3h ago');
    assert.strictEqual(formatAge(at, base + 3 * 86_400_000), '3d ago');
  });

  test('should not report negative ages', () => {
    assert.strictEqual(formatAge(at, base - 5_000), '0s ago');
  });
});

describe('shortFingerprint', () => {
  test('should keep the first twelve characters', () => {
    assert.strictEqual(shortFingerprint('0123456789abcdef'), '0123456789ab');
  });
});
