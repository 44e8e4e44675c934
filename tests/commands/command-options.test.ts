import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { applyBuildOptions } from '../../src/commands/build.js';
import { buildEvictionPolicy } from '../../src/commands/cache.js';
import { createDefaultConfig } from '../../src/core/config.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('buildEvictionPolicy', () => {
  it('converts counts and days', () => {
    const policy = buildEvictionPolicy([], { maxEntries: '3', maxAgeDays: '2' });
    assert.equal(policy.maxEntries, 3);
    assert.equal(policy.maxAgeMs, 2 * 24 * 60 * 60 * 1000);
    assert.equal(policy.fingerprints, undefined);
  });

  it('keeps named fingerprints and --all', () => {
    assert.deepEqual(buildEvictionPolicy(['abc123'], {}).fingerprints, ['abc123']);
    assert.equal(buildEvictionPolicy([], { all: true }).all, true);
  });

  it('rejects malformed numbers and empty policies', () => {
    assert.throws(() => buildEvictionPolicy([], { maxEntries: '1.5' }), ValidationError);
    assert.throws(() => buildEvictionPolicy([], { maxAgeDays: '-1' }), ValidationError);
    assert.throws(() => buildEvictionPolicy([], {}), /Nothing to evict/);
  });
});

describe('applyBuildOptions', () => {
  const base = createDefaultConfig('/work/app');

  it('lays flags over the configuration relative to the working directory', () => {
    const config = applyBuildOptions(
      base,
      { output: 'out/server', buildDir: '/scratch/app', profile: 'dev', reconcile: 'content-hash' },
      '/work'
    );

    assert.equal(config.output, '/work/out/server');
    assert.equal(config.buildDir, '/scratch/app');
    assert.equal(config.cacheDir, base.cacheDir);
    assert.equal(config.profile, 'dev');
    assert.deepEqual(config.reconcile, { strategy: 'content-hash', granularityMs: 1000 });
  });

  it('leaves the configuration alone without flags', () => {
    const config = applyBuildOptions(base, {}, '/work');
    assert.equal(config.output, undefined);
    assert.equal(config.buildDir, base.buildDir);
    assert.equal(config.profile, 'release');
    assert.deepEqual(config.reconcile, base.reconcile);
  });

  it('rejects an unknown reconcile strategy', () => {
    assert.throws(() => applyBuildOptions(base, { reconcile: 'fast' }, '/work'), ValidationError);
  });
});
