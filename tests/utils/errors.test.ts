import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  ApplicationCompileError,
  CacheEntryUnavailableError,
  ReconciliationFailedError,
  ValidationError,
  formatErrorForCli
} from '../../src/utils/errors.js';

const FP = '0123456789ab'.padEnd(64, 'f');

describe('formatErrorForCli', () => {
  it('names the failed phase and the dependency fingerprint of a build error', () => {
    const error = new ApplicationCompileError({ fingerprint: FP, diagnostic: 'error[E0308]: mismatched types', exitCode: 101 });

    assert.equal(
      formatErrorForCli(error),
      'Application compilation failed:\nerror[E0308]: mismatched types\n  phase: SOURCE_OVERLAID, dependencies: 0123456789ab'
    );
  });

  it('uses the phase the orchestrator recorded', () => {
    const error = new ReconciliationFailedError('no application source files matched', {
      phase: 'SOURCE_OVERLAID',
      fingerprint: FP,
      patterns: ['**/*.rs']
    });

    assert.equal(
      formatErrorForCli(error),
      'Staleness reconciliation failed: no application source files matched\n  phase: SOURCE_OVERLAID, dependencies: 0123456789ab'
    );
  });

  it('prints the fingerprint alone when no phase is known', () => {
    const error = new CacheEntryUnavailableError(FP, 'it was evicted while being restored');

    assert.equal(
      formatErrorForCli(error),
      'Cache entry 0123456789ab could not be restored: it was evicted while being restored\n  dependencies: 0123456789ab'
    );
  });

  it('prints only the message for errors without build context', () => {
    assert.equal(formatErrorForCli(new ValidationError('unknown toolchain: zig')), 'Validation error: unknown toolchain: zig');
    assert.equal(formatErrorForCli(new Error('socket hang up')), 'socket hang up');
    assert.equal(formatErrorForCli('thrown string'), 'An unknown error occurred');
  });
});
