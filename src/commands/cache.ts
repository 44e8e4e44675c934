import { Command } from 'commander';
import { resolve } from 'path';
import pico from 'picocolors';

import type { EvictionPolicy } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { formatAge, formatBytes, formatPathForDisplay, shortFingerprint } from '../utils/formatters.js';
import { loadConfig } from '../core/config.js';
import { createDependencyCache, type DependencyCache } from '../core/cache/dependency-cache.js';
import { resolveProjectRoot } from '../cli/context.js';
import { confirmAction } from '../cli/clack-prompt-adapter.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface CacheOptions {
  cacheDir?: string;
}

interface EvictOptions {
  maxEntries?: string;
  maxAgeDays?: string;
  all?: boolean;
  yes?: boolean;
}

async function openCache(command: Command): Promise<DependencyCache> {
  const { cacheDir } = command.optsWithGlobals<CacheOptions>();
  if (cacheDir) {
    return createDependencyCache(resolve(process.cwd(), cacheDir));
  }
  const config = await loadConfig(resolveProjectRoot(undefined, command));
  return createDependencyCache(config.cacheDir);
}

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${flag} must be a non-negative integer, got '${value}'`);
  }
  return Number(value);
}

/**
 * Eviction policy from flags; fingerprints may be given as unique prefixes
 */
export function buildEvictionPolicy(fingerprints: string[], options: EvictOptions): EvictionPolicy {
  const maxEntries = parseCount(options.maxEntries, '--max-entries');
  const maxAgeDays = parseCount(options.maxAgeDays, '--max-age-days');
  const policy: EvictionPolicy = {
    maxEntries,
    maxAgeMs: maxAgeDays !== undefined ? maxAgeDays * DAY_MS : undefined,
    fingerprints: fingerprints.length > 0 ? fingerprints : undefined,
    all: options.all
  };
  if (!policy.all && policy.maxEntries === undefined && policy.maxAgeMs === undefined && !policy.fingerprints) {
    throw new ValidationError('Nothing to evict: name fingerprints or pass --max-entries, --max-age-days or --all');
  }
  return policy;
}

async function listCommand(command: Command): Promise<void> {
  const cache = await openCache(command);
  const entries = await cache.list();

  if (entries.length === 0) {
    console.log(pico.dim(`No cache entries in ${formatPathForDisplay(cache.root)}`));
    return;
  }

  let totalBytes = 0;
  for (const entry of entries) {
    totalBytes += entry.totalBytes;
    console.log(
      `${pico.cyan(shortFingerprint(entry.fingerprint))}  ${entry.toolchain}/${entry.profile}  ` +
        `${formatBytes(entry.totalBytes).padStart(9)}  ${pico.dim(`used ${formatAge(entry.lastAccessedAt)}`)}`
    );
  }
  console.log(pico.dim(`${entries.length} entries, ${formatBytes(totalBytes)} in ${formatPathForDisplay(cache.root)}`));
}

async function evictCommand(prefixes: string[], options: EvictOptions, command: Command): Promise<void> {
  const cache = await openCache(command);
  const entries = await cache.list();

  const fingerprints = prefixes.map(prefix => {
    const matches = entries.filter(entry => entry.fingerprint.startsWith(prefix));
    if (matches.length !== 1) {
      throw new ValidationError(
        matches.length === 0 ? `No cache entry matches '${prefix}'` : `'${prefix}' matches ${matches.length} cache entries`
      );
    }
    return matches[0].fingerprint;
  });
  const policy = buildEvictionPolicy(fingerprints, options);

  if (policy.all && !(await confirmAction(`Remove all ${entries.length} cache entries?`, options.yes))) {
    console.log(pico.dim('Nothing evicted'));
    return;
  }

  const removed = await cache.evict(policy);
  console.log(`${pico.green('✓')} Evicted ${removed.length} ${removed.length === 1 ? 'entry' : 'entries'}`);
  for (const fingerprint of removed) {
    console.log(`  ${pico.dim(shortFingerprint(fingerprint))}`);
  }
}

async function pruneCommand(command: Command): Promise<void> {
  const cache = await openCache(command);
  const removed = await cache.prune();
  console.log(`${pico.green('✓')} Removed ${removed} leftover staging and trash directories`);
}

export function setupCacheCommand(program: Command): void {
  const cacheCommand = program
    .command('cache')
    .description('Inspect and manage the dependency cache')
    .option('--cache-dir <dir>', 'dependency cache location');

  cacheCommand
    .command('list')
    .alias('ls')
    .description('List cache entries, most recently used first')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await listCommand(command);
    }));

  cacheCommand
    .command('evict')
    .description('Remove cache entries')
    .argument('[fingerprints...]', 'entries to remove (unique prefixes are accepted)')
    .option('--max-entries <n>', 'keep only the n most recently used entries')
    .option('--max-age-days <n>', 'remove entries unused for more than n days')
    .option('--all', 'remove every entry')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(withErrorHandling(async (fingerprints: string[], options: EvictOptions, command: Command) => {
      await evictCommand(fingerprints, options, command);
    }));

  cacheCommand
    .command('prune')
    .description('Remove abandoned staging and trash directories')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await pruneCommand(command);
    }));
}
