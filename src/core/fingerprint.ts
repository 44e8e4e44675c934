/**
 * Manifest fingerprinting.
 *
 * The fingerprint is the cache key for compiled dependencies. It is derived
 * from the resolved lock and the manifest settings that change how
 * dependencies compile (never from constraints or file layout), so two
 * manifests that resolve to the same closure share one cache entry.
 */

import type { DependencyManifest, Fingerprint } from '../types/index.js';
import { FINGERPRINT_SCHEMA_VERSION, DEFAULTS } from '../constants/index.js';
import { sha256Hex } from '../utils/hash-utils.js';

export interface FingerprintOptions {
  profile?: string;
}

interface CanonicalPackage {
  name: string;
  version: string | null;
  source: string | null;
  checksum: string | null;
  dependencies: string[];
}

interface CanonicalFeatureSelection {
  name: string;
  kind: string;
  features: string[];
  defaultFeatures: boolean;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Sort table keys at every depth; array order is significant and kept */
function canonicalValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalValue);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort(compareStrings)) {
      sorted[key] = canonicalValue(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

function packageSortKey(pkg: CanonicalPackage): string {
  return `${pkg.name}@${pkg.version ?? ''}#${pkg.source ?? ''}`;
}

/**
 * Canonical text of everything that determines dependency compilation output.
 *
 * The root package's own version is left out: it names the application unit,
 * which is recompiled on every build anyway.
 */
export function canonicalizeLock(manifest: DependencyManifest, options: FingerprintOptions = {}): string {
  const packages: CanonicalPackage[] = manifest.locked
    .map(pkg => {
      const isRoot = pkg.source === undefined && pkg.name === manifest.root.name;
      return {
        name: pkg.name,
        version: isRoot ? null : pkg.version,
        source: pkg.source ?? null,
        checksum: pkg.checksum ?? null,
        dependencies: [...pkg.dependencies].sort(compareStrings)
      };
    })
    .sort((a, b) => compareStrings(packageSortKey(a), packageSortKey(b)));

  // Default selections are implied by the lock; only deviations change the compiled output
  const features: CanonicalFeatureSelection[] = manifest.declared
    .filter(dep => dep.features.length > 0 || !dep.defaultFeatures)
    .map(dep => ({
      name: dep.name,
      kind: dep.kind,
      features: [...new Set(dep.features)].sort(compareStrings),
      defaultFeatures: dep.defaultFeatures
    }))
    .sort((a, b) => compareStrings(JSON.stringify(a), JSON.stringify(b)));

  return JSON.stringify({
    schema: FINGERPRINT_SCHEMA_VERSION,
    toolchain: manifest.toolchain,
    profile: options.profile ?? DEFAULTS.PROFILE,
    packages,
    features,
    settings: canonicalValue(manifest.compileSettings ?? {})
  });
}

export function fingerprint(manifest: DependencyManifest, options: FingerprintOptions = {}): Fingerprint {
  return sha256Hex(canonicalizeLock(manifest, options));
}
