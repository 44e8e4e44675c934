import { join } from 'path';
import * as TOML from 'smol-toml';
import * as semver from 'semver';

import type {
  BuildTarget,
  DeclaredDependency,
  DependencyKind,
  DependencyManifest,
  LockedPackage
} from '../../types/index.js';
import { readTextFile, exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { MalformedManifestError } from '../../utils/errors.js';

export const CARGO_TOML = 'Cargo.toml';
export const CARGO_LOCK = 'Cargo.lock';

type TomlTable = Record<string, unknown>;

function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function parseToml(content: string, file: string): TomlTable {
  try {
    return TOML.parse(content);
  } catch (error) {
    throw new MalformedManifestError(`${file} is not valid TOML`, { file, error });
  }
}

const DEPENDENCY_SECTIONS: Array<[string, DependencyKind]> = [
  ['dependencies', 'normal'],
  ['build-dependencies', 'build'],
  ['dev-dependencies', 'dev']
];

function readDependencyTable(table: unknown, kind: DependencyKind, into: DeclaredDependency[]): void {
  if (!isTable(table)) {
    return;
  }

  for (const [key, spec] of Object.entries(table)) {
    if (typeof spec === 'string') {
      into.push({ name: key, constraint: spec, kind, features: [], defaultFeatures: true });
      continue;
    }
    if (!isTable(spec)) {
      throw new MalformedManifestError(`dependency '${key}' has an unsupported specification`, { dependency: key });
    }
    if (typeof spec.path === 'string') {
      throw new MalformedManifestError(
        `path dependency '${key}' cannot be compiled without application sources`,
        { dependency: key, path: spec.path }
      );
    }

    const defaultFeatures = spec['default-features'] ?? spec.default_features;
    into.push({
      name: optionalString(spec.package) ?? key,
      constraint: optionalString(spec.version),
      kind,
      features: stringArray(spec.features).sort(),
      defaultFeatures: defaultFeatures !== false
    });
  }
}

function readDeclaredDependencies(manifest: TomlTable): DeclaredDependency[] {
  const declared: DeclaredDependency[] = [];

  for (const [section, kind] of DEPENDENCY_SECTIONS) {
    readDependencyTable(manifest[section], kind, declared);
  }

  // [target.'cfg(unix)'.dependencies] and friends
  if (isTable(manifest.target)) {
    for (const platform of Object.values(manifest.target)) {
      if (!isTable(platform)) continue;
      for (const [section, kind] of DEPENDENCY_SECTIONS) {
        readDependencyTable(platform[section], kind, declared);
      }
    }
  }

  return declared;
}

const DEFAULT_TARGET_DIRS: Record<'example' | 'test' | 'bench', string> = {
  example: 'examples',
  test: 'tests',
  bench: 'benches'
};

function readTargets(manifest: TomlTable, packageName: string): BuildTarget[] {
  const targets: BuildTarget[] = [];

  if (isTable(manifest.lib)) {
    targets.push({
      kind: 'lib',
      name: optionalString(manifest.lib.name) ?? packageName.replace(/-/g, '_'),
      path: optionalString(manifest.lib.path) ?? 'src/lib.rs'
    });
  }

  const bins = Array.isArray(manifest.bin) ? manifest.bin.filter(isTable) : [];
  for (const bin of bins) {
    const name = optionalString(bin.name);
    if (!name) {
      throw new MalformedManifestError('[[bin]] target without a name');
    }
    const defaultPath = name === packageName ? 'src/main.rs' : `src/bin/${name}.rs`;
    targets.push({ kind: 'bin', name, path: optionalString(bin.path) ?? defaultPath });
  }
  if (bins.length === 0) {
    targets.push({ kind: 'bin', name: packageName, path: 'src/main.rs' });
  }

  for (const kind of ['example', 'test', 'bench'] as const) {
    const section = manifest[kind];
    const declared = Array.isArray(section) ? section.filter(isTable) : [];
    for (const target of declared) {
      const name = optionalString(target.name);
      if (!name) {
        throw new MalformedManifestError(`[[${kind}]] target without a name`);
      }
      targets.push({ kind, name, path: optionalString(target.path) ?? `${DEFAULT_TARGET_DIRS[kind]}/${name}.rs` });
    }
  }

  return targets;
}

function readBuildScript(pkg: TomlTable): BuildTarget | null {
  const build = optionalString(pkg.build);
  return build ? { kind: 'build-script', name: 'build-script-build', path: build } : null;
}

function readLockedPackages(lock: TomlTable): LockedPackage[] {
  if (!Array.isArray(lock.package)) {
    throw new MalformedManifestError(`${CARGO_LOCK} has no [[package]] entries`);
  }

  return lock.package.map((entry, index): LockedPackage => {
    if (!isTable(entry)) {
      throw new MalformedManifestError(`${CARGO_LOCK} package #${index + 1} is not a table`);
    }
    const name = optionalString(entry.name);
    const version = optionalString(entry.version);
    if (!name || !version) {
      throw new MalformedManifestError(`${CARGO_LOCK} package #${index + 1} lacks a name or version`);
    }
    if (!semver.valid(version)) {
      throw new MalformedManifestError(`locked version '${version}' of '${name}' is not a valid semantic version`, {
        package: name,
        version
      });
    }
    return {
      name,
      version,
      source: optionalString(entry.source),
      checksum: optionalString(entry.checksum),
      dependencies: stringArray(entry.dependencies).sort()
    };
  });
}

/**
 * Translate a cargo version requirement into a node-semver range.
 * Cargo treats a bare version as a caret requirement and separates
 * comparators with commas.
 */
export function toSemverRange(constraint: string): string | null {
  const comparators = constraint
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      if (/^\d/.test(part)) return `^${part}`;
      if (/^=\s*\d/.test(part)) return part.replace(/^=\s*/, '');
      return part.replace(/\s+/g, '');
    });

  if (comparators.length === 0) {
    return null;
  }
  return semver.validRange(comparators.join(' '));
}

function resolveReference(reference: string, locked: LockedPackage[]): LockedPackage | undefined {
  const parts = reference.split(' ');
  const name = parts[0];
  const version = parts.length > 1 ? parts[1] : undefined;
  return locked.find(pkg => pkg.name === name && (version === undefined || pkg.version === version));
}

/**
 * Cross-check the manifest against its lock: every declared dependency must be
 * locked at a satisfying version, every lock reference must resolve, and every
 * locked package must be reachable from the root package.
 */
export function validateLockConsistency(manifest: DependencyManifest): void {
  const { locked, root } = manifest;

  const rootPackage = locked.find(pkg => pkg.name === root.name && pkg.source === undefined);
  if (!rootPackage) {
    throw new MalformedManifestError(`root package '${root.name}' is absent from ${CARGO_LOCK}`, { package: root.name });
  }

  for (const pkg of locked) {
    if (pkg.source === undefined && pkg !== rootPackage) {
      throw new MalformedManifestError(
        `locked package '${pkg.name}' has no registry or git source; path dependencies and workspace members are not supported`,
        { package: pkg.name }
      );
    }
  }

  for (const dep of manifest.declared) {
    const candidates = locked.filter(pkg => pkg.name === dep.name);
    if (candidates.length === 0) {
      throw new MalformedManifestError(`declared dependency '${dep.name}' is absent from ${CARGO_LOCK}`, {
        dependency: dep.name
      });
    }
    if (!dep.constraint) continue;

    const range = toSemverRange(dep.constraint);
    if (range === null) {
      logger.debug(`Skipping constraint check for '${dep.name}': cannot interpret '${dep.constraint}'`);
      continue;
    }
    if (!candidates.some(pkg => semver.satisfies(pkg.version, range))) {
      throw new MalformedManifestError(
        `no locked version of '${dep.name}' satisfies '${dep.constraint}' (locked: ${candidates.map(pkg => pkg.version).join(', ')})`,
        { dependency: dep.name, constraint: dep.constraint }
      );
    }
  }

  const reached = new Set<LockedPackage>([rootPackage]);
  const queue: LockedPackage[] = [rootPackage];
  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    for (const reference of current.dependencies) {
      const target = resolveReference(reference, locked);
      if (!target) {
        throw new MalformedManifestError(
          `'${current.name}@${current.version}' depends on '${reference}', which is absent from ${CARGO_LOCK}`,
          { package: current.name, reference }
        );
      }
      if (!reached.has(target)) {
        reached.add(target);
        queue.push(target);
      }
    }
  }

  const orphans = locked.filter(pkg => !reached.has(pkg));
  if (orphans.length > 0) {
    throw new MalformedManifestError(
      `${CARGO_LOCK} locks packages nothing depends on: ${orphans.map(pkg => `${pkg.name}@${pkg.version}`).join(', ')}`,
      { orphans: orphans.map(pkg => pkg.name) }
    );
  }
}

const COMPILE_SETTING_SECTIONS = ['features', 'patch', 'profile', 'replace'];

function readCompileSettings(manifest: TomlTable): Record<string, unknown> {
  const settings: Record<string, unknown> = {};
  for (const section of COMPILE_SETTING_SECTIONS) {
    if (manifest[section] !== undefined) {
      settings[section] = manifest[section];
    }
  }
  return settings;
}

/**
 * Parse Cargo.toml and Cargo.lock contents into a validated DependencyManifest
 */
export function parseCargoManifest(manifestContent: string, lockContent: string): DependencyManifest {
  const manifest = parseToml(manifestContent, CARGO_TOML);
  const lock = parseToml(lockContent, CARGO_LOCK);

  if (!isTable(manifest.package)) {
    throw new MalformedManifestError(`${CARGO_TOML} has no [package] table`);
  }
  const name = optionalString(manifest.package.name);
  if (!name) {
    throw new MalformedManifestError(`${CARGO_TOML} [package] has no name`);
  }

  const targets = readTargets(manifest, name);
  const buildScript = readBuildScript(manifest.package);
  if (buildScript) {
    targets.push(buildScript);
  }

  const result: DependencyManifest = {
    toolchain: 'cargo',
    root: {
      name,
      version: optionalString(manifest.package.version) ?? '0.0.0'
    },
    declared: readDeclaredDependencies(manifest),
    locked: readLockedPackages(lock),
    targets,
    compileSettings: readCompileSettings(manifest)
  };

  validateLockConsistency(result);
  return result;
}

/**
 * Read Cargo.toml and Cargo.lock from a project root
 */
export async function readCargoManifest(projectRoot: string): Promise<DependencyManifest> {
  const manifestPath = join(projectRoot, CARGO_TOML);
  const lockPath = join(projectRoot, CARGO_LOCK);

  for (const path of [manifestPath, lockPath]) {
    if (!(await exists(path))) {
      throw new MalformedManifestError(`missing ${path}`, { path });
    }
  }

  const manifest = parseCargoManifest(await readTextFile(manifestPath), await readTextFile(lockPath));
  logger.debug(`Read cargo manifest for ${manifest.root.name}`, {
    declared: manifest.declared.length,
    locked: manifest.locked.length
  });
  return manifest;
}
