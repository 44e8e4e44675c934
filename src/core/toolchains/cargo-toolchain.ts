import type { BuildTarget, DependencyManifest, StubFile } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { CARGO_LOCK, CARGO_TOML, readCargoManifest } from './cargo-manifest.js';
import type { CompileCommand, Toolchain } from './types.js';

const MAIN_STUB = 'fn main() {}\n';

/** minimatch extglob for the hex metadata hash cargo appends to unit names */
const METADATA_HASH = '+([0-9a-f])';

/**
 * Output directory cargo uses for a profile (`dev` and `test` share `debug`)
 */
export function cargoProfileDir(profile: string): string {
  return profile === 'dev' || profile === 'test' ? 'debug' : profile;
}

function crateIdent(name: string): string {
  return name.replace(/-/g, '_');
}

function primaryBinary(manifest: DependencyManifest): BuildTarget {
  const bin = manifest.targets.find(target => target.kind === 'bin');
  if (!bin) {
    throw new ValidationError(`package '${manifest.root.name}' declares no binary target`);
  }
  return bin;
}

export const cargoToolchain: Toolchain = {
  name: 'cargo',
  manifestFiles: [CARGO_TOML, CARGO_LOCK],
  artifactDir: 'target',
  sourcePatterns: ['**/*.rs'],

  readManifest(projectRoot: string): Promise<DependencyManifest> {
    return readCargoManifest(projectRoot);
  },

  stubFor(target: BuildTarget): StubFile {
    switch (target.kind) {
      case 'bin':
      case 'example':
      case 'build-script':
        return { path: target.path, content: MAIN_STUB };
      case 'lib':
      case 'test':
      case 'bench':
        return { path: target.path, content: '' };
    }
  },

  binaryPath(manifest: DependencyManifest, profile: string): string {
    return `${cargoProfileDir(profile)}/${primaryBinary(manifest).name}`;
  },

  applicationUnitArtifacts(manifest: DependencyManifest, profile: string): string[] {
    const dir = cargoProfileDir(profile);
    const pkg = manifest.root.name;
    // Unit directories are `<name>-<metadata hash>`; a dependency called `<pkg>-utils` must not match
    const patterns = [
      `${dir}/.fingerprint/${pkg}-${METADATA_HASH}/**`,
      `${dir}/build/${pkg}-${METADATA_HASH}/**`,
      `${dir}/deps/lib${crateIdent(pkg)}-${METADATA_HASH}.*`,
      `${dir}/deps/${crateIdent(pkg)}-${METADATA_HASH}?(.*)`
    ];
    for (const target of manifest.targets) {
      if (target.kind === 'bin') {
        patterns.push(
          `${dir}/deps/${crateIdent(target.name)}-${METADATA_HASH}?(.*)`,
          `${dir}/${target.name}`,
          `${dir}/${target.name}.d`
        );
      }
    }
    return [...new Set(patterns)];
  },

  compileCommand(profile: string, cacheDir: string): CompileCommand {
    const args = ['build', '--locked', '--target-dir', cacheDir];
    if (profile === 'release') {
      args.push('--release');
    } else if (profile !== 'dev') {
      args.push('--profile', profile);
    }
    return { command: 'cargo', args };
  }
};
