import type { BuildTarget, DependencyManifest, StubFile } from '../../types/index.js';

export interface CompileCommand {
  command: string;
  args: string[];
}

/**
 * Everything depcache needs to know about one compiled-language toolchain.
 *
 * The orchestrator never looks inside a manifest or an artifact directory
 * itself; it asks the toolchain where things live.
 */
export interface Toolchain {
  readonly name: string;

  /** Files (relative to the project root) that make up the dependency manifest */
  readonly manifestFiles: readonly string[];

  /** Directory (relative to the build root) the compiler writes artifacts into */
  readonly artifactDir: string;

  /** Globs, relative to the project root, matching application source files */
  readonly sourcePatterns: readonly string[];

  /**
   * Read and validate the manifest and its lock. Throws MalformedManifestError.
   */
  readManifest(projectRoot: string): Promise<DependencyManifest>;

  /** Placeholder file for a single build target */
  stubFor(target: BuildTarget): StubFile;

  /** Path of the produced binary, relative to the artifact directory */
  binaryPath(manifest: DependencyManifest, profile: string): string;

  /**
   * Globs, relative to the artifact directory, matching the compiler's
   * incremental metadata for the application unit (not for dependencies).
   */
  applicationUnitArtifacts(manifest: DependencyManifest, profile: string): string[];

  compileCommand(profile: string, cacheDir: string): CompileCommand;
}
