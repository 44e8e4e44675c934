/**
 * Core type definitions for depcache
 */

// Manifest types
export type DependencyKind = 'normal' | 'build' | 'dev';

export interface DeclaredDependency {
  /** Name of the package as it appears in the lock (after any rename) */
  name: string;
  /** Version requirement as written in the manifest; undefined for git dependencies */
  constraint?: string;
  kind: DependencyKind;
  features: string[];
  defaultFeatures: boolean;
}

export interface LockedPackage {
  name: string;
  version: string;
  source?: string;
  checksum?: string;
  /** References to other locked packages, in the lock's own `name [version]` notation */
  dependencies: string[];
}

export type BuildTargetKind = 'lib' | 'bin' | 'example' | 'test' | 'bench' | 'build-script';

export interface BuildTarget {
  kind: BuildTargetKind;
  name: string;
  /** Source path relative to the project root */
  path: string;
}

export interface DependencyManifest {
  toolchain: string;
  root: {
    name: string;
    version: string;
  };
  declared: DeclaredDependency[];
  locked: LockedPackage[];
  targets: BuildTarget[];
  /** Manifest sections that change how dependencies compile (profiles, feature sets, patches) */
  compileSettings?: Record<string, unknown>;
}

/** 64 hex characters, SHA-256 of the canonical resolved lock */
export type Fingerprint = string;

// Stub types
export interface StubFile {
  path: string;
  content: string;
}

export interface StubSource {
  files: StubFile[];
  digest: string;
}

/**
 * What a cache entry remembers about the stub that was compiled into it.
 */
export interface StubRecord {
  digest: string;
  files: Array<{ path: string; hash: string }>;
  /** Time the stub compile finished; the compiler's recorded timestamp for the stub */
  compiledAtMs: number;
}

// Cache types
export interface CacheEntryMetadata {
  schemaVersion: number;
  fingerprint: Fingerprint;
  toolchain: string;
  profile: string;
  resolvedLock: string;
  artifactDigest: string;
  fileCount: number;
  totalBytes: number;
  stub: StubRecord;
  createdAt: string;
}

export interface CacheEntry {
  fingerprint: Fingerprint;
  path: string;
  artifactsDir: string;
  metadata: CacheEntryMetadata;
}

export interface CacheEntrySummary {
  fingerprint: Fingerprint;
  toolchain: string;
  profile: string;
  createdAt: string;
  lastAccessedAt: string;
  fileCount: number;
  totalBytes: number;
}

export type StoreStatus = 'stored' | 'unchanged' | 'replaced';

export interface StoreAck {
  fingerprint: Fingerprint;
  status: StoreStatus;
}

export interface EvictionPolicy {
  maxEntries?: number;
  maxAgeMs?: number;
  fingerprints?: Fingerprint[];
  all?: boolean;
}

// Build types
export type BuildPhase =
  | 'INIT'
  | 'STUB_COMPILED'
  | 'SOURCE_OVERLAID'
  | 'FINAL_COMPILED'
  | 'DONE'
  | 'FAILED';

export type ReconcileStrategy = 'mtime' | 'content-hash';

export interface BuildOutput {
  binaryPath: string;
  digest: string;
  fingerprint: Fingerprint;
  cacheHit: boolean;
  phases: BuildPhase[];
}

// Configuration types
export interface DepcacheConfig {
  toolchain: string;
  profile: string;
  cacheDir: string;
  buildDir: string;
  output?: string;
  reconcile: {
    strategy: ReconcileStrategy;
    granularityMs: number;
  };
  overlay: {
    exclude: string[];
  };
  compiler: {
    command?: string;
    args?: string[];
  };
  eviction: {
    maxEntries?: number;
    maxAgeDays?: number;
  };
}

// Command types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DepcacheError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DepcacheError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  MALFORMED_MANIFEST = 'MALFORMED_MANIFEST',
  DEPENDENCY_COMPILE_ERROR = 'DEPENDENCY_COMPILE_ERROR',
  APPLICATION_COMPILE_ERROR = 'APPLICATION_COMPILE_ERROR',
  RECONCILIATION_FAILED = 'RECONCILIATION_FAILED',
  CACHE_STORE_CONFLICT = 'CACHE_STORE_CONFLICT',
  CACHE_ENTRY_UNAVAILABLE = 'CACHE_ENTRY_UNAVAILABLE',
  FINGERPRINT_COLLISION = 'FINGERPRINT_COLLISION',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
