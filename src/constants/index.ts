/**
 * Shared constants for depcache
 * Single source of truth for directory names, file names and defaults.
 */

export const DIR_PATTERNS = {
  DEPCACHE: '.depcache',
  BUILD: 'build',
  GIT: '.git'
} as const;

export const FILE_PATTERNS = {
  CONFIG_YML: 'depcache.yml',
  CONFIG_YAML: 'depcache.yaml',
  ENTRY_JSON: 'entry.json'
} as const;

/**
 * Layout of the dependency compilation cache root.
 */
export const CACHE_DIRS = {
  ENTRIES: 'entries',
  STAGING: 'staging',
  TRASH: 'trash',
  ACCESS: 'access',
  ARTIFACTS: 'artifacts'
} as const;

export const CACHE_SCHEMA_VERSION = 1;

/** Canonical lock format version; bump to invalidate every fingerprint */
export const FINGERPRINT_SCHEMA_VERSION = 2;

export const MAX_COMMIT_ATTEMPTS = 3;

export const DEFAULTS = {
  TOOLCHAIN: 'cargo',
  PROFILE: 'release',
  RECONCILE_STRATEGY: 'mtime',
  RECONCILE_GRANULARITY_MS: 1000
} as const;

export const ENV_VARS = {
  CACHE_DIR: 'DEPCACHE_CACHE_DIR',
  BUILD_DIR: 'DEPCACHE_BUILD_DIR',
  PROFILE: 'DEPCACHE_PROFILE',
  RECONCILE: 'DEPCACHE_RECONCILE',
  VERBOSE: 'DEPCACHE_VERBOSE',
  LOG_LEVEL: 'DEPCACHE_LOG_LEVEL'
} as const;
