import { join, isAbsolute, resolve, basename } from 'path';
import { homedir } from 'os';
import yaml from 'js-yaml';

import type { DepcacheConfig, ReconcileStrategy } from '../types/index.js';
import { DEFAULTS, DIR_PATTERNS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { sha256Hex } from '../utils/hash-utils.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration management for depcache
 *
 * Values come from, lowest precedence first: built-in defaults, `depcache.yml`
 * (or `depcache.yaml`) in the project root, then `DEPCACHE_*` environment variables.
 * Command-line flags are applied on top by the commands themselves.
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_YML, FILE_PATTERNS.CONFIG_YAML];
const RECONCILE_STRATEGIES: readonly ReconcileStrategy[] = ['mtime', 'content-hash'];

export function getDefaultCacheDir(): string {
  return join(homedir(), DIR_PATTERNS.DEPCACHE, 'cache');
}

/**
 * `~/.depcache/build/<name>-<path hash>`: projects that share a directory name get separate build dirs
 */
export function getDefaultBuildDir(projectRoot: string): string {
  const absolute = resolve(projectRoot);
  const suffix = sha256Hex(absolute).substring(0, 12);
  return join(homedir(), DIR_PATTERNS.DEPCACHE, DIR_PATTERNS.BUILD, `${basename(absolute)}-${suffix}`);
}

export function createDefaultConfig(projectRoot: string): DepcacheConfig {
  return {
    toolchain: DEFAULTS.TOOLCHAIN,
    profile: DEFAULTS.PROFILE,
    cacheDir: getDefaultCacheDir(),
    buildDir: getDefaultBuildDir(projectRoot),
    reconcile: {
      strategy: DEFAULTS.RECONCILE_STRATEGY,
      granularityMs: DEFAULTS.RECONCILE_GRANULARITY_MS
    },
    overlay: { exclude: [] },
    compiler: {},
    eviction: {}
  };
}

export function isReconcileStrategy(value: unknown): value is ReconcileStrategy {
  return RECONCILE_STRATEGIES.some(strategy => strategy === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(section: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}.${key} must be a non-empty string`, { value });
  }
  return value;
}

function readNonNegativeInteger(section: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${where}.${key} must be a non-negative integer`, { value });
  }
  return value;
}

function readStringList(section: Record<string, unknown>, key: string, where: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ConfigError(`${where}.${key} must be a list of strings`, { value });
  }
  return value.map(item => String(item));
}

function readSection(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be a mapping`, { value });
  }
  return value;
}

function readStrategy(value: string | undefined, where: string): ReconcileStrategy | undefined {
  if (value === undefined) return undefined;
  if (!isReconcileStrategy(value)) {
    throw new ConfigError(`${where} must be one of ${RECONCILE_STRATEGIES.join(', ')}`, { value });
  }
  return value;
}

function resolveFrom(base: string, path: string): string {
  return isAbsolute(path) ? path : resolve(base, path);
}

/**
 * Validate a parsed config document and lay it over `base`.
 * Relative directories are taken relative to the project root.
 */
export function applyConfigDocument(base: DepcacheConfig, document: unknown, projectRoot: string): DepcacheConfig {
  if (document === undefined || document === null) {
    return base;
  }
  if (!isRecord(document)) {
    throw new ConfigError('Configuration must be a mapping at the top level');
  }

  const reconcileSection = readSection(document, 'reconcile');
  const overlaySection = readSection(document, 'overlay');
  const compilerSection = readSection(document, 'compiler');
  const evictionSection = readSection(document, 'eviction');

  const cacheDir = readString(document, 'cacheDir', 'config');
  const buildDir = readString(document, 'buildDir', 'config');
  const output = readString(document, 'output', 'config');

  return {
    toolchain: readString(document, 'toolchain', 'config') ?? base.toolchain,
    profile: readString(document, 'profile', 'config') ?? base.profile,
    cacheDir: cacheDir ? resolveFrom(projectRoot, cacheDir) : base.cacheDir,
    buildDir: buildDir ? resolveFrom(projectRoot, buildDir) : base.buildDir,
    output: output ? resolveFrom(projectRoot, output) : base.output,
    reconcile: {
      strategy:
        readStrategy(readString(reconcileSection, 'strategy', 'reconcile'), 'reconcile.strategy') ??
        base.reconcile.strategy,
      granularityMs:
        readNonNegativeInteger(reconcileSection, 'granularityMs', 'reconcile') ?? base.reconcile.granularityMs
    },
    overlay: {
      exclude: readStringList(overlaySection, 'exclude', 'overlay') ?? base.overlay.exclude
    },
    compiler: {
      command: readString(compilerSection, 'command', 'compiler') ?? base.compiler.command,
      args: readStringList(compilerSection, 'args', 'compiler') ?? base.compiler.args
    },
    eviction: {
      maxEntries: readNonNegativeInteger(evictionSection, 'maxEntries', 'eviction') ?? base.eviction.maxEntries,
      maxAgeDays: readNonNegativeInteger(evictionSection, 'maxAgeDays', 'eviction') ?? base.eviction.maxAgeDays
    }
  };
}

/**
 * Lay `DEPCACHE_*` environment variables over a config
 */
export function applyEnvironment(config: DepcacheConfig, env: NodeJS.ProcessEnv): DepcacheConfig {
  const cacheDir = env[ENV_VARS.CACHE_DIR];
  const buildDir = env[ENV_VARS.BUILD_DIR];
  const profile = env[ENV_VARS.PROFILE];
  const strategy = readStrategy(env[ENV_VARS.RECONCILE] || undefined, ENV_VARS.RECONCILE);

  return {
    ...config,
    cacheDir: cacheDir ? resolve(cacheDir) : config.cacheDir,
    buildDir: buildDir ? resolve(buildDir) : config.buildDir,
    profile: profile || config.profile,
    reconcile: {
      ...config.reconcile,
      strategy: strategy ?? config.reconcile.strategy
    }
  };
}

class ConfigManager {
  private config: DepcacheConfig | null = null;
  private configPath: string | null = null;

  constructor(
    private readonly projectRoot: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Find the project's config file, if it has one
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.projectRoot, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load and validate configuration; the result is memoized
   */
  async load(): Promise<DepcacheConfig> {
    if (this.config) {
      return this.config;
    }

    let config = createDefaultConfig(this.projectRoot);
    const configPath = await this.findConfigFile();

    if (configPath) {
      logger.debug(`Loading config from: ${configPath}`);
      const content = await readTextFile(configPath);
      let document: unknown;
      try {
        document = yaml.load(content);
      } catch (error) {
        throw new ConfigError(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`, {
          configPath
        });
      }
      config = applyConfigDocument(config, document, this.projectRoot);
      this.configPath = configPath;
    } else {
      logger.debug('Config file not found, using defaults');
    }

    this.config = applyEnvironment(config, this.env);
    return this.config;
  }

  /**
   * Path of the config file that was loaded, or null when defaults were used
   */
  getConfigFilePath(): string | null {
    return this.configPath;
  }
}

export async function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): Promise<DepcacheConfig> {
  return await new ConfigManager(projectRoot, env).load();
}

export { ConfigManager };
