import { DepcacheError, ErrorCodes, CommandResult, BuildPhase } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failure modes of a dependency-isolated build
 */

export class MalformedManifestError extends DepcacheError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Malformed manifest: ${reason}`, ErrorCodes.MALFORMED_MANIFEST, details);
    this.name = 'MalformedManifestError';
  }
}

interface CompileFailureDetails {
  fingerprint: string;
  diagnostic: string;
  exitCode?: number | null;
}

export class DependencyCompileError extends DepcacheError {
  constructor(details: CompileFailureDetails) {
    super(
      `Dependency compilation failed for ${details.fingerprint.substring(0, 12)}:\n${details.diagnostic}`,
      ErrorCodes.DEPENDENCY_COMPILE_ERROR,
      { phase: 'INIT' satisfies BuildPhase, ...details }
    );
    this.name = 'DependencyCompileError';
  }
}

export class ApplicationCompileError extends DepcacheError {
  constructor(details: CompileFailureDetails) {
    super(
      `Application compilation failed:\n${details.diagnostic}`,
      ErrorCodes.APPLICATION_COMPILE_ERROR,
      { phase: 'SOURCE_OVERLAID' satisfies BuildPhase, ...details }
    );
    this.name = 'ApplicationCompileError';
  }
}

export class ReconciliationFailedError extends DepcacheError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Staleness reconciliation failed: ${reason}`, ErrorCodes.RECONCILIATION_FAILED, details);
    this.name = 'ReconciliationFailedError';
  }
}

export class CacheStoreConflictError extends DepcacheError {
  constructor(fingerprint: string, attempts: number) {
    super(
      `Could not commit cache entry ${fingerprint.substring(0, 12)} after ${attempts} attempts`,
      ErrorCodes.CACHE_STORE_CONFLICT,
      { fingerprint, attempts }
    );
    this.name = 'CacheStoreConflictError';
  }
}

export class CacheEntryUnavailableError extends DepcacheError {
  constructor(fingerprint: string, reason: string, details?: Record<string, unknown>) {
    super(
      `Cache entry ${fingerprint.substring(0, 12)} could not be restored: ${reason}`,
      ErrorCodes.CACHE_ENTRY_UNAVAILABLE,
      { fingerprint, ...details }
    );
    this.name = 'CacheEntryUnavailableError';
  }
}

export class FingerprintCollisionError extends DepcacheError {
  constructor(fingerprint: string) {
    super(
      `Fingerprint ${fingerprint} already identifies a different resolved lock; refusing to overwrite the cache entry`,
      ErrorCodes.FINGERPRINT_COLLISION,
      { fingerprint }
    );
    this.name = 'FingerprintCollisionError';
  }
}

export class FileSystemError extends DepcacheError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends DepcacheError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends DepcacheError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Read the errno-style code off an unknown thrown value
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DepcacheError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Text printed for a failed command: the message, then where a build stopped and which dependency set it used
 */
export function formatErrorForCli(error: unknown): string {
  const message = handleError(error).error ?? 'An unknown error occurred';
  if (!(error instanceof DepcacheError) || !error.details) {
    return message;
  }

  const context: string[] = [];
  const { phase, fingerprint } = error.details;
  if (typeof phase === 'string') {
    context.push(`phase: ${phase}`);
  }
  if (typeof fingerprint === 'string') {
    context.push(`dependencies: ${fingerprint.substring(0, 12)}`);
  }
  return context.length > 0 ? `${message}\n  ${context.join(', ')}` : message;
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      console.error(formatErrorForCli(error));
      process.exit(1);
    }
  };
}
