import { homedir } from 'os';
import { isAbsolute, relative, sep } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human-readable byte count, e.g. `1.5 MB`
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${BYTE_UNITS[unit]}` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function shortFingerprint(fingerprint: string): string {
  return fingerprint.substring(0, 12);
}

/**
 * Coarse "time ago" for cache listings
 */
export function formatAge(iso: string, now: number = Date.now()): string {
  const seconds = Math.max(0, Math.floor((now - Date.parse(iso)) / 1000));
  if (seconds < 60) return `${seconds}s ago`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 48) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}

/**
 * Format a file system path for display to the user.
 *
 * Paths under cwd are shown relative to it, paths under the home directory
 * with `~`, anything else as-is.
 *
 * @example
 * formatPathForDisplay('/work/app/dist/server', '/work/app') // => 'dist/server'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  const home = homedir();
  if (path === home) {
    return '~';
  }
  if (path.startsWith(home + sep)) {
    return `~${sep}${path.slice(home.length + 1)}`;
  }
  return path;
}
