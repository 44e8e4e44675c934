/**
 * Console Progress Adapter (Default/CI)
 *
 * Plain console-based implementation of ProgressPort. Used when no
 * interactive terminal is available.
 */

import type { ProgressPort, ProgressEvent, ProgressLogLevel } from './progress.js';

function short(fingerprint: string): string {
  return fingerprint.substring(0, 12);
}

/**
 * Console-based progress adapter.
 * Logs events as concise single-line messages to stdout/stderr.
 */
export const consoleProgress: ProgressPort = {
  emit(event: ProgressEvent): void {
    switch (event.type) {
      case 'build:start':
        console.log(`[progress] Building ${event.project} (${short(event.fingerprint)})`);
        break;
      case 'build:phase':
        console.log(`[progress] ${event.phase}${event.detail ? `: ${event.detail}` : ''}`);
        break;
      case 'build:cache':
        console.log(`[progress] Dependency cache ${event.status} for ${short(event.fingerprint)}`);
        break;
      case 'build:compile':
        if (event.status !== 'started') {
          console.log(`[progress] Compile ${event.unit}: ${event.status}`);
        }
        break;
      case 'build:complete':
        console.log(`[progress] Build ${event.success ? 'completed' : 'failed'}${event.detail ? `: ${event.detail}` : ''}`);
        break;
    }
  },

  log(level: ProgressLogLevel, message: string): void {
    switch (level) {
      case 'debug':
        // Silent in default console mode; only visible with verbose flag
        break;
      case 'info':
        console.log(`[info] ${message}`);
        break;
      case 'warn':
        console.warn(`[warn] ${message}`);
        break;
      case 'error':
        console.error(`[error] ${message}`);
        break;
    }
  },
};

/**
 * Silent progress adapter. Discards all events.
 */
export const silentProgress: ProgressPort = {
  emit(_event: ProgressEvent): void {
    // No-op
  },
  log(_level: ProgressLogLevel, _message: string): void {
    // No-op
  },
};
