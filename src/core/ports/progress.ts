/**
 * Progress Port Interface
 *
 * Contract for streaming progress events from the build pipeline to any
 * frontend. The orchestrator emits typed events; the CLI renders them with
 * a spinner, CI logs them line by line, tests usually discard them.
 */

import type { BuildPhase, StoreStatus } from '../../types/index.js';

// ============================================================================
// Progress Event Types
// ============================================================================

/** Base event shape -- all events carry a type discriminant and timestamp. */
export interface ProgressEventBase {
  /** ISO 8601 timestamp of when the event was emitted. */
  timestamp: string;
}

/** Build pipeline progress events. */
export type BuildProgressEvent =
  | { type: 'build:start'; project: string; fingerprint: string }
  | { type: 'build:phase'; phase: BuildPhase; fingerprint: string; detail?: string }
  | { type: 'build:cache'; status: 'hit' | 'miss' | StoreStatus | 'conflict'; fingerprint: string }
  | { type: 'build:compile'; unit: 'dependencies' | 'application'; status: 'started' | 'finished' | 'failed' }
  | { type: 'build:complete'; success: boolean; binaryPath?: string; detail?: string };

/** Union of all progress event types. */
export type ProgressEvent = ProgressEventBase & BuildProgressEvent;

// ============================================================================
// Log Levels
// ============================================================================

export type ProgressLogLevel = 'debug' | 'info' | 'warn' | 'error';

// ============================================================================
// ProgressPort Interface
// ============================================================================

/**
 * ProgressPort defines all structured progress reporting operations.
 */
export interface ProgressPort {
  /**
   * Emit a typed progress event.
   * Events are fire-and-forget -- the pipeline does not wait for the UI.
   */
  emit(event: ProgressEvent): void;

  /**
   * Log an unstructured diagnostic message.
   */
  log(level: ProgressLogLevel, message: string): void;
}

/**
 * Stamp an event with the current time
 */
export function progressEvent(event: BuildProgressEvent): ProgressEvent {
  return { ...event, timestamp: new Date().toISOString() };
}
