/**
 * Spinner Progress Adapter
 *
 * ProgressPort for interactive terminals: one ora spinner that follows the
 * build through its phases and settles on the final result.
 */

import pico from 'picocolors';

import type { BuildPhase } from '../types/index.js';
import type { ProgressEvent, ProgressLogLevel, ProgressPort } from '../core/ports/progress.js';
import { Spinner } from '../utils/spinner.js';
import { formatPathForDisplay, shortFingerprint } from '../utils/formatters.js';

const PHASE_LABELS: Partial<Record<BuildPhase, string>> = {
  STUB_COMPILED: 'Dependencies ready',
  SOURCE_OVERLAID: 'Sources overlaid',
  FINAL_COMPILED: 'Application compiled',
  DONE: 'Binary written'
};

export function createSpinnerProgress(): ProgressPort {
  const spinner = new Spinner();

  const pause = (write: () => void): void => {
    const spinning = spinner.isSpinning;
    if (spinning) spinner.stop();
    write();
    if (spinning) spinner.start();
  };

  return {
    emit(event: ProgressEvent): void {
      switch (event.type) {
        case 'build:start':
          spinner.update(`Building ${pico.bold(event.project)} ${pico.dim(shortFingerprint(event.fingerprint))}`);
          spinner.start();
          break;
        case 'build:cache':
          if (event.status === 'hit') {
            spinner.update('Restoring cached dependencies');
          } else if (event.status === 'miss') {
            spinner.update('Dependency cache miss');
          } else if (event.status === 'conflict') {
            pause(() => console.warn(pico.yellow('Cache entry could not be committed; continuing without it')));
          }
          break;
        case 'build:compile':
          if (event.status === 'started') {
            spinner.update(`Compiling ${event.unit}`);
          }
          break;
        case 'build:phase': {
          const label = PHASE_LABELS[event.phase];
          if (label) {
            spinner.update(event.detail ? `${label} ${pico.dim(`(${event.detail})`)}` : label);
          }
          break;
        }
        case 'build:complete':
          if (event.success) {
            spinner.succeed(`Built ${event.binaryPath ? formatPathForDisplay(event.binaryPath) : 'binary'}`);
          } else {
            spinner.fail('Build failed');
          }
          break;
      }
    },

    log(level: ProgressLogLevel, message: string): void {
      if (level === 'debug') return;
      pause(() => {
        if (level === 'error') console.error(pico.red(message));
        else if (level === 'warn') console.warn(pico.yellow(message));
        else console.log(message);
      });
    }
  };
}
