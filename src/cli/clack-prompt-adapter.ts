/**
 * Clack Prompt Adapter
 *
 * Interactive confirmation for destructive commands, routed through @clack/prompts.
 */

import * as clack from '@clack/prompts';

import { UserCancellationError, ValidationError } from '../utils/errors.js';
import { detectInteractive } from './context.js';

/**
 * Ask before doing something destructive. `assumeYes` skips the question;
 * outside a terminal the caller must pass it.
 */
export async function confirmAction(message: string, assumeYes: boolean = false): Promise<boolean> {
  if (assumeYes) {
    return true;
  }
  if (!detectInteractive()) {
    throw new ValidationError('Refusing to prompt in a non-interactive session; pass --yes to proceed');
  }

  const result = await clack.confirm({ message, initialValue: false });
  if (clack.isCancel(result)) {
    clack.cancel('Operation cancelled.');
    throw new UserCancellationError('Operation cancelled by user');
  }
  return result;
}
