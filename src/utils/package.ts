import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { logger } from './logger.js';

/**
 * Version of the installed depcache package, read from its package.json
 */
export function getVersion(): string {
  // Two levels up from both src/utils and dist/utils
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug(`Could not read ${packageJsonPath}`, { error });
  }
  return '0.0.0';
}
