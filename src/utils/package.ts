import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { isRecord } from './validation/guards.js';
import { logger } from './logger.js';

/**
 * Version of this package, read from package.json next to src/ or dist/
 */
export function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (isRecord(parsed) && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Could not read package.json', { path: packageJsonPath, error });
  }
  return '0.0.0';
}
