import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { debugLog } from '../utils/debug.js';

/**
 * Version from the package.json two levels up, which holds for both
 * src/lib (tests) and dist/lib (installed binary).
 */
export function getRuntimePackageVersion(): string {
  try {
    const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    debugLog('version', 'Could not read package.json', err);
  }
  return 'unknown';
}
