/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export const PACKAGE_NAME = '@cablecast/server';

/**
 * Reads the server version from package.json.
 */
export function getServerVersion(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  // "../package.json" from dist/, "../../package.json" from src/utils/
  const possiblePaths = [
    join(currentDir, '../package.json'),
    join(currentDir, '../../package.json'),
  ];

  for (const packageJsonPath of possiblePaths) {
    const version = readPackageVersion(packageJsonPath);
    if (version) {
      return version;
    }
  }
  return 'unknown';
}

/**
 * Version from a package.json, or null when the file is missing, unreadable,
 * not JSON or belongs to another package.
 */
export function readPackageVersion(packageJsonPath: string): string | null {
  try {
    const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf8')) as {
      version?: unknown;
      name?: unknown;
    };
    if (
      packageJson.name === PACKAGE_NAME &&
      typeof packageJson.version === 'string' &&
      packageJson.version.length > 0
    ) {
      return packageJson.version;
    }
    return null;
  } catch {
    // Try next path
    return null;
  }
}
