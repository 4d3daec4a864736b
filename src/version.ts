/**
 * Centralized version management.
 *
 * All version references should import from this module rather than
 * hardcoding the version string.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { readFileSync } from 'fs';
import { z } from 'zod';

/** Kept in step with package.json */
const FALLBACK_VERSION = '0.4.0';

const packageJsonSchema = z.object({ version: z.string().min(1) });

/**
 * Get the package version.
 *
 * This reads from package.json at runtime, which works correctly
 * whether running in development or as an installed global package.
 */
function getPackageVersion(): string {
  // npm_package_version is set when run via npm scripts
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  try {
    // One level up from both src/ and dist/
    const packagePath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packagePath, 'utf-8')));
    return parsed.success ? parsed.data.version : FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}

/**
 * The current paritykit version.
 */
export const VERSION = getPackageVersion();

export const PACKAGE_NAME = 'paritykit';

/**
 * Identifies paritykit to process adapters (PARITYKIT_USER_AGENT).
 */
export const USER_AGENT = `paritykit/${VERSION}`;
