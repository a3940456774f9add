import { statSync } from 'node:fs';
import { dirname as pathDirname, isAbsolute, resolve } from 'node:path';

// ============================================================================
// Path Utilities
// ============================================================================

export function dirname(p: string): string {
  return pathDirname(p);
}

/**
 * Resolve a user-supplied path against `cwd` unless it is already absolute.
 */
export function resolveFrom(cwd: string, p: string): string {
  return isAbsolute(p) ? p : resolve(cwd, p);
}

export function isFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    return false;
  }
}
