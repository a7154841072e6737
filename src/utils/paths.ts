/**
 * symdoc - Path Utilities
 * @module utils/paths
 */

import { statSync } from 'node:fs';
import { basename } from 'node:path';

/**
 * Include fragments such as `_fileapi-shared.md` are not standalone pages
 */
export function isIncludeFragment(filePath: string): boolean {
  return basename(filePath).startsWith('_');
}

export function isDirectory(dirPath: string): boolean {
  try {
    return statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}
