/**
 * Canonical file paths
 *
 * Dependency graph entries hold realpath-resolved files, so every path
 * entering the index goes through the same resolution. A workspace opened
 * through a symlink then maps to the same keys as the graph.
 */

import { realpathSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';

/**
 * Resolve symlinks in `path`
 *
 * A file that does not exist yet (an unsaved editor buffer) keeps its name
 * under the canonical parent directory; when the parent is missing too the
 * absolute path is returned as is.
 */
export function canonicalPath(path: string): string {
  const absolute = resolve(path);
  try {
    return realpathSync.native(absolute);
  } catch {
    try {
      return join(realpathSync.native(dirname(absolute)), basename(absolute));
    } catch {
      return absolute;
    }
  }
}
