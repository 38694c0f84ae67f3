/**
 * Filesystem snapshots for round-trip assertions.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';

/**
 * Map of every file and directory under `root` to its content; directories
 * map to null. Paths are relative and use forward slashes.
 */
export async function snapshotTree(root: string): Promise<Record<string, string | null>> {
  const snapshot: Record<string, string | null> = {};

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      const key = relative(root, fullPath).split(sep).join('/');
      if (entry.isDirectory()) {
        snapshot[key] = null;
        await walk(fullPath);
      } else {
        snapshot[key] = await readFile(fullPath, 'utf-8');
      }
    }
  }

  await walk(root);
  return snapshot;
}
