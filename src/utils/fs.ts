/**
 * Small filesystem helpers shared by the store, registry, and artifact writer.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, basename } from 'node:path';
import { nanoid } from 'nanoid';

/** The `code` of a Node system error, e.g. "ENOENT". */
export function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/** Whether an error is a Node "no such file or directory" error. */
export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * Write a file so that readers see either the old or the new content, never a mix.
 * Content goes to a temp file in the same directory which is then renamed over the target.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.${basename(filePath)}.${nanoid(8)}.tmp`);
  await mkdir(dir, { recursive: true });
  try {
    await writeFile(tempPath, content);
    await rename(tempPath, filePath);
  } catch (error: unknown) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/** Read a UTF-8 file, returning undefined when it does not exist. */
export async function readFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}
