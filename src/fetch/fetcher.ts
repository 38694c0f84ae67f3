/**
 * Source fetcher: materializes a module tree from its origin into a local
 * directory. Every network step is bounded by the caller's timeout.
 */

import { execFile } from 'node:child_process';
import { cp, mkdir, readdir, stat, writeFile } from 'node:fs/promises';
import { join, relative, resolve, isAbsolute } from 'node:path';
import { promisify } from 'node:util';
import * as tar from 'tar';
import type { ModuleOrigin } from '../types/index.js';
import { FetchError, SkillportError, ValidationError } from '../errors.js';
import { createModuleLogger } from '../utils/logger.js';
import { isNotFound } from '../utils/fs.js';
import { withTimeout } from '../utils/timeout.js';
import { isRemoteLocator } from './locator.js';
import { MODULE_MANIFEST } from '../modules/store.js';

const fetchLogger = createModuleLogger('fetch');
const execFileAsync = promisify(execFile);

/** Clone a git repository into `destPath`, aborting when the signal fires. */
export type CloneFn = (repoUrl: string, destPath: string, signal: AbortSignal) => Promise<void>;

/** Download a URL to a file, aborting when the signal fires. */
export type DownloadFn = (url: string, destFile: string, signal: AbortSignal) => Promise<void>;

/** Contract the resolver and CLI use to fetch module trees. */
export interface SourceFetcher {
  /**
   * Fetch a module into `workDir`.
   * @returns The directory holding the module's manifest.
   * @throws {TimeoutError} When a network step exceeds the timeout.
   * @throws {FetchError} On any other fetch failure.
   */
  fetch(origin: ModuleOrigin, workDir: string): Promise<string>;
}

/** Options for {@link createSourceFetcher}, supporting dependency injection. */
export interface SourceFetcherOptions {
  timeoutMs: number;
  cloneFn?: CloneFn;
  downloadFn?: DownloadFn;
}

async function defaultClone(repoUrl: string, destPath: string, signal: AbortSignal): Promise<void> {
  await execFileAsync('git', ['clone', '--depth', '1', repoUrl, destPath], { signal });
}

async function defaultDownload(url: string, destFile: string, signal: AbortSignal): Promise<void> {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new FetchError(`Download of ${url} failed with HTTP ${response.status}`);
  }
  await writeFile(destFile, Buffer.from(await response.arrayBuffer()));
}

/**
 * When an archive unpacks to a single top-level directory without a manifest
 * at the root, the module lives inside that directory.
 */
async function archiveRoot(extractDir: string): Promise<string> {
  try {
    await stat(join(extractDir, MODULE_MANIFEST));
    return extractDir;
  } catch (error: unknown) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
  const entries = (await readdir(extractDir, { withFileTypes: true })).filter((entry) => !entry.name.startsWith('.'));
  if (entries.length === 1 && entries[0].isDirectory()) {
    return join(extractDir, entries[0].name);
  }
  return extractDir;
}

function applySubpath(root: string, subpath: string | undefined): string {
  if (!subpath) {
    return root;
  }
  const target = resolve(root, subpath);
  const fromRoot = relative(root, target);
  if (fromRoot.startsWith('..') || isAbsolute(fromRoot)) {
    throw new ValidationError(`Module subpath "${subpath}" points outside the fetched source`);
  }
  return target;
}

/** Create the default fetcher for git, tarball, and folder origins. */
export function createSourceFetcher(options: SourceFetcherOptions): SourceFetcher {
  const cloneFn = options.cloneFn ?? defaultClone;
  const downloadFn = options.downloadFn ?? defaultDownload;
  const { timeoutMs } = options;

  async function fetchTree(origin: ModuleOrigin, workDir: string): Promise<string> {
    switch (origin.kind) {
      case 'folder': {
        const dest = join(workDir, 'module');
        await cp(origin.locator, dest, {
          recursive: true,
          filter: (src) => !src.split(/[\\/]/).includes('.git'),
        });
        return dest;
      }
      case 'git': {
        const dest = join(workDir, 'repo');
        await withTimeout(`git clone ${origin.locator}`, timeoutMs, (signal) => cloneFn(origin.locator, dest, signal));
        return dest;
      }
      case 'tar': {
        const extractDir = join(workDir, 'archive');
        await mkdir(extractDir, { recursive: true });
        let archiveFile = origin.locator;
        if (isRemoteLocator(origin.locator)) {
          archiveFile = join(workDir, 'download.tar.gz');
          await withTimeout(`download ${origin.locator}`, timeoutMs, (signal) => downloadFn(origin.locator, archiveFile, signal));
        }
        await tar.x({ file: archiveFile, cwd: extractDir, strict: true });
        return archiveRoot(extractDir);
      }
    }
  }

  return {
    async fetch(origin: ModuleOrigin, workDir: string): Promise<string> {
      fetchLogger.info({ kind: origin.kind, locator: origin.locator }, 'Fetching module source');
      let root: string;
      try {
        root = await fetchTree(origin, workDir);
      } catch (error: unknown) {
        if (error instanceof SkillportError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new FetchError(`Failed to fetch ${origin.locator}: ${message}`);
      }
      return applySubpath(root, origin.subpath);
    },
  };
}
