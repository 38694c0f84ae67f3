/**
 * Parse user-supplied module sources into origin descriptors.
 *
 * Accepted forms:
 *   https://host/org/repo.git, git@host:org/repo.git, git://host/repo   -> git
 *   https://host/archive.tar.gz, ./module.tgz, /tmp/module.tar          -> tar
 *   anything else                                                       -> local folder
 */

import { resolve } from 'node:path';
import type { ModuleOrigin, SourceKind } from '../types/index.js';
import { ValidationError } from '../errors.js';

const TAR_PATTERN = /\.(tar\.gz|tgz|tar)$/i;
const URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/** Whether a locator is a remote URL rather than a local path. */
export function isRemoteLocator(locator: string): boolean {
  return URL_PATTERN.test(locator) || locator.startsWith('git@');
}

/** Classify a locator string. */
export function detectSourceKind(locator: string): SourceKind {
  const withoutQuery = locator.split(/[?#]/)[0];
  if (TAR_PATTERN.test(withoutQuery)) {
    return 'tar';
  }
  if (isRemoteLocator(locator)) {
    return 'git';
  }
  return 'folder';
}

/**
 * Build an origin from a source string.
 * Local paths are resolved against `cwd`.
 * @throws {ValidationError} On an empty source.
 */
export function parseSourceLocator(source: string, cwd: string = process.cwd(), subpath?: string): ModuleOrigin {
  const trimmed = source.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Module source cannot be empty');
  }

  const kind = detectSourceKind(trimmed);
  const locator = isRemoteLocator(trimmed) ? trimmed : resolve(cwd, trimmed);
  return subpath ? { kind, locator, subpath } : { kind, locator };
}
