/**
 * Artifact writer: applies adapter output to disk.
 *
 * Writes for one assistant go through an ArtifactTransaction, which keeps a
 * journal of what each write replaced. Rolling back deletes new paths and
 * restores replaced directories and files, so a failed install leaves the
 * assistant exactly as it was.
 */

import { mkdir, rename, rm, rmdir, writeFile } from 'node:fs/promises';
import { dirname, join, relative, isAbsolute } from 'node:path';
import { nanoid } from 'nanoid';
import type { ArtifactRecord } from '../types/index.js';
import { ArtifactIOError, SkillportError } from '../errors.js';
import { createModuleLogger } from '../utils/logger.js';
import { errorCode, isNotFound, readFileIfExists, writeFileAtomic } from '../utils/fs.js';
import { removeSection, upsertSection } from './managed-section.js';
import type { ArtifactOperation, DirectoryOperation } from './types.js';

const writerLogger = createModuleLogger('artifact-writer');

type JournalEntry =
  | { kind: 'created-dir'; path: string }
  | { kind: 'directory'; path: string; backup: string | undefined }
  | { kind: 'file'; path: string; previous: string | undefined };

/** Wrap a filesystem failure, letting skillport errors through unchanged. */
function toIOError(error: unknown, action: string, path: string): SkillportError {
  if (error instanceof SkillportError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ArtifactIOError(`Failed to ${action} ${path}: ${message}`, path);
}

/** Managed-section key of a record, undefined for whole-path artifacts. */
export function artifactSection(record: ArtifactRecord): string | undefined {
  return 'section' in record ? record.section : undefined;
}

function toRecord(operation: ArtifactOperation): ArtifactRecord {
  switch (operation.kind) {
    case 'section':
      return { skill: operation.skill, path: operation.path, section: operation.key };
    case 'directory':
      return { skill: operation.skill, path: operation.path };
    case 'file':
      return 'command' in operation
        ? { command: operation.command, path: operation.path }
        : { skill: operation.skill, path: operation.path };
  }
}

/** Collects artifact writes for one assistant so they can be committed or rolled back together. */
export class ArtifactTransaction {
  private readonly journal: JournalEntry[] = [];
  private readonly touched = new Set<string>();
  private readonly records: ArtifactRecord[] = [];
  private readonly created: string[] = [];

  /** Artifacts written so far, in write order. */
  get written(): readonly ArtifactRecord[] {
    return this.records;
  }

  /** Outermost directories this transaction had to create for its artifacts. */
  get createdDirs(): readonly string[] {
    return this.created;
  }

  /**
   * Apply one adapter operation.
   * @throws {ArtifactIOError} When the filesystem write fails.
   * @throws {ValidationError} When a shared file has malformed markers.
   */
  async apply(operation: ArtifactOperation): Promise<ArtifactRecord> {
    try {
      switch (operation.kind) {
        case 'directory':
          await this.writeDirectory(operation);
          break;
        case 'file':
          await this.ensureParent(operation.path);
          await this.snapshotFile(operation.path);
          await writeFileAtomic(operation.path, operation.content);
          break;
        case 'section': {
          await this.ensureParent(operation.path);
          const previous = await this.snapshotFile(operation.path);
          await writeFileAtomic(operation.path, upsertSection(previous, operation.key, operation.content));
          break;
        }
      }
    } catch (error: unknown) {
      throw toIOError(error, 'write', operation.path);
    }

    const record = toRecord(operation);
    this.records.push(record);
    writerLogger.debug({ record }, 'Artifact written');
    return record;
  }

  /** Drop the backups kept for rollback. */
  async commit(): Promise<void> {
    for (const entry of this.journal) {
      if (entry.kind === 'directory' && entry.backup) {
        await rm(entry.backup, { recursive: true, force: true });
      }
    }
    this.journal.length = 0;
  }

  /**
   * Undo every write in reverse order.
   * Keeps going past individual failures and reports them together at the end.
   */
  async rollback(): Promise<void> {
    const failures: string[] = [];

    for (const entry of [...this.journal].reverse()) {
      try {
        if (entry.kind === 'created-dir') {
          await rm(entry.path, { recursive: true, force: true });
        } else if (entry.kind === 'directory') {
          await rm(entry.path, { recursive: true, force: true });
          if (entry.backup) {
            await rename(entry.backup, entry.path);
          }
        } else if (entry.previous === undefined) {
          await rm(entry.path, { force: true });
        } else {
          await writeFileAtomic(entry.path, entry.previous);
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push(`${entry.path}: ${message}`);
      }
    }

    this.journal.length = 0;
    this.records.length = 0;
    this.created.length = 0;

    if (failures.length > 0) {
      writerLogger.error({ failures }, 'Rollback incomplete');
      throw new ArtifactIOError(`Rollback incomplete: ${failures.join('; ')}`, failures[0]);
    }
  }

  /** Create a file's parent directory, remembering the topmost directory this created. */
  private async ensureParent(path: string): Promise<void> {
    const created = await mkdir(dirname(path), { recursive: true });
    if (created !== undefined) {
      this.journal.push({ kind: 'created-dir', path: created });
      this.created.push(created);
    }
  }

  private async writeDirectory(operation: DirectoryOperation): Promise<void> {
    await this.ensureParent(operation.path);
    let backup: string | undefined;
    if (!this.touched.has(operation.path)) {
      const candidate = `${operation.path}.skillport-backup-${nanoid(8)}`;
      try {
        await rename(operation.path, candidate);
        backup = candidate;
      } catch (error: unknown) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
      this.touched.add(operation.path);
      this.journal.push({ kind: 'directory', path: operation.path, backup });
    } else {
      await rm(operation.path, { recursive: true, force: true });
    }

    await mkdir(operation.path, { recursive: true });
    for (const file of operation.files) {
      const target = join(operation.path, file.relativePath);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, file.content);
    }
  }

  /** Record a file's content before its first write in this transaction. */
  private async snapshotFile(path: string): Promise<string | undefined> {
    const current = await readFileIfExists(path);
    if (!this.touched.has(path)) {
      this.touched.add(path);
      this.journal.push({ kind: 'file', path, previous: current });
    }
    return current;
  }
}

/**
 * Delete one registered artifact. A path or block that is already gone is not an error.
 * @throws {ArtifactIOError} When the delete itself fails.
 * @throws {ValidationError} When the shared file's markers are malformed.
 */
export async function removeArtifact(record: ArtifactRecord): Promise<void> {
  try {
    const section = artifactSection(record);
    if (section === undefined) {
      await rm(record.path, { recursive: true, force: true });
      return;
    }

    const text = await readFileIfExists(record.path);
    if (text === undefined) {
      return;
    }
    const updated = removeSection(text, section);
    if (updated === undefined) {
      await rm(record.path, { force: true });
    } else if (updated !== text) {
      await writeFileAtomic(record.path, updated);
    }
  } catch (error: unknown) {
    throw toIOError(error, 'remove', record.path);
  }
}

function within(dir: string, ancestor: string): boolean {
  const fromAncestor = relative(ancestor, dir);
  return fromAncestor === '' || (!fromAncestor.startsWith('..') && !isAbsolute(fromAncestor));
}

/**
 * Remove directories left empty by an uninstall, walking up from a removed
 * artifact's parent. Only directories at or below one of `createdDirs` are
 * candidates, so directories that existed before the install are kept even
 * when they end up empty.
 */
export async function pruneEmptyParents(artifactPath: string, createdDirs: readonly string[]): Promise<void> {
  let dir = dirname(artifactPath);
  while (createdDirs.some((created) => within(dir, created))) {
    try {
      await rmdir(dir);
    } catch (error: unknown) {
      const code = errorCode(error);
      if (code === 'ENOTEMPTY' || code === 'EEXIST') {
        return;
      }
      if (code !== 'ENOENT') {
        throw toIOError(error, 'remove', dir);
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return;
    }
    dir = parent;
  }
}
