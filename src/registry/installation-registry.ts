/**
 * Installation registry: the durable record of what skillport wrote to disk.
 *
 * One YAML document holds every installation in order. Each mutation rewrites
 * the whole document through a temp file and a rename, so a crash leaves
 * either the old or the new registry, never a partial one. The registry only
 * does bookkeeping: it never touches artifact files.
 */

import type { ArtifactRecord, Installation, InstallationKey } from '../types/index.js';
import { PersistenceError } from '../errors.js';
import { formatIssues } from '../modules/schema.js';
import { createModuleLogger } from '../utils/logger.js';
import { readFileIfExists, writeFileAtomic } from '../utils/fs.js';
import { parseYaml, stringifyYaml } from '../utils/yaml.js';
import { RegistryDocumentSchema } from './schema.js';

const registryLogger = createModuleLogger('registry');

/** Optional criteria for {@link InstallationRegistry.list}; unset fields match anything. */
export type InstallationFilter = Partial<InstallationKey>;

/** Whether two installations share the identity tuple. */
export function sameInstallation(a: InstallationKey, b: InstallationKey): boolean {
  return a.module === b.module
    && a.assistant === b.assistant
    && a.scope === b.scope
    && a.projectPath === b.projectPath;
}

function matchesFilter(installation: Installation, filter: InstallationFilter): boolean {
  return (filter.module === undefined || installation.module === filter.module)
    && (filter.assistant === undefined || installation.assistant === filter.assistant)
    && (filter.scope === undefined || installation.scope === filter.scope)
    && (filter.projectPath === undefined || installation.projectPath === filter.projectPath);
}

export class InstallationRegistry {
  private installations: Installation[] | undefined;

  constructor(private readonly filePath: string) {}

  /** Every installation, in registry order. */
  async all(): Promise<Installation[]> {
    return [...await this.load()];
  }

  /** Installations matching every field set in the filter. */
  async list(filter: InstallationFilter = {}): Promise<Installation[]> {
    return (await this.load()).filter((installation) => matchesFilter(installation, filter));
  }

  /** The installation for an identity tuple, or undefined. */
  async find(key: InstallationKey): Promise<Installation | undefined> {
    return (await this.load()).find((installation) => sameInstallation(installation, key));
  }

  /**
   * Insert an installation or replace the one with the same identity tuple
   * in place.
   * @throws {PersistenceError} If the document cannot be written.
   */
  async record(installation: Installation): Promise<void> {
    const current = await this.load();
    const index = current.findIndex((existing) => sameInstallation(existing, installation));
    const next = [...current];
    if (index >= 0) {
      next[index] = installation;
    } else {
      next.push(installation);
    }
    await this.save(next);
    registryLogger.info(
      { module: installation.module, assistant: installation.assistant, scope: installation.scope, replaced: index >= 0 },
      'Installation recorded',
    );
  }

  /**
   * Remove an installation.
   * @returns The artifacts it had registered (empty when there was none), so
   *   the caller can delete them.
   * @throws {PersistenceError} If the document cannot be written.
   */
  async remove(key: InstallationKey): Promise<ArtifactRecord[]> {
    const current = await this.load();
    const existing = current.find((installation) => sameInstallation(installation, key));
    if (!existing) {
      return [];
    }
    await this.save(current.filter((installation) => installation !== existing));
    registryLogger.info({ module: key.module, assistant: key.assistant, scope: key.scope }, 'Installation removed');
    return existing.artifacts;
  }

  private async load(): Promise<Installation[]> {
    if (this.installations) {
      return this.installations;
    }

    let raw: string | undefined;
    try {
      raw = await readFileIfExists(this.filePath);
    } catch (error: unknown) {
      throw new PersistenceError(`Failed to read installation registry ${this.filePath}: ${String(error)}`);
    }
    if (raw === undefined) {
      this.installations = [];
      return this.installations;
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`Installation registry ${this.filePath} is not valid YAML: ${message}`);
    }

    const result = RegistryDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`Installation registry ${this.filePath} is invalid: ${formatIssues(result.error)}`);
    }
    this.installations = result.data.installations;
    return this.installations;
  }

  private async save(installations: Installation[]): Promise<void> {
    const document = { version: 1, installations };
    try {
      await writeFileAtomic(this.filePath, stringifyYaml(document));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`Failed to write installation registry ${this.filePath}: ${message}`);
    }
    this.installations = installations;
  }
}
