/**
 * Installer: runs RESOLVE → LOAD → CONVERT → COMMIT for one module and a
 * set of assistants, and the inverse for uninstall.
 *
 * Request validation, resolution and loading are terminal and write nothing.
 * Each assistant then converts inside its own ArtifactTransaction, so a
 * failure rolls that assistant back while the others still complete. The
 * registry is written last: a crash in between leaves artifacts without a
 * record, which a re-run overwrites.
 */

import { stat } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import type {
  ArtifactRecord,
  AssistantId,
  Installation,
  InstallationKey,
  Module,
  ModuleCommand,
  Scope,
  Skill,
} from '../types/index.js';
import {
  ConversionError,
  ModuleNotFoundError,
  RegistryWriteError,
  SkillportError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import {
  ASSISTANTS,
  ArtifactTransaction,
  adaptCommand,
  artifactSection,
  artifactKey,
  commandKey,
  getAdapter,
  pruneEmptyParents,
  removeArtifact,
  supportsScope,
  type AdapterContext,
  type ArtifactOperation,
} from '../adapters/index.js';
import type { ModuleStore } from '../modules/store.js';
import type { InstallationRegistry } from '../registry/installation-registry.js';
import type { CandidateSelector, ModuleResolver } from '../resolver/resolver.js';
import { isNotFound } from '../utils/fs.js';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('installer');

/** Result of one assistant in an install, update, or uninstall. */
export type OutcomeStatus = 'installed' | 'removed' | 'skipped' | 'failed' | 'stale';

export interface AssistantOutcome {
  module: string;
  assistant: AssistantId;
  scope: Scope;
  projectPath: string | null;
  status: OutcomeStatus;
  /** Artifacts present on disk for this assistant after the operation. */
  artifacts: ArtifactRecord[];
  /** Why the assistant was skipped, marked stale, or only partly installed. */
  reason?: string;
  error?: SkillportError;
}

export interface InstallReport {
  module: string;
  version: string;
  outcomes: AssistantOutcome[];
}

export interface InstallRequest {
  module: string;
  assistants: readonly AssistantId[];
  scope: Scope;
  /** Required for project scope, absent for user scope. */
  projectPath?: string | null;
  /** Restrict marketplace resolution to one marketplace. */
  marketplace?: string;
  select?: CandidateSelector;
}

export interface UninstallRequest {
  module: string;
  assistant?: AssistantId;
  scope?: Scope;
  projectPath?: string | null;
}

export interface UpdateRequest {
  module?: string;
  assistant?: AssistantId;
}

export interface InstallerDeps {
  store: ModuleStore;
  registry: InstallationRegistry;
  resolver: ModuleResolver;
  /** Home directory used as the root of user-scope installs. */
  userHome: string;
  now?: () => Date;
}

function toSkillportError(error: unknown): SkillportError {
  return error instanceof SkillportError ? error : new SkillportError(errorMessage(error), 'INSTALL_FAILED');
}

function sameArtifact(a: ArtifactRecord, b: ArtifactRecord): boolean {
  return a.path === b.path && artifactSection(a) === artifactSection(b);
}

/** Key used in errors about an operation. */
function operationKey(operation: ArtifactOperation, moduleName: string): string {
  if ('command' in operation) {
    return commandKey(moduleName, operation.command);
  }
  return artifactKey(moduleName, operation.skill);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

interface StoredModule {
  module: Module;
  skills: Skill[];
  commands: ModuleCommand[];
}

export class Installer {
  private readonly store: ModuleStore;
  private readonly registry: InstallationRegistry;
  private readonly resolver: ModuleResolver;
  private readonly userHome: string;
  private readonly now: () => Date;

  constructor(deps: InstallerDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.resolver = deps.resolver;
    this.userHome = deps.userHome;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Install a module into each requested assistant.
   * @returns One outcome per requested assistant, in request order.
   * @throws {ValidationError} On a malformed request or module.
   * @throws {ModuleNotFoundError} When the module cannot be resolved.
   * @throws {AmbiguousModuleError} When several marketplaces offer it.
   */
  async install(request: InstallRequest): Promise<InstallReport> {
    const assistants = [...new Set(request.assistants)];
    if (assistants.length === 0) {
      throw new ValidationError('At least one assistant is required');
    }
    const projectPath = await this.validateTarget(request.scope, request.projectPath ?? null);

    const module = await this.resolver.resolve(request.module, {
      select: request.select,
      marketplace: request.marketplace,
    });
    const skills = await this.store.loadSkills(module);
    const commands = await this.store.loadCommands(module);
    if (skills.length === 0 && commands.length === 0) {
      throw new ValidationError(`Module "${module.name}" declares no skills or commands`);
    }

    const outcomes: AssistantOutcome[] = [];
    for (const assistant of assistants) {
      const key: InstallationKey = { module: module.name, assistant, scope: request.scope, projectPath };
      outcomes.push(await this.installInto(module, skills, commands, key));
    }
    return { module: module.name, version: module.version, outcomes };
  }

  /**
   * The installations {@link uninstall} would remove for a request, with a
   * relative project path resolved the same way.
   */
  async uninstallMatches(request: UninstallRequest): Promise<Installation[]> {
    const projectPath = request.projectPath ? resolvePath(request.projectPath) : request.projectPath;
    return this.registry.list({
      module: request.module,
      assistant: request.assistant,
      scope: request.scope,
      projectPath,
    });
  }

  /**
   * Remove every installation of a module matching the request.
   * Artifacts already gone are fine. When a delete fails the registry entry
   * is kept so the command can be retried.
   */
  async uninstall(request: UninstallRequest): Promise<AssistantOutcome[]> {
    const matches = await this.uninstallMatches(request);

    const outcomes: AssistantOutcome[] = [];
    for (const installation of matches) {
      outcomes.push(await this.uninstallOne(installation));
    }
    return outcomes;
  }

  /**
   * Re-install every matching installation from the current store content.
   * Installations whose project directory is gone are reported as stale and
   * kept.
   */
  async update(request: UpdateRequest = {}): Promise<AssistantOutcome[]> {
    const installations = await this.registry.list({ module: request.module, assistant: request.assistant });

    const outcomes: AssistantOutcome[] = [];
    for (const installation of installations) {
      const key: InstallationKey = {
        module: installation.module,
        assistant: installation.assistant,
        scope: installation.scope,
        projectPath: installation.projectPath,
      };

      if (installation.projectPath !== null && !(await isDirectory(installation.projectPath))) {
        outcomes.push({
          ...key,
          status: 'stale',
          artifacts: installation.artifacts,
          reason: `Project path ${installation.projectPath} no longer exists; uninstall to drop the record`,
        });
        continue;
      }

      let loaded: StoredModule;
      try {
        loaded = await this.loadStored(installation.module);
      } catch (error: unknown) {
        outcomes.push({ ...key, status: 'failed', artifacts: installation.artifacts, error: toSkillportError(error) });
        continue;
      }

      outcomes.push(await this.installInto(loaded.module, loaded.skills, loaded.commands, key));
    }
    return outcomes;
  }

  private async loadStored(name: string): Promise<StoredModule> {
    const module = await this.store.get(name);
    if (!module) {
      throw new ModuleNotFoundError(name);
    }
    return { module, skills: await this.store.loadSkills(module), commands: await this.store.loadCommands(module) };
  }

  /** Check scope against project path; returns the absolute project path or null. */
  private async validateTarget(scope: Scope, projectPath: string | null): Promise<string | null> {
    if (scope === 'user') {
      if (projectPath) {
        throw new ValidationError('User scope does not take a project path');
      }
      return null;
    }
    if (!projectPath) {
      throw new ValidationError('Project scope requires a project path');
    }
    const absolute = resolvePath(projectPath);
    if (!(await isDirectory(absolute))) {
      throw new ValidationError(`Project path ${absolute} does not exist or is not a directory`);
    }
    return absolute;
  }

  /**
   * Paths owned by other modules' installations for the same assistant and
   * location, mapped to the owning module. Shared files holding managed
   * sections are left out: several modules write blocks into them.
   */
  private async claimedPaths(key: InstallationKey): Promise<Map<string, string>> {
    const claimed = new Map<string, string>();
    const neighbours = await this.registry.list({ assistant: key.assistant, scope: key.scope, projectPath: key.projectPath });
    for (const installation of neighbours) {
      if (installation.module === key.module) {
        continue;
      }
      for (const artifact of installation.artifacts) {
        if (artifactSection(artifact) === undefined) {
          claimed.set(artifact.path, installation.module);
        }
      }
    }
    return claimed;
  }

  private async installInto(
    module: Module,
    skills: readonly Skill[],
    commands: readonly ModuleCommand[],
    key: InstallationKey,
  ): Promise<AssistantOutcome> {
    const { assistant, scope } = key;
    const skillsSupported = supportsScope(assistant, scope);
    const unsupported = `${ASSISTANTS[assistant].displayName} does not support ${scope} scope`;
    const installableSkills = skillsSupported ? skills : [];
    if (installableSkills.length === 0 && commands.length === 0) {
      log.info({ module: module.name, assistant, scope }, 'Assistant skipped');
      return { ...key, status: 'skipped', artifacts: [], reason: unsupported };
    }

    const adapter = getAdapter(assistant);
    const context: AdapterContext = {
      assistant,
      scope,
      projectPath: key.projectPath,
      module: module.name,
      userHome: this.userHome,
    };
    const previous = await this.registry.find(key);

    const transaction = new ArtifactTransaction();
    try {
      const operations: ArtifactOperation[] = [
        ...installableSkills.flatMap((skill) => adapter.adapt(skill, context)),
        ...commands.map((command) => adaptCommand(command, context)),
      ];
      const claimed = await this.claimedPaths(key);
      for (const operation of operations) {
        const owner = operation.kind === 'section' ? undefined : claimed.get(operation.path);
        if (owner !== undefined) {
          throw new ConversionError(`${operation.path} is already installed by module "${owner}"`, operationKey(operation, module.name));
        }
      }
      for (const operation of operations) {
        await transaction.apply(operation);
      }
      await transaction.commit();
    } catch (error: unknown) {
      const failure = toSkillportError(error);
      log.warn({ module: module.name, assistant, err: failure.message }, 'Conversion failed, rolling back');
      try {
        await transaction.rollback();
      } catch (rollbackError: unknown) {
        log.error({ module: module.name, assistant, err: errorMessage(rollbackError) }, 'Rollback failed');
        return { ...key, status: 'failed', artifacts: [], error: toSkillportError(rollbackError) };
      }
      return { ...key, status: 'failed', artifacts: [], error: failure };
    }

    const artifacts = [...transaction.written];
    const createdDirs = [...new Set([...(previous?.createdDirs ?? []), ...transaction.createdDirs])];
    if (previous) {
      const stale = previous.artifacts.filter((old) => !artifacts.some((current) => sameArtifact(current, old)));
      await this.removeStale(stale, createdDirs);
    }

    const installation: Installation = {
      ...key,
      version: module.version,
      skills: installableSkills.map((skill) => skill.name),
      commands: commands.map((command) => command.name),
      artifacts,
      createdDirs,
      installedAt: this.now().toISOString(),
    };
    try {
      await this.registry.record(installation);
    } catch (error: unknown) {
      log.error({ module: module.name, assistant, err: errorMessage(error) }, 'Registry write failed after artifacts were written');
      return {
        ...key,
        status: 'failed',
        artifacts,
        error: new RegistryWriteError(module.name, ASSISTANTS[assistant].displayName, errorMessage(error)),
      };
    }

    log.info({ module: module.name, assistant, scope, artifacts: artifacts.length }, 'Module installed');
    if (!skillsSupported && skills.length > 0) {
      return { ...key, status: 'installed', artifacts, reason: `${unsupported} for skills; installed commands only` };
    }
    return { ...key, status: 'installed', artifacts };
  }

  /** Delete artifacts a previous install produced that the new one no longer does. */
  private async removeStale(stale: readonly ArtifactRecord[], createdDirs: readonly string[]): Promise<void> {
    for (const artifact of stale) {
      try {
        await removeArtifact(artifact);
        await pruneEmptyParents(artifact.path, createdDirs);
      } catch (error: unknown) {
        log.warn({ path: artifact.path, err: errorMessage(error) }, 'Could not remove stale artifact');
      }
    }
  }

  private async uninstallOne(installation: Installation): Promise<AssistantOutcome> {
    const key: InstallationKey = {
      module: installation.module,
      assistant: installation.assistant,
      scope: installation.scope,
      projectPath: installation.projectPath,
    };
    try {
      for (const artifact of installation.artifacts) {
        await removeArtifact(artifact);
        await pruneEmptyParents(artifact.path, installation.createdDirs);
      }
      const removed = await this.registry.remove(key);
      log.info({ module: key.module, assistant: key.assistant, artifacts: removed.length }, 'Module uninstalled');
      return { ...key, status: 'removed', artifacts: removed };
    } catch (error: unknown) {
      return { ...key, status: 'failed', artifacts: installation.artifacts, error: toSkillportError(error) };
    }
  }
}
