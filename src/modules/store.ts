/**
 * Module store: the on-disk collection of registered modules.
 *
 * Layout: `<modulesDir>/<name>/module.yml`, one subdirectory per skill, a
 * `commands/` directory with one markdown file per command, and a
 * `.skillport-origin.yml` sidecar recording where the module came from.
 * Content is copied exactly as fetched and never rewritten.
 */

import { cp, mkdir, readdir, readFile, rename, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import type { Module, ModuleCommand, ModuleOrigin, Skill } from '../types/index.js';
import { PersistenceError, ValidationError } from '../errors.js';
import { createModuleLogger } from '../utils/logger.js';
import { isNotFound, writeFileAtomic } from '../utils/fs.js';
import { parseYaml, stringifyYaml } from '../utils/yaml.js';
import { ModuleManifestSchema, ModuleOriginSchema, formatIssues, isValidName, type ModuleManifest } from './schema.js';
import { loadCommand } from './command-loader.js';
import { loadSkill } from './skill-loader.js';

const storeLogger = createModuleLogger('module-store');

/** Manifest filename at the root of every module. */
export const MODULE_MANIFEST = 'module.yml';

/** Sidecar written by the store next to the manifest. */
export const ORIGIN_FILE = '.skillport-origin.yml';

/**
 * Read and validate the manifest at the root of a module tree.
 * @throws {ValidationError} If the manifest is missing or invalid.
 */
export async function readManifest(moduleDir: string): Promise<ModuleManifest> {
  const manifestPath = join(moduleDir, MODULE_MANIFEST);
  let parsed: unknown;
  try {
    parsed = parseYaml(await readFile(manifestPath, 'utf-8'));
  } catch (error: unknown) {
    if (isNotFound(error)) {
      throw new ValidationError(`No ${MODULE_MANIFEST} found in ${moduleDir}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid ${MODULE_MANIFEST} in ${moduleDir}: ${message}`);
  }

  const result = ModuleManifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(`Invalid module manifest in ${moduleDir}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Filesystem-backed module store keyed by module name. */
export class ModuleStore {
  constructor(private readonly modulesDir: string) {}

  /** Directory a module with this name lives in. */
  modulePath(name: string): string {
    return join(this.modulesDir, name);
  }

  /**
   * Look up a module by name.
   * @returns The module, or undefined when no module with that name is stored.
   * @throws {ValidationError} If the stored module's manifest is invalid.
   */
  async get(name: string): Promise<Module | undefined> {
    if (!isValidName(name)) {
      return undefined;
    }
    const directory = this.modulePath(name);
    try {
      if (!(await stat(directory)).isDirectory()) {
        return undefined;
      }
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }

    const manifest = await readManifest(directory);
    if (manifest.name !== name) {
      throw new ValidationError(`Module directory "${name}" holds a manifest named "${manifest.name}"`);
    }

    return {
      name: manifest.name,
      version: manifest.version,
      description: manifest.description,
      skills: manifest.skills,
      commands: manifest.commands,
      origin: await this.readOrigin(directory),
      directory,
    };
  }

  /** Whether a module with this name is stored. */
  async has(name: string): Promise<boolean> {
    return (await this.get(name)) !== undefined;
  }

  /**
   * List every stored module, sorted by name.
   * Directories with an invalid manifest are skipped with a warning.
   */
  async list(): Promise<Module[]> {
    let entries: string[];
    try {
      entries = await readdir(this.modulesDir);
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const modules: Module[] = [];
    for (const entry of entries.sort()) {
      if (entry.startsWith('.')) {
        continue;
      }
      try {
        const module = await this.get(entry);
        if (module) {
          modules.push(module);
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        storeLogger.warn({ entry, error: message }, 'Skipping invalid module in store');
      }
    }
    return modules;
  }

  /**
   * Register a fetched module tree, fully replacing any module with the same name.
   *
   * The tree is copied into a staging directory and validated there; only then
   * is the old directory swapped out, so a failed put leaves the previous
   * content untouched.
   *
   * @param sourceDir - Root of the fetched module (contains module.yml).
   * @param origin - Where the module came from, for later re-fetching.
   * @param expectedName - When set, the manifest name must match.
   * @returns The stored module.
   */
  async put(sourceDir: string, origin: ModuleOrigin, expectedName?: string): Promise<Module> {
    const manifest = await readManifest(sourceDir);
    if (expectedName !== undefined && manifest.name !== expectedName) {
      throw new ValidationError(`Fetched module is named "${manifest.name}", expected "${expectedName}"`);
    }

    const stagingDir = join(this.modulesDir, `.staging-${manifest.name}-${nanoid(8)}`);
    const backupDir = join(this.modulesDir, `.previous-${manifest.name}-${nanoid(8)}`);
    const target = this.modulePath(manifest.name);

    await mkdir(this.modulesDir, { recursive: true });
    try {
      await cp(sourceDir, stagingDir, {
        recursive: true,
        filter: (src) => !src.split(/[\\/]/).includes('.git'),
      });
      await writeFileAtomic(join(stagingDir, ORIGIN_FILE), stringifyYaml(origin));
      await this.loadSkillsFrom(stagingDir, manifest.skills);
      await this.loadCommandsFrom(stagingDir, manifest.commands);
    } catch (error: unknown) {
      await rm(stagingDir, { recursive: true, force: true });
      throw error;
    }

    let hadPrevious = false;
    try {
      await rename(target, backupDir);
      hadPrevious = true;
    } catch (error: unknown) {
      if (!isNotFound(error)) {
        await rm(stagingDir, { recursive: true, force: true });
        throw new PersistenceError(`Failed to replace module "${manifest.name}": ${String(error)}`);
      }
    }

    try {
      await rename(stagingDir, target);
    } catch (error: unknown) {
      if (hadPrevious) {
        await rename(backupDir, target);
      }
      await rm(stagingDir, { recursive: true, force: true });
      throw new PersistenceError(`Failed to store module "${manifest.name}": ${String(error)}`);
    }

    if (hadPrevious) {
      await rm(backupDir, { recursive: true, force: true });
    }

    storeLogger.info({ name: manifest.name, version: manifest.version, replaced: hadPrevious }, 'Module stored');

    return {
      name: manifest.name,
      version: manifest.version,
      description: manifest.description,
      skills: manifest.skills,
      commands: manifest.commands,
      origin,
      directory: target,
    };
  }

  /**
   * Deregister a module. Installations are not touched: they keep a snapshot
   * of what was installed and stay functional.
   * @returns True if a module was removed.
   */
  async remove(name: string): Promise<boolean> {
    if (!(await this.has(name))) {
      return false;
    }
    await rm(this.modulePath(name), { recursive: true, force: true });
    storeLogger.info({ name }, 'Module removed');
    return true;
  }

  /**
   * Load every declared skill of a stored module, in manifest order.
   * @throws {ValidationError} On the first invalid skill.
   */
  async loadSkills(module: Module): Promise<Skill[]> {
    return this.loadSkillsFrom(module.directory, module.skills);
  }

  /**
   * Load every declared command of a stored module, in manifest order.
   * @throws {ValidationError} On the first missing or malformed command file.
   */
  async loadCommands(module: Module): Promise<ModuleCommand[]> {
    return this.loadCommandsFrom(module.directory, module.commands);
  }

  private async loadCommandsFrom(moduleDir: string, commandNames: readonly string[]): Promise<ModuleCommand[]> {
    const commands: ModuleCommand[] = [];
    for (const commandName of commandNames) {
      commands.push(await loadCommand(moduleDir, commandName));
    }
    return commands;
  }

  private async loadSkillsFrom(moduleDir: string, skillNames: readonly string[]): Promise<Skill[]> {
    const skills: Skill[] = [];
    for (const skillName of skillNames) {
      skills.push(await loadSkill(join(moduleDir, skillName), skillName));
    }
    return skills;
  }

  private async readOrigin(directory: string): Promise<ModuleOrigin> {
    const originPath = join(directory, ORIGIN_FILE);
    let raw: string;
    try {
      raw = await readFile(originPath, 'utf-8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return { kind: 'folder', locator: directory };
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`Origin file ${originPath} is not valid YAML: ${message}`);
    }
    const result = ModuleOriginSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`Origin file ${originPath} is invalid: ${formatIssues(result.error)}`);
    }
    return result.data;
  }
}
