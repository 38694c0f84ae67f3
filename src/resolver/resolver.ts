/**
 * Module resolver. Turns a module name into a stored module: the store is
 * consulted first, then marketplace catalogs. A catalog hit is fetched into a
 * temp directory and registered in the store before it is returned.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Module, ModuleOrigin } from '../types/index.js';
import { AmbiguousModuleError, ModuleNotFoundError, ValidationError, errorMessage } from '../errors.js';
import type { CatalogLookup, ModuleCandidate } from '../market/catalog.js';
import type { ModuleStore } from '../modules/store.js';
import type { SourceFetcher } from '../fetch/fetcher.js';
import { parseSourceLocator } from '../fetch/locator.js';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('resolver');

/** Picks one of several marketplace candidates, typically by prompting. */
export type CandidateSelector = (candidates: readonly ModuleCandidate[]) => Promise<ModuleCandidate>;

export interface ResolveOptions {
  /** Called when more than one marketplace offers the module. */
  select?: CandidateSelector;
  /** Restrict catalog candidates to one marketplace. */
  marketplace?: string;
}

export interface AddSourceOptions {
  /** Expected module name; the manifest must agree. */
  name?: string;
  /** Subdirectory of the source that holds the module. */
  subpath?: string;
  cwd?: string;
}

export interface ModuleResolverDeps {
  store: ModuleStore;
  catalog: CatalogLookup;
  fetcher: SourceFetcher;
  /** Parent of the per-fetch temp directories. Defaults to the OS temp dir. */
  tmpRoot?: string;
}

export class ModuleResolver {
  private readonly store: ModuleStore;
  private readonly catalog: CatalogLookup;
  private readonly fetcher: SourceFetcher;
  private readonly tmpRoot: string;

  constructor(deps: ModuleResolverDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.fetcher = deps.fetcher;
    this.tmpRoot = deps.tmpRoot ?? tmpdir();
  }

  /**
   * Resolve a module by name.
   * @throws {ModuleNotFoundError} When neither the store nor a catalog has it.
   * @throws {AmbiguousModuleError} When several marketplaces offer it and
   *   neither `marketplace` nor `select` decides.
   */
  async resolve(name: string, options: ResolveOptions = {}): Promise<Module> {
    const stored = await this.store.get(name);
    if (stored) {
      log.debug({ module: name }, 'Resolved from store');
      return stored;
    }

    let candidates = await this.catalog.findModule(name);
    if (candidates.length === 0) {
      throw new ModuleNotFoundError(name);
    }

    if (options.marketplace !== undefined) {
      const wanted = options.marketplace;
      candidates = candidates.filter((candidate) => candidate.marketplace === wanted);
      if (candidates.length === 0) {
        throw new ValidationError(`Module "${name}" is not offered by marketplace "${wanted}"`);
      }
    }

    let chosen: ModuleCandidate;
    if (candidates.length === 1) {
      chosen = candidates[0];
    } else if (options.select) {
      chosen = await options.select(candidates);
    } else {
      throw new AmbiguousModuleError(name, candidates);
    }

    log.info({ module: name, marketplace: chosen.marketplace, repository: chosen.repository }, 'Resolved from marketplace');
    return this.materialize(chosen);
  }

  /**
   * Fetch a module from a source string and register it in the store.
   * @throws {ValidationError} When the source holds no valid module.
   * @throws {FetchError} When the source cannot be fetched.
   */
  async addFromSource(source: string, options: AddSourceOptions = {}): Promise<Module> {
    const origin = parseSourceLocator(source, options.cwd, options.subpath);
    return this.fetchAndStore(origin, options.name);
  }

  /**
   * Re-fetch a stored module from the origin it was added from.
   * @throws {ModuleNotFoundError} When the module is not in the store.
   */
  async refresh(name: string): Promise<Module> {
    const module = await this.store.get(name);
    if (!module) {
      throw new ModuleNotFoundError(name);
    }
    return this.fetchAndStore(module.origin, name);
  }

  private async materialize(candidate: ModuleCandidate): Promise<Module> {
    const origin: ModuleOrigin = {
      ...parseSourceLocator(candidate.repository, process.cwd(), candidate.path),
      marketplace: candidate.marketplace,
    };
    return this.fetchAndStore(origin, candidate.name);
  }

  private async fetchAndStore(origin: ModuleOrigin, expectedName: string | undefined): Promise<Module> {
    const workDir = await mkdtemp(join(this.tmpRoot, 'skillport-fetch-'));
    try {
      const root = await this.fetcher.fetch(origin, workDir);
      return await this.store.put(root, origin, expectedName);
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        log.warn({ workDir, err: errorMessage(error) }, 'Failed to clean up fetch directory');
      });
    }
  }
}
