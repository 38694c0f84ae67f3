/**
 * Wires the components a CLI command needs from a home directory and config.
 */

import { loadConfig, resolvePaths, type Config, type SkillportPaths } from '../config/index.js';
import { ModuleStore } from '../modules/store.js';
import { InstallationRegistry } from '../registry/installation-registry.js';
import { MarketplaceCatalog, type CatalogDownloadFn } from '../market/catalog.js';
import { createSourceFetcher, type CloneFn, type DownloadFn } from '../fetch/fetcher.js';
import { ModuleResolver } from '../resolver/resolver.js';
import { Installer } from '../installer/installer.js';

export interface AppContext {
  paths: SkillportPaths;
  config: Config;
  store: ModuleStore;
  registry: InstallationRegistry;
  catalog: MarketplaceCatalog;
  resolver: ModuleResolver;
  installer: Installer;
}

/** Overrides for tests; production code passes nothing. */
export interface AppContextOptions {
  paths?: SkillportPaths;
  cloneFn?: CloneFn;
  downloadFn?: DownloadFn;
  catalogDownloadFn?: CatalogDownloadFn;
}

/**
 * Load configuration and build every component.
 * @throws {ConfigError} When config.json is invalid.
 */
export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const paths = options.paths ?? resolvePaths();
  const config = await loadConfig(paths.configFile);
  const timeoutMs = config.fetch.timeoutMs;

  const store = new ModuleStore(paths.modulesDir);
  const registry = new InstallationRegistry(paths.registryFile);
  const catalog = new MarketplaceCatalog(paths.marketDir, paths.cacheDir, {
    timeoutMs,
    downloadFn: options.catalogDownloadFn,
  });
  const fetcher = createSourceFetcher({ timeoutMs, cloneFn: options.cloneFn, downloadFn: options.downloadFn });
  const resolver = new ModuleResolver({ store, catalog, fetcher });
  const installer = new Installer({ store, registry, resolver, userHome: paths.userHome });

  return { paths, config, store, registry, catalog, resolver, installer };
}
