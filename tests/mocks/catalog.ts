/**
 * In-memory catalog lookup for resolver and installer tests.
 */

import type { CatalogLookup, ModuleCandidate } from '../../src/market/catalog.js';

export interface MockCatalog extends CatalogLookup {
  /** Names passed to findModule, in call order. */
  lookups: string[];
}

export function createMockCatalog(candidates: ModuleCandidate[] = []): MockCatalog {
  const lookups: string[] = [];
  return {
    lookups,
    async findModule(name: string): Promise<ModuleCandidate[]> {
      lookups.push(name);
      return candidates.filter((candidate) => candidate.name === name);
    },
  };
}

/** A candidate pointing at a local folder. */
export function folderCandidate(name: string, repository: string, marketplace: string, version = '1.0.0'): ModuleCandidate {
  return { name, version, description: `${name} from ${marketplace}`, repository, marketplace };
}
