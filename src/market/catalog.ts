/**
 * Marketplace catalog lookup. Read-only: references live in `market/`,
 * downloaded catalogs in `cache/`. A reference whose cache is missing gets
 * one bounded re-download; if that fails the marketplace is skipped.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { FetchError, PersistenceError, errorMessage } from '../errors.js';
import { formatIssues } from '../modules/schema.js';
import { createModuleLogger } from '../utils/logger.js';
import { isNotFound, readFileIfExists, writeFileAtomic } from '../utils/fs.js';
import { withTimeout } from '../utils/timeout.js';
import { parseYaml, stringifyYaml } from '../utils/yaml.js';
import {
  CatalogSchema,
  MarketplaceReferenceSchema,
  validateMarketplaceName,
  type Catalog,
  type MarketplaceReference,
} from './schema.js';

const log = createModuleLogger('market');

/** Extension of reference and cached catalog files. */
export const MARKET_FILE_EXTENSION = '.yml';

/** Length after which search results cut descriptions short. */
export const SEARCH_DESCRIPTION_LIMIT = 60;

/** Fetch a catalog document as text. */
export type CatalogDownloadFn = (url: string, signal: AbortSignal) => Promise<string>;

/** A catalog entry that matches a requested module name. */
export interface ModuleCandidate {
  name: string;
  version: string;
  description: string;
  repository: string;
  path?: string;
  marketplace: string;
}

/** A line of `market search` output. */
export interface SearchResult {
  name: string;
  version: string;
  description: string;
  marketplace: string;
  tags: string[];
}

/** What the resolver needs from a catalog. */
export interface CatalogLookup {
  findModule(name: string): Promise<ModuleCandidate[]>;
}

export interface MarketplaceCatalogOptions {
  timeoutMs: number;
  downloadFn?: CatalogDownloadFn;
}

interface LoadedMarketplace {
  reference: MarketplaceReference;
  catalog: Catalog;
}

async function defaultCatalogDownload(url: string, signal: AbortSignal): Promise<string> {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new FetchError(`Download of catalog ${url} failed with HTTP ${response.status}`);
  }
  return response.text();
}

function parseDocument<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>, label: string): T {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error: unknown) {
    throw new PersistenceError(`${label} is not valid YAML: ${errorMessage(error)}`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new PersistenceError(`${label} is invalid: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Truncate a description for display.
 * @example truncateDescription('x'.repeat(70)) // 'x'.repeat(60) + '...'
 */
export function truncateDescription(description: string, limit: number = SEARCH_DESCRIPTION_LIMIT): string {
  return description.length > limit ? `${description.slice(0, limit)}...` : description;
}

export class MarketplaceCatalog implements CatalogLookup {
  private readonly downloadFn: CatalogDownloadFn;
  private readonly timeoutMs: number;

  constructor(
    private readonly marketDir: string,
    private readonly cacheDir: string,
    options: MarketplaceCatalogOptions,
  ) {
    this.timeoutMs = options.timeoutMs;
    this.downloadFn = options.downloadFn ?? defaultCatalogDownload;
  }

  /**
   * Every registered marketplace reference, enabled or not, sorted by name.
   * Unreadable reference files are logged and skipped.
   */
  async references(): Promise<MarketplaceReference[]> {
    let entries: string[];
    try {
      entries = await readdir(this.marketDir);
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return [];
      }
      throw new PersistenceError(`Failed to read marketplace directory ${this.marketDir}: ${errorMessage(error)}`);
    }

    const references: MarketplaceReference[] = [];
    for (const entry of entries.filter((name) => name.endsWith(MARKET_FILE_EXTENSION)).sort()) {
      const file = join(this.marketDir, entry);
      try {
        const raw = await readFileIfExists(file);
        if (raw === undefined) {
          continue;
        }
        const reference = parseDocument(raw, MarketplaceReferenceSchema, `Marketplace reference ${file}`);
        validateMarketplaceName(reference.name);
        references.push(reference);
      } catch (error: unknown) {
        log.warn({ file, err: errorMessage(error) }, 'Skipping unreadable marketplace reference');
      }
    }
    return references;
  }

  /** Enabled marketplaces with a usable catalog, in name order. */
  async enabledMarketplaces(): Promise<LoadedMarketplace[]> {
    const loaded: LoadedMarketplace[] = [];
    for (const reference of await this.references()) {
      if (!reference.enabled) {
        continue;
      }
      const catalog = await this.loadCatalog(reference);
      if (catalog) {
        loaded.push({ reference, catalog });
      }
    }
    return loaded;
  }

  /** Exact-name matches across every enabled marketplace. */
  async findModule(name: string): Promise<ModuleCandidate[]> {
    const candidates: ModuleCandidate[] = [];
    for (const { reference, catalog } of await this.enabledMarketplaces()) {
      for (const entry of catalog.modules) {
        if (entry.name !== name) {
          continue;
        }
        candidates.push({
          name: entry.name,
          version: entry.version,
          description: entry.description,
          repository: entry.repository,
          ...(entry.path ? { path: entry.path } : {}),
          marketplace: reference.name,
        });
      }
    }
    log.debug({ module: name, matches: candidates.length }, 'Catalog lookup');
    return candidates;
  }

  /** Case-insensitive match on name, description, and tags. */
  async search(query: string): Promise<SearchResult[]> {
    const needle = query.trim().toLowerCase();
    const results: SearchResult[] = [];
    for (const { reference, catalog } of await this.enabledMarketplaces()) {
      for (const entry of catalog.modules) {
        const haystack = [entry.name, entry.description, ...entry.tags].map((text) => text.toLowerCase());
        if (!haystack.some((text) => text.includes(needle))) {
          continue;
        }
        results.push({
          name: entry.name,
          version: entry.version,
          description: truncateDescription(entry.description),
          marketplace: reference.name,
          tags: entry.tags,
        });
      }
    }
    return results;
  }

  private async loadCatalog(reference: MarketplaceReference): Promise<Catalog | undefined> {
    const cacheFile = join(this.cacheDir, `${reference.name}${MARKET_FILE_EXTENSION}`);
    try {
      const cached = await readFileIfExists(cacheFile);
      if (cached !== undefined) {
        return parseDocument(cached, CatalogSchema, `Marketplace cache ${cacheFile}`);
      }
      log.info({ marketplace: reference.name, url: reference.url }, 'Catalog cache missing, downloading');
      const downloaded = await withTimeout(
        `download catalog ${reference.url}`,
        this.timeoutMs,
        (signal) => this.downloadFn(reference.url, signal),
      );
      const catalog = parseDocument(downloaded, CatalogSchema, `Catalog from ${reference.url}`);
      await writeFileAtomic(cacheFile, stringifyYaml(catalog));
      return catalog;
    } catch (error: unknown) {
      log.warn({ marketplace: reference.name, err: errorMessage(error) }, 'Skipping marketplace without a usable catalog');
      return undefined;
    }
  }
}
