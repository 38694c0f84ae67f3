export {
  MarketplaceCatalog,
  truncateDescription,
  SEARCH_DESCRIPTION_LIMIT,
  MARKET_FILE_EXTENSION,
  type CatalogLookup,
  type CatalogDownloadFn,
  type ModuleCandidate,
  type SearchResult,
  type MarketplaceCatalogOptions,
} from './catalog.js';
export {
  validateMarketplaceName,
  CatalogSchema,
  MarketplaceReferenceSchema,
  type Catalog,
  type CatalogModule,
  type MarketplaceReference,
} from './schema.js';
