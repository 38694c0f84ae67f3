export { createSourceFetcher, type SourceFetcher, type SourceFetcherOptions, type CloneFn, type DownloadFn } from './fetcher.js';
export { parseSourceLocator, detectSourceKind, isRemoteLocator } from './locator.js';
