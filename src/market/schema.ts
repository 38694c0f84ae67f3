/**
 * Zod schemas for marketplace reference and catalog files.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';

/** `market/<name>.yml`: a registered marketplace. */
export const MarketplaceReferenceSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  enabled: z.boolean().default(true),
});

export type MarketplaceReference = z.infer<typeof MarketplaceReferenceSchema>;

/** One module entry in a catalog. */
export const CatalogModuleSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  version: z.string().default(''),
  repository: z.string().min(1),
  /** Subdirectory of the repository holding the module. */
  path: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

export type CatalogModule = z.infer<typeof CatalogModuleSchema>;

/** `cache/<name>.yml`: a downloaded catalog. */
export const CatalogSchema = z.object({
  name: z.string().default(''),
  description: z.string().default(''),
  version: z.string().default(''),
  modules: z.array(CatalogModuleSchema).default([]),
});

export type Catalog = z.infer<typeof CatalogSchema>;

/**
 * Validate a marketplace name, which doubles as a file name.
 * @returns The name, trimmed.
 * @throws {ValidationError} On empty names, dot names, separators, or a leading dot.
 */
export function validateMarketplaceName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Marketplace name cannot be empty');
  }
  if (trimmed === '.' || trimmed === '..') {
    throw new ValidationError('Marketplace name invalid: path traversal not allowed');
  }
  if (trimmed.includes('/') || trimmed.includes('\\')) {
    throw new ValidationError('Marketplace name invalid: path separators not allowed');
  }
  if (trimmed.startsWith('.')) {
    throw new ValidationError('Marketplace name cannot start with dot');
  }
  return trimmed;
}
