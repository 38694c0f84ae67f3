/**
 * Configuration schema for skillport.
 * Every setting has a default so an absent config.json is a valid config.
 */

import { z } from 'zod';
import { ASSISTANT_IDS } from '../types/index.js';

export const ConfigSchema = z.object({
  version: z.number().default(1),
  fetch: z.object({
    timeoutMs: z.number().int().positive().default(30_000),
  }).default({}),
  install: z.object({
    defaultScope: z.enum(['user', 'project']).default('user'),
    assistants: z.array(z.enum(ASSISTANT_IDS)).min(1).default([...ASSISTANT_IDS]),
  }).default({}),
  interactive: z.boolean().default(true),
});

/** Fully-resolved configuration type inferred from the Zod schema */
export type Config = z.infer<typeof ConfigSchema>;
