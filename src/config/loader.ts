/**
 * Configuration loader for skillport.
 * Reads config.json from the skillport home, applies env var overrides,
 * and validates with Zod.
 *
 * Priority: env vars > config.json > Zod defaults
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../errors.js';
import { createModuleLogger } from '../utils/logger.js';
import { isNotFound } from '../utils/fs.js';
import { ConfigSchema, type Config } from './schema.js';

const log = createModuleLogger('config');

/**
 * Reads the raw config file from disk.
 * Returns an empty object if the file does not exist.
 */
async function readConfigFile(configFile: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(configFile, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      log.debug({ configFile }, 'No config file found, using defaults');
      return {};
    }
    throw new ConfigError(`Failed to read config file: ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file contains invalid JSON: ${message}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Config file must contain a JSON object');
  }
  return { ...parsed };
}

/**
 * Applies environment variable overrides to the raw config object.
 * Supported env vars:
 *   SKILLPORT_FETCH_TIMEOUT_MS -> fetch.timeoutMs
 *   SKILLPORT_NON_INTERACTIVE  -> interactive = false when "1" or "true"
 */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  const merged = structuredClone(config);

  const timeout = process.env.SKILLPORT_FETCH_TIMEOUT_MS;
  if (timeout !== undefined) {
    const timeoutMs = Number(timeout);
    if (!Number.isNaN(timeoutMs)) {
      const current = merged.fetch;
      const fetchSection = typeof current === 'object' && current !== null && !Array.isArray(current)
        ? { ...current }
        : {};
      merged.fetch = { ...fetchSection, timeoutMs };
    }
  }

  const nonInteractive = process.env.SKILLPORT_NON_INTERACTIVE;
  if (nonInteractive === '1' || nonInteractive === 'true') {
    merged.interactive = false;
  }

  return merged;
}

/**
 * Loads the configuration, applies environment overrides and validates it.
 *
 * @param configFile - Path to config.json.
 * @throws {ConfigError} When the config file is malformed or validation fails
 */
export async function loadConfig(configFile: string): Promise<Config> {
  const rawFile = await readConfigFile(configFile);
  const result = ConfigSchema.safeParse(applyEnvOverrides(rawFile));

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config validation failed: ${issues}`);
  }

  log.debug({ configFile }, 'Configuration loaded');
  return result.data;
}

