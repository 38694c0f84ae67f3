/**
 * Filesystem layout of a skillport home directory.
 * Built once at startup and passed into every component that touches disk.
 */

import os from 'node:os';
import path from 'node:path';

/** Resolved locations of everything skillport owns. */
export interface SkillportPaths {
  /** Root of skillport state, e.g. ~/.skillport */
  home: string;
  /** One subdirectory per registered module */
  modulesDir: string;
  /** Installation registry document */
  registryFile: string;
  /** Marketplace reference files */
  marketDir: string;
  /** Downloaded marketplace catalogs */
  cacheDir: string;
  /** config.json */
  configFile: string;
  /** Home directory used for user-scope assistant paths */
  userHome: string;
}

/**
 * Returns the skillport home directory.
 * Checks SKILLPORT_HOME first, then defaults to ~/.skillport.
 */
export function homeDir(): string {
  return process.env.SKILLPORT_HOME ?? path.join(os.homedir(), '.skillport');
}

/**
 * Build the path set rooted at a home directory.
 * @param home - Skillport home; defaults to {@link homeDir}.
 * @param userHome - Home used for assistant user-scope paths; defaults to the OS home.
 */
export function resolvePaths(home: string = homeDir(), userHome: string = os.homedir()): SkillportPaths {
  return {
    home,
    modulesDir: path.join(home, 'modules'),
    registryFile: path.join(home, 'installed.yml'),
    marketDir: path.join(home, 'market'),
    cacheDir: path.join(home, 'cache'),
    configFile: path.join(home, 'config.json'),
    userHome,
  };
}
