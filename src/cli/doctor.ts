/**
 * Doctor command: health checks over the skillport home and every recorded
 * installation.
 */

import { existsSync } from 'node:fs';
import chalk from 'chalk';
import { loadConfig, resolvePaths, type SkillportPaths } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { ModuleStore } from '../modules/store.js';
import { InstallationRegistry } from '../registry/installation-registry.js';
import { MarketplaceCatalog } from '../market/catalog.js';
import { artifactSection } from '../adapters/artifact-writer.js';
import { listSectionKeys } from '../adapters/managed-section.js';
import { readFileIfExists } from '../utils/fs.js';
import type { ArtifactRecord, Installation } from '../types/index.js';

/** Result of a single doctor check */
export interface CheckResult {
  name: string;
  passed: boolean;
  message: string;
}

/**
 * Run all doctor checks and print results.
 * Returns exit code 0 if all checks pass, 1 otherwise.
 */
export async function runDoctor(paths: SkillportPaths = resolvePaths()): Promise<number> {
  console.log(chalk.bold('\n  skillport doctor\n'));

  const checks = await getDoctorResults(paths);
  let allPassed = true;
  for (const check of checks) {
    const icon = check.passed ? chalk.green('✓') : chalk.red('✗');
    console.log(`  ${icon}  ${check.name}: ${check.message}`);
    if (!check.passed) {
      allPassed = false;
    }
  }

  console.log('');
  console.log(allPassed ? '  All checks passed.\n' : '  Some checks failed. Fix the issues above.\n');
  return allPassed ? 0 : 1;
}

/** Run all checks and return structured results. */
export async function getDoctorResults(paths: SkillportPaths): Promise<CheckResult[]> {
  return [
    checkNodeVersion(),
    checkHomeDirectory(paths),
    await checkConfigValid(paths),
    await checkModuleStore(paths),
    await checkRegistry(paths),
    await checkInstallations(paths),
    await checkMarketplaces(paths),
  ];
}

/** Check that Node.js version is >= 20 */
export function checkNodeVersion(version: string = process.versions.node): CheckResult {
  const major = parseInt(version.split('.')[0], 10);
  if (major >= 20) {
    return { name: 'Node.js version', passed: true, message: `v${version} (>= 20 required)` };
  }
  return { name: 'Node.js version', passed: false, message: `v${version}, requires Node.js 20+` };
}

export function checkHomeDirectory(paths: SkillportPaths): CheckResult {
  if (existsSync(paths.home)) {
    return { name: 'Home directory', passed: true, message: paths.home };
  }
  return {
    name: 'Home directory',
    passed: true,
    message: `Not created yet at ${paths.home}. It is created by the first "skillport mod add".`,
  };
}

export async function checkConfigValid(paths: SkillportPaths): Promise<CheckResult> {
  try {
    const config = await loadConfig(paths.configFile);
    return { name: 'Config validation', passed: true, message: `Valid (version ${config.version})` };
  } catch (error: unknown) {
    return { name: 'Config validation', passed: false, message: errorMessage(error) };
  }
}

export async function checkModuleStore(paths: SkillportPaths): Promise<CheckResult> {
  try {
    const modules = await new ModuleStore(paths.modulesDir).list();
    return { name: 'Module store', passed: true, message: `${modules.length} module(s) registered` };
  } catch (error: unknown) {
    return { name: 'Module store', passed: false, message: errorMessage(error) };
  }
}

export async function checkRegistry(paths: SkillportPaths): Promise<CheckResult> {
  try {
    const installations = await new InstallationRegistry(paths.registryFile).all();
    return { name: 'Installation registry', passed: true, message: `${installations.length} installation(s) recorded` };
  } catch (error: unknown) {
    return { name: 'Installation registry', passed: false, message: errorMessage(error) };
  }
}

async function artifactPresent(artifact: ArtifactRecord): Promise<boolean> {
  const section = artifactSection(artifact);
  if (section === undefined) {
    return existsSync(artifact.path);
  }
  const text = await readFileIfExists(artifact.path);
  return text !== undefined && listSectionKeys(text).includes(section);
}

/** Problems with one installation, empty when it is healthy. */
export async function inspectInstallation(installation: Installation): Promise<string[]> {
  if (installation.projectPath !== null && !existsSync(installation.projectPath)) {
    return [`${installation.module} → ${installation.assistant}: project ${installation.projectPath} no longer exists`];
  }
  const problems: string[] = [];
  for (const artifact of installation.artifacts) {
    if (!(await artifactPresent(artifact))) {
      const section = artifactSection(artifact);
      const where = section === undefined ? artifact.path : `${artifact.path}#${section}`;
      problems.push(`${installation.module} → ${installation.assistant}: missing ${where}`);
    }
  }
  return problems;
}

export async function checkInstallations(paths: SkillportPaths): Promise<CheckResult> {
  let installations: Installation[];
  try {
    installations = await new InstallationRegistry(paths.registryFile).all();
  } catch {
    return { name: 'Installed artifacts', passed: false, message: 'Cannot check, registry is invalid' };
  }

  const problems: string[] = [];
  for (const installation of installations) {
    problems.push(...await inspectInstallation(installation));
  }
  if (problems.length === 0) {
    return { name: 'Installed artifacts', passed: true, message: 'All recorded artifacts present' };
  }
  return { name: 'Installed artifacts', passed: false, message: problems.join('; ') };
}

export async function checkMarketplaces(paths: SkillportPaths): Promise<CheckResult> {
  try {
    const references = await new MarketplaceCatalog(paths.marketDir, paths.cacheDir, { timeoutMs: 1 }).references();
    const enabled = references.filter((reference) => reference.enabled).length;
    return { name: 'Marketplaces', passed: true, message: `${references.length} registered, ${enabled} enabled` };
  } catch (error: unknown) {
    return { name: 'Marketplaces', passed: false, message: errorMessage(error) };
  }
}
