/**
 * Terminal formatting for command results. Functions return strings so
 * commands decide where they go.
 */

import chalk from 'chalk';
import type { Installation, Module } from '../types/index.js';
import type { AssistantOutcome } from '../installer/installer.js';
import type { SearchResult } from '../market/catalog.js';
import type { MarketplaceReference } from '../market/schema.js';

function target(outcome: Pick<AssistantOutcome, 'scope' | 'projectPath'>): string {
  return outcome.projectPath === null ? outcome.scope : `${outcome.scope} ${outcome.projectPath}`;
}

/** One line per assistant outcome. */
export function formatOutcome(outcome: AssistantOutcome): string {
  const where = `${outcome.assistant} (${target(outcome)})`;
  switch (outcome.status) {
    case 'installed': {
      const note = outcome.reason ? ` (${outcome.reason})` : '';
      return chalk.green(`  ✓ ${where}: ${outcome.artifacts.length} artifact(s)${note}`);
    }
    case 'removed':
      return chalk.green(`  ✓ ${where}: removed ${outcome.artifacts.length} artifact(s)`);
    case 'skipped':
      return chalk.yellow(`  - ${where}: skipped, ${outcome.reason ?? 'not supported'}`);
    case 'stale':
      return chalk.yellow(`  ! ${where}: stale, ${outcome.reason ?? 'target no longer exists'}`);
    case 'failed':
      return chalk.red(`  ✗ ${where}: ${outcome.error?.message ?? 'failed'}`);
  }
}

/** Whether every outcome left its assistant in a good state. */
export function allSucceeded(outcomes: readonly AssistantOutcome[]): boolean {
  return outcomes.every((outcome) => outcome.status !== 'failed');
}

/** Indented `skills:` and `commands:` lines; an empty list gets no line. */
function contentLines(skills: readonly string[], commands: readonly string[]): string {
  const lines: string[] = [];
  if (skills.length > 0) {
    lines.push(`    skills: ${skills.join(', ')}`);
  }
  if (commands.length > 0) {
    lines.push(`    commands: ${commands.join(', ')}`);
  }
  return lines.map((line) => `\n${line}`).join('');
}

export function formatModule(module: Module, installCount: number): string {
  const installs = installCount === 0 ? chalk.gray('not installed') : `${installCount} installation(s)`;
  return `  ${chalk.bold(module.name)} v${module.version} [${module.origin.kind}] ${installs}${contentLines(module.skills, module.commands)}`;
}

export function formatInstallation(installation: Installation): string {
  const heading = `  ${chalk.bold(installation.module)} v${installation.version} → ${installation.assistant} (${target(installation)})`;
  return `${heading}${contentLines(installation.skills, installation.commands)}`;
}

export function formatSearchResult(result: SearchResult): string {
  const tags = result.tags.length > 0 ? chalk.gray(` [${result.tags.join(', ')}]`) : '';
  return `  ${chalk.bold(result.name)} v${result.version || '?'} (${result.marketplace}) ${result.description}${tags}`;
}

export function formatMarketplace(reference: MarketplaceReference): string {
  const state = reference.enabled ? chalk.green('enabled') : chalk.gray('disabled');
  return `  ${chalk.bold(reference.name)} ${state} ${reference.url}`;
}
