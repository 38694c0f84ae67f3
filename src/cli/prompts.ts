/**
 * Interactive prompts. Only used when the terminal is interactive and the
 * config allows it.
 */

import inquirer from 'inquirer';
import type { ModuleCandidate } from '../market/catalog.js';

/** Ask which marketplace to install an ambiguous module from. */
export async function promptForCandidate(candidates: readonly ModuleCandidate[]): Promise<ModuleCandidate> {
  const { index } = await inquirer.prompt<{ index: number }>([
    {
      type: 'list',
      name: 'index',
      message: `"${candidates[0].name}" is offered by several marketplaces. Install from:`,
      choices: candidates.map((candidate, position) => ({
        name: `${candidate.marketplace} (v${candidate.version || '?'}) ${candidate.repository}`,
        value: position,
      })),
    },
  ]);
  return candidates[index];
}

/** Confirm a destructive action; defaults to no. */
export async function confirmAction(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: false,
    },
  ]);
  return confirmed;
}
