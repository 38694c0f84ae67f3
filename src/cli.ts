#!/usr/bin/env node

/**
 * skillport CLI entry point.
 * Commands: mod (add, rm, ls, update), install, uninstall, update, list,
 * market (ls, search), doctor.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { AssistantId, Scope } from './types/index.js';
import { SkillportError, errorMessage } from './errors.js';
import { logger } from './utils/logger.js';
import { createAppContext, type AppContext } from './cli/context.js';
import { runDoctor } from './cli/doctor.js';
import { confirmAction, promptForCandidate } from './cli/prompts.js';
import { parseAssistant, parseAssistants, parseScope, resolveInstallTarget } from './cli/options.js';
import {
  allSucceeded,
  formatInstallation,
  formatMarketplace,
  formatModule,
  formatOutcome,
  formatSearchResult,
} from './cli/output.js';

interface InstallOptions {
  assistant?: AssistantId[];
  scope?: Scope;
  market?: string;
  nonInteractive?: boolean;
}

interface UninstallOptions {
  assistant?: AssistantId;
  scope?: Scope;
  force?: boolean;
}

interface AssistantFilterOptions {
  assistant?: AssistantId;
}

/** Print an error and exit. Unexpected errors are also logged with their stack. */
function fail(error: unknown): never {
  if (!(error instanceof SkillportError)) {
    logger.error({ err: error }, 'Unexpected error');
  }
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
}

function canPrompt(context: AppContext, nonInteractive: boolean | undefined): boolean {
  return context.config.interactive && nonInteractive !== true && process.stdin.isTTY === true;
}

const program = new Command();

program
  .name('skillport')
  .description('Install portable skill modules into AI coding assistants')
  .version('0.1.0');

const modCmd = program
  .command('mod')
  .description('Manage the local module store: add, rm, ls, update');

modCmd
  .command('add <source>')
  .description('Register a module from a git URL, tarball, or local folder')
  .option('-n, --name <name>', 'expected module name')
  .option('-p, --path <subpath>', 'subdirectory of the source holding the module')
  .action(async (source: string, opts: { name?: string; path?: string }) => {
    try {
      const context = await createAppContext();
      const module = await context.resolver.addFromSource(source, { name: opts.name, subpath: opts.path });
      console.log(chalk.green(
        `Added module "${module.name}" v${module.version} (${module.skills.length} skill(s), ${module.commands.length} command(s))`,
      ));
    } catch (error: unknown) {
      fail(error);
    }
  });

modCmd
  .command('rm <name>')
  .description('Remove a module from the store; installed copies are left as they are')
  .option('-f, --force', 'do not ask for confirmation')
  .action(async (name: string, opts: { force?: boolean }) => {
    try {
      const context = await createAppContext();
      if (!(await context.store.has(name))) {
        console.log(`Module "${name}" is not in the store.`);
        return;
      }
      const installations = await context.registry.list({ module: name });
      if (installations.length > 0) {
        console.log(chalk.yellow(
          `Warning: "${name}" is still installed in ${installations.length} place(s). `
          + 'Those installations stay on disk but can no longer be updated until the module is added again.',
        ));
        if (!opts.force && canPrompt(context, false) && !(await confirmAction(`Remove module "${name}"?`))) {
          console.log('Cancelled.');
          return;
        }
      }
      await context.store.remove(name);
      console.log(chalk.green(`Removed module "${name}"`));
    } catch (error: unknown) {
      fail(error);
    }
  });

modCmd
  .command('ls')
  .description('List modules in the store')
  .action(async () => {
    try {
      const context = await createAppContext();
      const modules = await context.store.list();
      if (modules.length === 0) {
        console.log('No modules registered. Add one with "skillport mod add <source>".');
        return;
      }
      const installations = await context.registry.all();
      for (const module of modules) {
        const count = installations.filter((installation) => installation.module === module.name).length;
        console.log(formatModule(module, count));
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

modCmd
  .command('update [name]')
  .description('Re-fetch one module, or every module, from its origin')
  .action(async (name: string | undefined) => {
    try {
      const context = await createAppContext();
      const names = name !== undefined ? [name] : (await context.store.list()).map((module) => module.name);
      let failed = false;
      for (const moduleName of names) {
        try {
          const module = await context.resolver.refresh(moduleName);
          console.log(chalk.green(`Updated "${module.name}" to v${module.version}`));
        } catch (error: unknown) {
          failed = true;
          console.error(chalk.red(`Failed to update "${moduleName}": ${errorMessage(error)}`));
        }
      }
      if (failed) {
        process.exit(1);
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

program
  .command('install <module> [project]')
  .description('Install a module into one or more assistants')
  .option('-a, --assistant <ids>', 'comma-separated assistants (default: from config)', parseAssistants)
  .option('-s, --scope <scope>', 'user or project', parseScope)
  .option('-m, --market <name>', 'marketplace to install from when several offer the module')
  .option('--non-interactive', 'never prompt')
  .action(async (moduleName: string, project: string | undefined, opts: InstallOptions) => {
    try {
      const context = await createAppContext();
      const target = resolveInstallTarget(project, opts.scope, context.config.install.defaultScope);
      const report = await context.installer.install({
        module: moduleName,
        assistants: opts.assistant ?? context.config.install.assistants,
        scope: target.scope,
        projectPath: target.projectPath,
        marketplace: opts.market,
        select: canPrompt(context, opts.nonInteractive) ? promptForCandidate : undefined,
      });

      console.log(`Installing ${chalk.bold(report.module)} v${report.version}`);
      for (const outcome of report.outcomes) {
        console.log(formatOutcome(outcome));
      }
      if (!allSucceeded(report.outcomes)) {
        process.exit(1);
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

program
  .command('uninstall <module> [project]')
  .description('Remove exactly the artifacts a module installed')
  .option('-a, --assistant <id>', 'only this assistant', parseAssistant)
  .option('-s, --scope <scope>', 'user or project', parseScope)
  .option('-f, --force', 'do not ask for confirmation')
  .action(async (moduleName: string, project: string | undefined, opts: UninstallOptions) => {
    try {
      const context = await createAppContext();
      const request = {
        module: moduleName,
        assistant: opts.assistant,
        scope: opts.scope ?? (project !== undefined ? 'project' as const : undefined),
        projectPath: project,
      };

      const matches = await context.installer.uninstallMatches(request);
      if (matches.length === 0) {
        console.log(`"${moduleName}" is not installed.`);
        return;
      }
      if (!opts.force && matches.length > 1 && canPrompt(context, false)) {
        const confirmed = await confirmAction(`Remove ${matches.length} installations of "${moduleName}"?`);
        if (!confirmed) {
          console.log('Cancelled.');
          return;
        }
      }

      const outcomes = await context.installer.uninstall(request);
      if (outcomes.length === 0) {
        console.log(`"${moduleName}" is not installed there.`);
        return;
      }
      for (const outcome of outcomes) {
        console.log(formatOutcome(outcome));
      }
      if (!allSucceeded(outcomes)) {
        process.exit(1);
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

program
  .command('update [module]')
  .description('Regenerate installed artifacts from the current store content')
  .option('-a, --assistant <id>', 'only this assistant', parseAssistant)
  .action(async (moduleName: string | undefined, opts: AssistantFilterOptions) => {
    try {
      const context = await createAppContext();
      const outcomes = await context.installer.update({ module: moduleName, assistant: opts.assistant });
      if (outcomes.length === 0) {
        console.log('Nothing to update.');
        return;
      }
      for (const outcome of outcomes) {
        console.log(`${chalk.bold(outcome.module)}${formatOutcome(outcome)}`);
      }
      if (!allSucceeded(outcomes)) {
        process.exit(1);
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

program
  .command('list')
  .description('List installations')
  .option('-a, --assistant <id>', 'only this assistant', parseAssistant)
  .action(async (opts: AssistantFilterOptions) => {
    try {
      const context = await createAppContext();
      const installations = await context.registry.list({ assistant: opts.assistant });
      if (installations.length === 0) {
        console.log('No installations.');
        return;
      }
      for (const installation of installations) {
        console.log(formatInstallation(installation));
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

const marketCmd = program
  .command('market')
  .description('Browse marketplace catalogs: ls, search');

marketCmd
  .command('ls')
  .description('List registered marketplaces')
  .action(async () => {
    try {
      const context = await createAppContext();
      const references = await context.catalog.references();
      if (references.length === 0) {
        console.log('No marketplaces registered.');
        return;
      }
      for (const reference of references) {
        console.log(formatMarketplace(reference));
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

marketCmd
  .command('search <query>')
  .description('Search enabled marketplaces by name, description, or tag')
  .action(async (query: string) => {
    try {
      const context = await createAppContext();
      const results = await context.catalog.search(query);
      if (results.length === 0) {
        console.log(`No modules found matching "${query}".`);
        return;
      }
      console.log(`Found ${results.length} module(s):`);
      for (const result of results) {
        console.log(formatSearchResult(result));
      }
    } catch (error: unknown) {
      fail(error);
    }
  });

program
  .command('doctor')
  .description('Check the skillport home and recorded installations')
  .action(async () => {
    const exitCode = await runDoctor();
    process.exit(exitCode);
  });

program.parseAsync().catch(fail);
