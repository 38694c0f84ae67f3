/**
 * Command loader: reads `commands/<name>.md` from a module tree.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ModuleCommand } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { isNotFound } from '../utils/fs.js';
import { parseSkillMarkdown } from './skill-loader.js';

/** Directory inside a module that holds command files. */
export const COMMANDS_DIR = 'commands';

/**
 * Load one command. Frontmatter is optional; only `description` is interpreted.
 * @throws {ValidationError} If the file is missing or its frontmatter is malformed.
 */
export async function loadCommand(moduleDir: string, name: string): Promise<ModuleCommand> {
  const commandFile = join(moduleDir, COMMANDS_DIR, `${name}.md`);
  let raw: string;
  try {
    raw = await readFile(commandFile, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      throw new ValidationError(`Command "${name}" has no file at ${commandFile}`);
    }
    throw error;
  }

  const { data, body } = parseSkillMarkdown(raw, commandFile);
  const description = typeof data.description === 'string' ? data.description.trim() : '';
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (key !== 'description') {
      metadata[key] = value;
    }
  }

  return Object.freeze({
    name,
    description,
    body,
    raw,
    metadata: Object.freeze(metadata),
  });
}
