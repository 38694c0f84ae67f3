/**
 * Skill loader: reads one skill directory (SKILL.md plus auxiliary files)
 * into an immutable Skill. All skill validation happens here.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import matter from 'gray-matter';
import type { Skill, SkillResource } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { isNotFound } from '../utils/fs.js';

/** Name of the skill definition file inside each skill directory. */
export const SKILL_FILE = 'SKILL.md';

/**
 * Split SKILL.md into frontmatter and body.
 * @throws {ValidationError} If the frontmatter is not valid YAML.
 */
export function parseSkillMarkdown(raw: string, source: string): { data: Record<string, unknown>; body: string } {
  try {
    const parsed = matter(raw);
    const data: Record<string, unknown> = typeof parsed.data === 'object' && parsed.data !== null
      ? { ...parsed.data }
      : {};
    return { data, body: parsed.content };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Malformed frontmatter in ${source}: ${message}`);
  }
}

function requireText(data: Record<string, unknown>, field: string, source: string): string {
  const value = data[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${source}: frontmatter field "${field}" is required and must be non-empty`);
  }
  return value.trim();
}

async function collectResources(skillDir: string, dir: string): Promise<SkillResource[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const resources: SkillResource[] = [];

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      resources.push(...await collectResources(skillDir, fullPath));
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }
    const relativePath = relative(skillDir, fullPath).split(sep).join('/');
    if (relativePath === SKILL_FILE) {
      continue;
    }
    resources.push({ relativePath, content: await readFile(fullPath) });
  }

  return resources;
}

/**
 * Load and validate a skill directory.
 *
 * @param skillDir - Absolute path of the skill directory.
 * @param expectedName - Skill name declared in the module manifest.
 * @throws {ValidationError} If SKILL.md is missing, unparsable, or lacks name/description,
 *   or if its name differs from the declared one.
 */
export async function loadSkill(skillDir: string, expectedName: string): Promise<Skill> {
  const skillFile = join(skillDir, SKILL_FILE);
  let raw: string;
  try {
    raw = await readFile(skillFile, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      throw new ValidationError(`Skill "${expectedName}" has no ${SKILL_FILE} at ${skillFile}`);
    }
    throw error;
  }

  const { data, body } = parseSkillMarkdown(raw, skillFile);
  const name = requireText(data, 'name', skillFile);
  const description = requireText(data, 'description', skillFile);

  if (name !== expectedName) {
    throw new ValidationError(
      `${skillFile}: frontmatter name "${name}" does not match skill directory "${expectedName}"`,
    );
  }

  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (key !== 'name' && key !== 'description') {
      metadata[key] = value;
    }
  }

  return Object.freeze({
    name,
    description,
    body,
    raw,
    metadata: Object.freeze(metadata),
    resources: Object.freeze(await collectResources(skillDir, skillDir)),
  });
}
