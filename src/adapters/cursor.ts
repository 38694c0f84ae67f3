/**
 * Cursor adapter: converted file-per-skill layout.
 *
 * Each skill becomes `.cursor/rules/<module>.<skill>.mdc` whose frontmatter
 * follows Cursor's rule schema:
 *
 * | rule field    | taken from                               | default |
 * |---------------|------------------------------------------|---------|
 * | description   | description                              | (required) |
 * | globs         | globs (string or list, joined with ",")  | ""      |
 * | alwaysApply   | alwaysApply / always_apply               | false   |
 */

import { join } from 'node:path';
import matter from 'gray-matter';
import type { Skill } from '../types/index.js';
import { ConversionError } from '../errors.js';
import { skillLocation } from './capabilities.js';
import { artifactKey, type AdapterContext, type ArtifactOperation, type FormatAdapter } from './types.js';

/** Frontmatter of a Cursor rule file. */
export interface CursorRuleFrontmatter {
  description: string;
  globs: string;
  alwaysApply: boolean;
}

function convertGlobs(value: unknown, key: string): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value.join(',');
  }
  throw new ConversionError('"globs" must be a string or a list of strings', key);
}

function convertAlwaysApply(value: unknown, key: string): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  throw new ConversionError('"alwaysApply" must be true or false', key);
}

/**
 * Translate a skill's frontmatter into Cursor rule frontmatter.
 * @throws {ConversionError} When a mapped field is present but has the wrong shape.
 */
export function toCursorFrontmatter(skill: Skill, moduleName: string): CursorRuleFrontmatter {
  const key = artifactKey(moduleName, skill.name);
  return {
    description: skill.description,
    globs: convertGlobs(skill.metadata.globs, key),
    alwaysApply: convertAlwaysApply(skill.metadata.alwaysApply ?? skill.metadata.always_apply, key),
  };
}

/** Render the full .mdc file for a skill. */
export function renderCursorRule(skill: Skill, moduleName: string): string {
  return matter.stringify(skill.body.replace(/^\n+/, ''), toCursorFrontmatter(skill, moduleName));
}

function rulePath(skillName: string, context: AdapterContext): string {
  return join(skillLocation(context), `${artifactKey(context.module, skillName)}.mdc`);
}

export const cursorAdapter: FormatAdapter = {
  adapt(skill: Skill, context: AdapterContext): ArtifactOperation[] {
    return [{
      kind: 'file',
      skill: skill.name,
      path: rulePath(skill.name, context),
      content: renderCursorRule(skill, context.module),
    }];
  },
};
