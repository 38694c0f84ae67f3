/**
 * Gemini CLI adapter: append-with-managed-section layout.
 * Gemini CLI reads a single GEMINI.md, so every skill is rendered inline as
 * a managed block keyed by `module.skill`. Auxiliary files are not carried
 * over: the shared file is the only thing Gemini reads.
 */

import { join } from 'node:path';
import type { Skill } from '../types/index.js';
import { ConversionError } from '../errors.js';
import { skillLocation } from './capabilities.js';
import { containsMarkerLine } from './managed-section.js';
import { artifactKey, type AdapterContext, type ArtifactOperation, type FormatAdapter } from './types.js';

/** Name of the shared instructions file. */
export const GEMINI_FILE = 'GEMINI.md';

/** Render the block content for one skill. */
export function renderGeminiEntry(skill: Skill, moduleName: string): string {
  const quote = skill.description
    .split('\n')
    .map((line) => `> ${line}`.trimEnd())
    .join('\n');
  const body = skill.body.replace(/^\n+/, '').replace(/\s+$/, '');
  const parts = [`## ${artifactKey(moduleName, skill.name)}`, quote];
  if (body.length > 0) {
    parts.push(body);
  }
  return parts.join('\n\n');
}

function sharedFile(context: AdapterContext): string {
  return join(skillLocation(context), GEMINI_FILE);
}

export const geminiCliAdapter: FormatAdapter = {
  /**
   * @throws {ConversionError} When the rendered block has a line that reads
   *   as a managed-section marker, which would break the shared file's structure.
   */
  adapt(skill: Skill, context: AdapterContext): ArtifactOperation[] {
    const key = artifactKey(context.module, skill.name);
    const content = renderGeminiEntry(skill, context.module);
    if (containsMarkerLine(content)) {
      throw new ConversionError('content contains a managed-section marker line', key);
    }
    return [{
      kind: 'section',
      skill: skill.name,
      path: sharedFile(context),
      key,
      content,
    }];
  },
};
