/**
 * Claude Code adapter: isolated file-per-skill layout.
 * Claude Code reads SKILL.md directories natively, so each skill is copied
 * verbatim into `.claude/skills/<module>.<skill>/`.
 */

import { join } from 'node:path';
import type { Skill } from '../types/index.js';
import { skillLocation } from './capabilities.js';
import { SKILL_FILE } from '../modules/skill-loader.js';
import { artifactKey, type AdapterContext, type ArtifactOperation, type FormatAdapter } from './types.js';

function skillDirectory(skillName: string, context: AdapterContext): string {
  return join(skillLocation(context), artifactKey(context.module, skillName));
}

export const claudeCodeAdapter: FormatAdapter = {
  adapt(skill: Skill, context: AdapterContext): ArtifactOperation[] {
    return [{
      kind: 'directory',
      skill: skill.name,
      path: skillDirectory(skill.name, context),
      files: [
        { relativePath: SKILL_FILE, content: skill.raw },
        ...skill.resources.map((resource) => ({ relativePath: resource.relativePath, content: resource.content })),
      ],
    }];
  },
};
