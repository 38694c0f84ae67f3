import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import matter from 'gray-matter';
import { cursorAdapter, renderCursorRule, toCursorFrontmatter } from '../../../src/adapters/cursor.js';
import type { AdapterContext } from '../../../src/adapters/types.js';
import { ConversionError, ValidationError } from '../../../src/errors.js';
import { makeSkill } from '../../mocks/modules.js';

const context: AdapterContext = {
  assistant: 'cursor',
  scope: 'project',
  projectPath: '/repo',
  module: 'git-tools',
  userHome: '/home/tester',
};

describe('cursor adapter', () => {
  describe('toCursorFrontmatter', () => {
    it('applies defaults when globs and alwaysApply are absent', () => {
      const skill = makeSkill({ name: 'commit-helper', description: 'Writes commit messages' });
      expect(toCursorFrontmatter(skill, 'git-tools')).toEqual({
        description: 'Writes commit messages',
        globs: '',
        alwaysApply: false,
      });
    });

    it('joins a glob list with commas', () => {
      const skill = makeSkill({ name: 's', metadata: { globs: ['*.ts', '*.tsx'] } });
      expect(toCursorFrontmatter(skill, 'm').globs).toBe('*.ts,*.tsx');
    });

    it('keeps a glob string as-is', () => {
      const skill = makeSkill({ name: 's', metadata: { globs: 'src/**' } });
      expect(toCursorFrontmatter(skill, 'm').globs).toBe('src/**');
    });

    it('reads always_apply and string booleans', () => {
      expect(toCursorFrontmatter(makeSkill({ name: 's', metadata: { always_apply: 'true' } }), 'm').alwaysApply).toBe(true);
      expect(toCursorFrontmatter(makeSkill({ name: 's', metadata: { alwaysApply: true } }), 'm').alwaysApply).toBe(true);
      expect(toCursorFrontmatter(makeSkill({ name: 's', metadata: { alwaysApply: 'false' } }), 'm').alwaysApply).toBe(false);
    });

    it('prefers alwaysApply over always_apply', () => {
      const skill = makeSkill({ name: 's', metadata: { alwaysApply: false, always_apply: true } });
      expect(toCursorFrontmatter(skill, 'm').alwaysApply).toBe(false);
    });

    it('rejects an unparsable alwaysApply', () => {
      const skill = makeSkill({ name: 's', metadata: { alwaysApply: 'sometimes' } });
      expect(() => toCursorFrontmatter(skill, 'm')).toThrow(ConversionError);
      expect(() => toCursorFrontmatter(skill, 'm')).toThrow('Cannot convert m.s: "alwaysApply" must be true or false');
    });

    it('rejects globs that are not strings', () => {
      const skill = makeSkill({ name: 's', metadata: { globs: [1, 2] } });
      expect(() => toCursorFrontmatter(skill, 'm')).toThrow('"globs" must be a string or a list of strings');
    });
  });

  describe('renderCursorRule', () => {
    it('produces frontmatter and body that parse back', () => {
      const skill = makeSkill({
        name: 'commit-helper',
        description: 'Writes commit messages',
        body: '\n# Commit helper\n\nUse conventional commits.\n',
        metadata: { globs: ['*.md'] },
      });

      const rendered = renderCursorRule(skill, 'git-tools');
      const parsed = matter(rendered);

      expect(rendered.startsWith('---\n')).toBe(true);
      expect(parsed.data).toEqual({ description: 'Writes commit messages', globs: '*.md', alwaysApply: false });
      expect(parsed.content).toBe('# Commit helper\n\nUse conventional commits.\n');
    });
  });

  it('writes one .mdc file per skill under .cursor/rules', () => {
    const [operation] = cursorAdapter.adapt(makeSkill({ name: 'commit-helper' }), context);
    expect(operation.kind).toBe('file');
    expect(operation.path).toBe(join('/repo', '.cursor', 'rules', 'git-tools.commit-helper.mdc'));
  });

  it('does not support user scope', () => {
    expect(() => cursorAdapter.adapt(makeSkill({ name: 's' }), { ...context, scope: 'user', projectPath: null }))
      .toThrow(ValidationError);
  });
});
