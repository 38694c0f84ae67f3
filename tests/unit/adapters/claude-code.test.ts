import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { claudeCodeAdapter } from '../../../src/adapters/claude-code.js';
import type { AdapterContext } from '../../../src/adapters/types.js';
import { ValidationError } from '../../../src/errors.js';
import { makeSkill } from '../../mocks/modules.js';

const projectContext: AdapterContext = {
  assistant: 'claude-code',
  scope: 'project',
  projectPath: '/repo',
  module: 'git-tools',
  userHome: '/home/tester',
};

describe('claude-code adapter', () => {
  it('copies SKILL.md and resources into a namespaced directory', () => {
    const skill = makeSkill({
      name: 'commit-helper',
      raw: '---\nname: commit-helper\ndescription: Writes commit messages\n---\nBody\n',
      resources: [{ relativePath: 'scripts/run.sh', content: Buffer.from('echo hi') }],
    });

    const [operation] = claudeCodeAdapter.adapt(skill, projectContext);

    expect(operation).toEqual({
      kind: 'directory',
      skill: 'commit-helper',
      path: join('/repo', '.claude', 'skills', 'git-tools.commit-helper'),
      files: [
        { relativePath: 'SKILL.md', content: '---\nname: commit-helper\ndescription: Writes commit messages\n---\nBody\n' },
        { relativePath: 'scripts/run.sh', content: Buffer.from('echo hi') },
      ],
    });
  });

  it('installs under the user home for user scope', () => {
    const [operation] = claudeCodeAdapter.adapt(makeSkill({ name: 'lint' }), {
      ...projectContext,
      scope: 'user',
      projectPath: null,
    });
    expect(operation.path).toBe(join('/home/tester', '.claude', 'skills', 'git-tools.lint'));
  });

  it('requires a project path for project scope', () => {
    expect(() => claudeCodeAdapter.adapt(makeSkill({ name: 'lint' }), { ...projectContext, projectPath: null }))
      .toThrow(ValidationError);
  });

  it('keeps same-named skills of different modules apart', () => {
    const [a] = claudeCodeAdapter.adapt(makeSkill({ name: 'foo' }), { ...projectContext, module: 'A' });
    const [b] = claudeCodeAdapter.adapt(makeSkill({ name: 'foo' }), { ...projectContext, module: 'B' });
    expect(a.path).not.toBe(b.path);
  });
});
